import { describe, expect, it } from 'vitest'
import { createS3Agent, type DecisionModel } from '../lib/agents'
import { NotFoundError } from '../lib/errors'
import { createTestConfig } from '../test-utils/config'
import { InMemoryObjectStorage } from '../test-utils/in-memory-object-storage'
import { testLogger } from '../test-utils/logger'
import {
  finalAnswer,
  ScriptedDecisionModel,
  scriptedDecisions,
} from '../test-utils/scripted-decision-model'
import {
  colors,
  type ConsoleIO,
  formatAnswer,
  formatError,
  processCommand,
  runConsoleSession,
  runSingleQuery,
} from './console-session'

class FakeConsole implements ConsoleIO {
  readonly printed: string[] = []
  readonly prompts: string[] = []
  indicators = 0

  constructor(private readonly lines: string[]) {}

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt)
    return this.lines.shift() ?? null
  }

  print(text: string): void {
    this.printed.push(text)
  }

  showProcessingIndicator() {
    this.indicators++
    return { stop: () => {} }
  }
}

function createSession(decisionModel: DecisionModel, lines: string[]) {
  const config = createTestConfig('/tmp')
  const agent = createS3Agent(config, {
    storage: new InMemoryObjectStorage(),
    decisionModel,
    logger: testLogger,
  })
  const io = new FakeConsole(lines)
  return { agent, config, io }
}

const ended = `${colors.bold}${colors.cyan}--- Chat Session Ended ---${colors.reset}`
const endedOnEof = `\n${colors.bold}${colors.cyan}--- Chat Session Ended (EOF) ---${colors.reset}`

describe('processCommand', () => {
  it.each([
    ['', { type: 'continue' }],
    ['   ', { type: 'continue' }],
    ['exit', { type: 'exit' }],
    ['QUIT', { type: 'exit' }],
    ['/q', { type: 'exit' }],
    ['/exit', { type: 'exit' }],
    ['/help', { type: 'showHelp' }],
    ['/session', { type: 'showSession' }],
    ['/tools', { type: 'showTools' }],
    ['/RESET', { type: 'reset' }],
    ['  list my buckets  ', { type: 'query', query: 'list my buckets' }],
  ])('maps %j', (input, expected) => {
    expect(processCommand(input)).toEqual(expected)
  })

  it('rejects unknown slash commands', () => {
    expect(processCommand('/rename a b')).toEqual({
      type: 'error',
      message: 'Unknown command: /rename. Type /help for available commands.',
    })
  })

  it('keeps exit words inside a sentence as a query', () => {
    expect(processCommand('how do I exit vim')).toEqual({
      type: 'query',
      query: 'how do I exit vim',
    })
  })
})

describe('runConsoleSession', () => {
  it('prints the answer to each question until the user exits', async () => {
    const { agent, config, io } = createSession(
      scriptedDecisions(finalAnswer('You have no buckets.')),
      ['list my buckets', 'exit', 'never read']
    )

    await runConsoleSession({ agent, config, io })

    expect(io.printed).toContain(formatAnswer('You have no buckets.'))
    expect(io.printed[io.printed.length - 1]).toBe(ended)
    expect(io.prompts).toHaveLength(2)
    expect(io.indicators).toBe(1)
  })

  it('ends when input closes', async () => {
    const { agent, config, io } = createSession(scriptedDecisions(), [])

    await runConsoleSession({ agent, config, io })

    expect(io.printed[io.printed.length - 1]).toBe(endedOnEof)
  })

  it('reports a failed question and keeps going', async () => {
    const model = new ScriptedDecisionModel(() => {
      throw new NotFoundError('Bucket not found: acme-missing')
    })
    const { agent, config, io } = createSession(model, [
      'what is in acme-missing?',
      '/exit',
    ])

    await runConsoleSession({ agent, config, io })

    expect(io.printed).toContain(
      formatError(new NotFoundError('Bucket not found: acme-missing'))
    )
    expect(io.printed[io.printed.length - 1]).toBe(ended)
  })

  it('forgets the conversation on /reset', async () => {
    const { agent, config, io } = createSession(
      scriptedDecisions(finalAnswer('Hello!')),
      ['hi', '/reset']
    )

    await runConsoleSession({ agent, config, io })

    expect(agent.getTranscript()).toEqual([])
    expect(io.printed).toContain(
      `${colors.magenta}Conversation cleared.${colors.reset}`
    )
  })

  it('reports unknown commands without asking the model', async () => {
    const model = scriptedDecisions()
    const { agent, config, io } = createSession(model, ['/bogus'])

    await runConsoleSession({ agent, config, io })

    expect(io.printed).toContain(
      `${colors.red}Error: Unknown command: /bogus. Type /help for available commands.${colors.reset}`
    )
    expect(model.requests).toHaveLength(0)
  })
})

describe('runSingleQuery', () => {
  it('returns false when the question fails', async () => {
    const model = new ScriptedDecisionModel(() => {
      throw new Error('network down')
    })
    const { agent, config, io } = createSession(model, [])

    const ok = await runSingleQuery({ agent, config, io }, 'hi')

    expect(ok).toBe(false)
    expect(io.printed).toEqual([
      `${colors.red}Error: ${colors.brightRed}ModelError: The language model request failed: network down${colors.reset}`,
    ])
  })
})

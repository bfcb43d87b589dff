import type { Interface as ReadlineInterface } from 'node:readline/promises'
import type { StorageAgent } from '../lib/agents'
import type { AppConfig } from '../lib/config'
import { errorMessage, isStorageAgentError } from '../lib/errors'

// --- ANSI Color Codes ---
export const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightBlue: '\x1b[94m',
  brightWhite: '\x1b[97m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  italic: '\x1b[3m',
}

export interface ProcessingIndicator {
  stop: () => void
}

/** Terminal access for the chat loop, swappable in tests. */
export interface ConsoleIO {
  // Resolves null on EOF
  readLine(prompt: string): Promise<string | null>
  print(text: string): void
  showProcessingIndicator(message: string): ProcessingIndicator
}

// --- UI Helpers ---
const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

export function createTerminalIO(
  rl: ReadlineInterface,
  output: NodeJS.WriteStream
): ConsoleIO {
  let closed = false
  const whenClosed = new Promise<null>((resolve) => {
    rl.once('close', () => {
      closed = true
      resolve(null)
    })
  })

  return {
    async readLine(prompt) {
      if (closed) {
        return null
      }
      return Promise.race([whenClosed, rl.question(prompt)])
    },
    print(text) {
      output.write(`${text}\n`)
    },
    showProcessingIndicator(message) {
      let i = 0
      const intervalId = setInterval(() => {
        output.write(
          `\r${colors.cyan}${frames[i]}${colors.reset} ${colors.brightBlue}${message}${colors.reset}`
        )
        i = (i + 1) % frames.length
      }, 80)

      return {
        stop: () => {
          clearInterval(intervalId)
          output.write('\r' + ' '.repeat(message.length + 2) + '\r')
        },
      }
    },
  }
}

// --- Command Processing ---
export type CommandResult =
  | { type: 'continue' }
  | { type: 'exit' }
  | { type: 'query'; query: string }
  | { type: 'reset' }
  | { type: 'showHelp' }
  | { type: 'showSession' }
  | { type: 'showTools' }
  | { type: 'error'; message: string }

const EXIT_WORDS = new Set(['exit', 'quit'])

export function processCommand(input: string): CommandResult {
  const trimmed = input.trim()
  if (!trimmed) {
    return { type: 'continue' }
  }
  if (EXIT_WORDS.has(trimmed.toLowerCase())) {
    return { type: 'exit' }
  }
  if (!trimmed.startsWith('/')) {
    return { type: 'query', query: trimmed }
  }

  const [commandInput = ''] = trimmed.substring(1).split(/\s+/)
  switch (commandInput.toLowerCase()) {
    case 'q':
    case 'quit':
    case 'exit':
      return { type: 'exit' }
    case 'help':
      return { type: 'showHelp' }
    case 'session':
      return { type: 'showSession' }
    case 'tools':
      return { type: 'showTools' }
    case 'reset':
      return { type: 'reset' }
    default:
      return {
        type: 'error',
        message: `Unknown command: /${commandInput}. Type /help for available commands.`,
      }
  }
}

export function describeError(error: unknown): string {
  return isStorageAgentError(error)
    ? `${error.type}: ${error.message}`
    : errorMessage(error)
}

export function formatAnswer(text: string): string {
  return `${colors.bold}${colors.blue}Assistant:${colors.reset} ${text}`
}

export function formatError(error: unknown): string {
  return `${colors.red}Error: ${colors.brightRed}${describeError(error)}${colors.reset}`
}

const separator = `${colors.cyan}---${colors.reset}`

function helpText(): string {
  return `
${colors.bold}${colors.brightGreen}S3 Assistant${colors.reset}
${colors.dim}Ask questions about your S3 storage in plain English.${colors.reset}

${colors.bold}Available Commands:${colors.reset}
  ${colors.cyan}/help${colors.reset}       Show this help message
  ${colors.cyan}/session${colors.reset}    Show current session info
  ${colors.cyan}/tools${colors.reset}      List the storage tools the assistant can use
  ${colors.cyan}/reset${colors.reset}      Forget the conversation so far
  ${colors.cyan}/exit${colors.reset}       Exit the chat session (or type "exit")

${colors.italic}${colors.dim}Attach a local file by adding "local_path =<path>" to your message.${colors.reset}
`
}

function sessionText(agent: StorageAgent, config: AppConfig): string {
  const field = (label: string, value: string | number) =>
    `${colors.yellow}${label}: ${colors.brightWhite}${value}${colors.reset}`
  return [
    `\n${colors.bold}${colors.yellow}Session Information:${colors.reset}`,
    field('Region', config.aws.region),
    field('Profile', config.aws.profile ?? '(default)'),
    field('Model', `${config.llm.provider}/${config.llm.modelId}`),
    field('Max tool steps', config.agent.maxSteps),
    field('Transcript entries', agent.getTranscript().length),
    separator,
  ].join('\n')
}

function toolsText(agent: StorageAgent): string {
  return agent
    .listTools()
    .map(
      (tool) =>
        `  ${colors.cyan}${tool.name.padEnd(22)}${colors.reset} ${tool.description}`
    )
    .join('\n')
}

export interface ConsoleSessionOptions {
  agent: StorageAgent
  config: AppConfig
  io: ConsoleIO
}

/** Answers one query and reports whether it succeeded. */
export async function runSingleQuery(
  { agent, io }: ConsoleSessionOptions,
  query: string
): Promise<boolean> {
  const indicator = io.showProcessingIndicator('Thinking...')
  try {
    const response = await agent.generate(query)
    indicator.stop()
    io.print(formatAnswer(response.text))
    return true
  } catch (error: unknown) {
    indicator.stop()
    io.print(formatError(error))
    return false
  }
}

export async function runConsoleSession(
  options: ConsoleSessionOptions
): Promise<void> {
  const { agent, config, io } = options
  io.print(
    `${colors.bold}${colors.cyan}--- Starting S3 Assistant ---${colors.reset}`
  )
  io.print(`${colors.dim}Type /help for available commands.${colors.reset}`)

  for (;;) {
    const line = await io.readLine(
      `${colors.bold}${colors.green}Ask me anything about your S3 storage (or type 'exit' to quit):${colors.reset} `
    )
    if (line === null) {
      break
    }

    const commandResult = processCommand(line)
    switch (commandResult.type) {
      case 'continue':
        break
      case 'exit':
        io.print(
          `${colors.bold}${colors.cyan}--- Chat Session Ended ---${colors.reset}`
        )
        return
      case 'query':
        await runSingleQuery(options, commandResult.query)
        io.print(separator)
        break
      case 'reset':
        agent.reset()
        io.print(`${colors.magenta}Conversation cleared.${colors.reset}`)
        break
      case 'showHelp':
        io.print(helpText())
        break
      case 'showSession':
        io.print(sessionText(agent, config))
        break
      case 'showTools':
        io.print(toolsText(agent))
        break
      case 'error':
        io.print(`${colors.red}Error: ${commandResult.message}${colors.reset}`)
        io.print(separator)
        break
    }
  }

  io.print(
    `\n${colors.bold}${colors.cyan}--- Chat Session Ended (EOF) ---${colors.reset}`
  )
}

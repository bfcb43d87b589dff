import {
  errorMessage,
  isStorageAgentError,
  LoopExceededError,
  ModelError,
} from '../errors'
import type { Logger } from '../logger'
import type { ToolDescriptor, ToolInvocation, ToolRegistry } from '../tools'
import type { Decision, DecisionModel } from './decision-model'
import { ConversationMemory } from './memory'
import type { TranscriptEntry } from './transcript'

export interface StorageAgentOptions {
  name: string
  instructions: string
  decisionModel: DecisionModel
  registry: ToolRegistry
  maxSteps: number
  lastMessages: number
  logger: Logger
}

export interface AgentResponse {
  text: string
  // Tool invocations this turn took
  steps: number
  invocations: ToolInvocation[]
}

/**
 * Runs one user turn at a time: asks the model for a decision, runs the
 * requested tool, feeds the outcome back, and repeats until the model answers.
 */
export class StorageAgent {
  readonly name: string
  private readonly instructions: string
  private readonly decisionModel: DecisionModel
  private readonly registry: ToolRegistry
  private readonly maxSteps: number
  private readonly memory: ConversationMemory
  private readonly logger: Logger

  constructor(options: StorageAgentOptions) {
    this.name = options.name
    this.instructions = options.instructions
    this.decisionModel = options.decisionModel
    this.registry = options.registry
    this.maxSteps = options.maxSteps
    this.memory = new ConversationMemory(options.lastMessages)
    this.logger = options.logger
  }

  async generate(utterance: string): Promise<AgentResponse> {
    this.memory.append({ role: 'user', content: utterance })
    const invocations: ToolInvocation[] = []

    for (;;) {
      const decision = await this.decide()

      if (decision.type === 'final') {
        this.memory.append({ role: 'assistant', content: decision.text })
        this.logger.info(
          `[StorageAgent] Turn finished after ${invocations.length} tool invocations`
        )
        return { text: decision.text, steps: invocations.length, invocations }
      }

      if (invocations.length >= this.maxSteps) {
        this.logger.warn(
          `[StorageAgent] Model asked for ${decision.toolName} after ${this.maxSteps} tool invocations, giving up`
        )
        throw new LoopExceededError(this.maxSteps)
      }

      this.logger.debug(
        `[StorageAgent] Step ${invocations.length + 1}: ${decision.toolName}`
      )
      const invocation = await this.registry.invoke(
        decision.callId,
        decision.toolName,
        decision.args
      )
      invocations.push(invocation)
      this.memory.append({ role: 'tool', invocation })
    }
  }

  private async decide(): Promise<Decision> {
    try {
      return await this.decisionModel.decide({
        system: this.instructions,
        transcript: this.memory.window(),
        tools: this.registry.describe(),
      })
    } catch (error: unknown) {
      if (isStorageAgentError(error)) {
        throw error
      }
      this.logger.error(
        `[StorageAgent] Language model request failed: ${errorMessage(error)}`
      )
      throw new ModelError(
        `The language model request failed: ${errorMessage(error)}`,
        { cause: error }
      )
    }
  }

  listTools(): ToolDescriptor[] {
    return this.registry.describe()
  }

  getTranscript(): readonly TranscriptEntry[] {
    return this.memory.all()
  }

  reset(): void {
    this.memory.clear()
  }
}

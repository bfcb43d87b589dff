import {
  type CoreMessage,
  generateText,
  InvalidToolArgumentsError,
  type LanguageModel,
  NoSuchToolError,
  type Tool,
  tool,
} from 'ai'
import { nanoid } from 'nanoid'
import { TimeoutError } from '../errors'
import type { ToolDescriptor } from '../tools'
import type { TranscriptEntry } from './transcript'

export type Decision =
  | { type: 'final'; text: string }
  | { type: 'tool-call'; callId: string; toolName: string; args: unknown }

export interface DecisionRequest {
  system: string
  transcript: readonly TranscriptEntry[]
  tools: readonly ToolDescriptor[]
}

/**
 * The language model as the loop sees it: given the conversation so far,
 * either answer or ask for exactly one tool.
 */
export interface DecisionModel {
  decide(request: DecisionRequest): Promise<Decision>
}

export function toCoreMessages(
  transcript: readonly TranscriptEntry[]
): CoreMessage[] {
  return transcript.flatMap((entry): CoreMessage[] => {
    if (entry.role === 'user') {
      return [{ role: 'user', content: entry.content }]
    }
    if (entry.role === 'assistant') {
      return [{ role: 'assistant', content: entry.content }]
    }
    const { callId, toolName, args, outcome } = entry.invocation
    const result =
      outcome.status === 'success'
        ? outcome.result
        : { error: { ...outcome.error, tool: toolName } }
    return [
      {
        role: 'assistant',
        content: [{ type: 'tool-call', toolCallId: callId, toolName, args }],
      },
      {
        role: 'tool',
        content: [
          { type: 'tool-result', toolCallId: callId, toolName, result },
        ],
      },
    ]
  })
}

// The SDK hands back unparseable arguments as the raw string
function parseRawArgs(toolArgs: string): unknown {
  try {
    return JSON.parse(toolArgs)
  } catch {
    return toolArgs
  }
}

export interface AiSdkDecisionModelOptions {
  timeoutMs: number
  maxRetries?: number
}

/**
 * DecisionModel backed by an AI SDK language model. Tools are declared without
 * `execute`, so generateText stops at the first tool call and the loop stays
 * in charge of running it.
 */
export class AiSdkDecisionModel implements DecisionModel {
  constructor(
    private readonly model: LanguageModel,
    private readonly options: AiSdkDecisionModelOptions
  ) {}

  async decide({
    system,
    transcript,
    tools,
  }: DecisionRequest): Promise<Decision> {
    const toolSet: Record<string, Tool> = Object.fromEntries(
      tools.map((descriptor) => [
        descriptor.name,
        tool({
          description: descriptor.description,
          parameters: descriptor.inputSchema,
        }),
      ])
    )
    const abortSignal = AbortSignal.timeout(this.options.timeoutMs)

    try {
      const result = await generateText({
        model: this.model,
        system,
        messages: toCoreMessages(transcript),
        tools: toolSet,
        toolChoice: 'auto',
        maxRetries: this.options.maxRetries ?? 2,
        abortSignal,
      })
      const [call] = result.toolCalls
      if (call) {
        return {
          type: 'tool-call',
          callId: call.toolCallId,
          toolName: call.toolName,
          args: call.args,
        }
      }
      return { type: 'final', text: result.text }
    } catch (error: unknown) {
      if (NoSuchToolError.isInstance(error)) {
        return {
          type: 'tool-call',
          callId: nanoid(),
          toolName: error.toolName,
          args: {},
        }
      }
      if (InvalidToolArgumentsError.isInstance(error)) {
        return {
          type: 'tool-call',
          callId: nanoid(),
          toolName: error.toolName,
          args: parseRawArgs(error.toolArgs),
        }
      }
      if (abortSignal.aborted) {
        throw new TimeoutError(
          'Language model request',
          this.options.timeoutMs,
          { cause: error }
        )
      }
      throw error
    }
  }
}

import type { LanguageModelV1 } from 'ai'

export type GenerateOptions = Parameters<LanguageModelV1['doGenerate']>[0]
export type GenerateResult = Awaited<ReturnType<LanguageModelV1['doGenerate']>>

/**
 * LanguageModelV1 whose non-streaming responses come from a test function.
 * Every call's options are kept for assertions on the prompt and tools.
 */
export class FakeLanguageModel implements LanguageModelV1 {
  readonly specificationVersion = 'v1'
  readonly provider = 'fake'
  readonly modelId = 'fake-model'
  readonly defaultObjectGenerationMode = undefined
  readonly calls: GenerateOptions[] = []

  constructor(
    private readonly respond: (
      options: GenerateOptions
    ) => GenerateResult | Promise<GenerateResult>
  ) {}

  async doGenerate(options: GenerateOptions): Promise<GenerateResult> {
    this.calls.push(options)
    return this.respond(options)
  }

  async doStream(): Promise<never> {
    throw new Error('FakeLanguageModel does not stream')
  }
}

export function textResponse(text: string): GenerateResult {
  return {
    text,
    finishReason: 'stop',
    usage: { promptTokens: 10, completionTokens: 5 },
    rawCall: { rawPrompt: null, rawSettings: {} },
  }
}

export function toolCallResponse(
  toolCallId: string,
  toolName: string,
  args: unknown
): GenerateResult {
  return {
    toolCalls: [
      {
        toolCallType: 'function',
        toolCallId,
        toolName,
        args: JSON.stringify(args),
      },
    ],
    finishReason: 'tool-calls',
    usage: { promptTokens: 10, completionTokens: 5 },
    rawCall: { rawPrompt: null, rawSettings: {} },
  }
}

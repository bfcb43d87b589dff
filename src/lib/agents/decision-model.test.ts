import { describe, expect, it } from 'vitest'
import { TimeoutError } from '../errors'
import { StorageOperations } from '../storage/storage-operations'
import { ToolRegistry } from '../tools'
import {
  FakeLanguageModel,
  type GenerateResult,
  textResponse,
  toolCallResponse,
} from '../../test-utils/fake-language-model'
import { InMemoryObjectStorage } from '../../test-utils/in-memory-object-storage'
import { testLogger } from '../../test-utils/logger'
import { AiSdkDecisionModel, toCoreMessages } from './decision-model'
import type { TranscriptEntry } from './transcript'

const tools = new ToolRegistry({
  operations: new StorageOperations(new InMemoryObjectStorage(), testLogger),
  downloadDir: '/tmp',
  timeoutMs: 1_000,
  logger: testLogger,
}).describe()

const transcript: TranscriptEntry[] = [
  { role: 'user', content: 'describe acme-docs/notes.txt' },
]

describe('toCoreMessages', () => {
  it('turns tool invocations into a tool call and its result', () => {
    const entries: TranscriptEntry[] = [
      { role: 'user', content: 'what is in acme-docs?' },
      {
        role: 'tool',
        invocation: {
          callId: 'call-1',
          toolName: 'list_objects',
          args: { bucket: 'acme-docs' },
          outcome: { status: 'success', result: { count: 0 } },
          durationMs: 3,
        },
      },
      {
        role: 'tool',
        invocation: {
          callId: 'call-2',
          toolName: 'get_object',
          args: { bucket: 'acme-docs', key: 'a.txt' },
          outcome: {
            status: 'error',
            error: { type: 'NotFoundError', message: 'Object not found' },
          },
          durationMs: 2,
        },
      },
      { role: 'assistant', content: 'The bucket is empty.' },
    ]

    expect(toCoreMessages(entries)).toEqual([
      { role: 'user', content: 'what is in acme-docs?' },
      {
        role: 'assistant',
        content: [
          {
            type: 'tool-call',
            toolCallId: 'call-1',
            toolName: 'list_objects',
            args: { bucket: 'acme-docs' },
          },
        ],
      },
      {
        role: 'tool',
        content: [
          {
            type: 'tool-result',
            toolCallId: 'call-1',
            toolName: 'list_objects',
            result: { count: 0 },
          },
        ],
      },
      {
        role: 'assistant',
        content: [
          {
            type: 'tool-call',
            toolCallId: 'call-2',
            toolName: 'get_object',
            args: { bucket: 'acme-docs', key: 'a.txt' },
          },
        ],
      },
      {
        role: 'tool',
        content: [
          {
            type: 'tool-result',
            toolCallId: 'call-2',
            toolName: 'get_object',
            result: {
              error: {
                type: 'NotFoundError',
                message: 'Object not found',
                tool: 'get_object',
              },
            },
          },
        ],
      },
      { role: 'assistant', content: 'The bucket is empty.' },
    ])
  })
})

describe('AiSdkDecisionModel', () => {
  it('returns the text as a final decision', async () => {
    const model = new FakeLanguageModel(() => textResponse('You have 2 buckets.'))
    const decisionModel = new AiSdkDecisionModel(model, { timeoutMs: 1_000 })

    const decision = await decisionModel.decide({
      system: 'You manage S3 storage.',
      transcript,
      tools,
    })

    expect(decision).toEqual({ type: 'final', text: 'You have 2 buckets.' })
  })

  it('offers every tool with automatic tool choice', async () => {
    const model = new FakeLanguageModel(() => textResponse('ok'))
    const decisionModel = new AiSdkDecisionModel(model, { timeoutMs: 1_000 })

    await decisionModel.decide({ system: 'You manage S3 storage.', transcript, tools })

    const mode = model.calls[0]?.mode
    expect(mode).toMatchObject({ type: 'regular', toolChoice: { type: 'auto' } })
    const offered =
      mode?.type === 'regular' ? mode.tools?.map((tool) => tool.name) : []
    expect(offered).toEqual(tools.map((tool) => tool.name))
    expect(model.calls[0]?.prompt[0]).toEqual({
      role: 'system',
      content: 'You manage S3 storage.',
    })
  })

  it('returns the first tool call without running it', async () => {
    const model = new FakeLanguageModel(() =>
      toolCallResponse('call-7', 'get_object_metadata', {
        bucket: 'acme-docs',
        key: 'notes.txt',
      })
    )
    const decisionModel = new AiSdkDecisionModel(model, { timeoutMs: 1_000 })

    const decision = await decisionModel.decide({ system: '', transcript, tools })

    expect(decision).toEqual({
      type: 'tool-call',
      callId: 'call-7',
      toolName: 'get_object_metadata',
      args: { bucket: 'acme-docs', key: 'notes.txt' },
    })
  })

  it('hands unknown tools to the loop instead of failing', async () => {
    const model = new FakeLanguageModel(() =>
      toolCallResponse('call-8', 'rename_bucket', { from: 'a' })
    )
    const decisionModel = new AiSdkDecisionModel(model, { timeoutMs: 1_000 })

    const decision = await decisionModel.decide({ system: '', transcript, tools })

    expect(decision).toMatchObject({
      type: 'tool-call',
      toolName: 'rename_bucket',
      args: {},
    })
  })

  it('hands invalid arguments to the loop instead of failing', async () => {
    const model = new FakeLanguageModel(() =>
      toolCallResponse('call-9', 'get_object_metadata', { bucket: 42 })
    )
    const decisionModel = new AiSdkDecisionModel(model, { timeoutMs: 1_000 })

    const decision = await decisionModel.decide({ system: '', transcript, tools })

    expect(decision).toMatchObject({
      type: 'tool-call',
      toolName: 'get_object_metadata',
      args: { bucket: 42 },
    })
  })

  it('fails with TimeoutError when the model does not answer in time', async () => {
    const model = new FakeLanguageModel(({ abortSignal }) => {
      if (!abortSignal) {
        throw new Error('Expected an abort signal')
      }
      const signal = abortSignal
      return new Promise<GenerateResult>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason))
      })
    })
    const decisionModel = new AiSdkDecisionModel(model, {
      timeoutMs: 20,
      maxRetries: 0,
    })

    const decision = decisionModel.decide({ system: '', transcript, tools })

    await expect(decision).rejects.toBeInstanceOf(TimeoutError)
    await expect(decision).rejects.toThrow(
      'Language model request timed out after 20 ms'
    )
  })
})

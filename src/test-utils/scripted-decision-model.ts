import type {
  Decision,
  DecisionModel,
  DecisionRequest,
} from '../lib/agents/decision-model'
import type { TranscriptEntry } from '../lib/agents/transcript'

export type DecisionScript = (
  request: DecisionRequest,
  call: number
) => Decision | Promise<Decision>

/**
 * DecisionModel driven by a test-provided function. Every request is recorded
 * with a copy of the transcript window it was given.
 */
export class ScriptedDecisionModel implements DecisionModel {
  readonly requests: DecisionRequest[] = []

  constructor(private readonly script: DecisionScript) {}

  async decide(request: DecisionRequest): Promise<Decision> {
    this.requests.push({ ...request, transcript: [...request.transcript] })
    return this.script(request, this.requests.length - 1)
  }
}

/** Plays back a fixed list of decisions, one per call. */
export function scriptedDecisions(
  ...decisions: Decision[]
): ScriptedDecisionModel {
  return new ScriptedDecisionModel((_request, call) => {
    const decision = decisions[call]
    if (!decision) {
      throw new Error(`No scripted decision for call ${call}`)
    }
    return decision
  })
}

export function finalAnswer(text: string): Decision {
  return { type: 'final', text }
}

export function toolCall(
  toolName: string,
  args: unknown,
  callId = `call-${toolName}`
): Decision {
  return { type: 'tool-call', callId, toolName, args }
}

export function lastUserMessage(
  transcript: readonly TranscriptEntry[]
): string | undefined {
  for (let i = transcript.length - 1; i >= 0; i -= 1) {
    const entry = transcript[i]
    if (entry?.role === 'user') {
      return entry.content
    }
  }
  return undefined
}

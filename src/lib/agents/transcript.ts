import type { ToolInvocation } from '../tools'

export type TranscriptEntry =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string }
  | { role: 'tool'; invocation: ToolInvocation }

export interface DisplayEntry {
  role: TranscriptEntry['role']
  content: string
}

function describeInvocation({ toolName, outcome }: ToolInvocation): string {
  if (outcome.status === 'success') {
    return `${toolName} succeeded`
  }
  return `${toolName} failed (${outcome.error.type}): ${outcome.error.message}`
}

/** Flattens a transcript into role/text pairs for the chat shells. */
export function toDisplayTranscript(
  entries: readonly TranscriptEntry[]
): DisplayEntry[] {
  return entries.map((entry) =>
    entry.role === 'tool'
      ? { role: 'tool', content: describeInvocation(entry.invocation) }
      : { role: entry.role, content: entry.content }
  )
}

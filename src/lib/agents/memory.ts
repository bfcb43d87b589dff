import type { TranscriptEntry } from './transcript'

/**
 * Conversation history for one agent, held in process memory only.
 */
export class ConversationMemory {
  private entries: TranscriptEntry[] = []

  constructor(private readonly lastMessages: number) {}

  append(entry: TranscriptEntry): void {
    this.entries.push(entry)
  }

  all(): readonly TranscriptEntry[] {
    return [...this.entries]
  }

  /**
   * The most recent `lastMessages` entries, widened backwards until the first
   * one is a user utterance.
   */
  window(): TranscriptEntry[] {
    let start = Math.max(0, this.entries.length - this.lastMessages)
    while (start > 0 && this.entries[start]?.role !== 'user') {
      start -= 1
    }
    return this.entries.slice(start)
  }

  clear(): void {
    this.entries = []
  }
}

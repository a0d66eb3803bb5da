import { ConversationTurn } from './types';

/**
 * Ordered turns of one interactive session. Append-only apart from `clear()`.
 * Alternation of roles is not enforced; `append` reports whether the new turn
 * repeats the previous role so the owner can log it.
 */
export class SessionTranscript {
  private entries: ConversationTurn[] = [];

  constructor(readonly id: string) { }

  get turns(): readonly ConversationTurn[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  get lastTurn(): ConversationTurn | undefined {
    return this.entries[this.entries.length - 1];
  }

  append(turn: ConversationTurn): { repeatedRole: boolean } {
    const repeatedRole = this.lastTurn?.role === turn.role;
    this.entries.push(turn);
    return { repeatedRole };
  }

  clear() {
    this.entries = [];
  }
}

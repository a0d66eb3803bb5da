import { SearchResult } from '../dialogues/types';

export type Role = 'user' | 'assistant';

export interface ConversationTurn {
  role: Role;
  content: string;
  sources: SearchResult[]; // empty for user turns
  ts: number;
}

import { SearchResult } from '../dialogues/types';
import { ConversationTurn, Role } from '../chat-memory/types';

export const PREVIEW_LENGTH = 300;
const ELLIPSIS = '...';

export interface RenderedSource {
    label: string;
    dialogueId: string;
    similarity: string;
    preview: string;
}

export interface RenderedTurn {
    role: Role;
    content: string;
    ts: number;
    sources: RenderedSource[];
}

/** Counts code points, so an emoji is one character and is never split. */
export function previewText(text: string, maxLength = PREVIEW_LENGTH): string {
    const chars = Array.from(text);
    return chars.length > maxLength ? chars.slice(0, maxLength).join('') + ELLIPSIS : text;
}

/** 0.92 -> "92.00%" */
export function formatSimilarity(similarity: number): string {
    return `${(similarity * 100).toFixed(2)}%`;
}

export function renderSources(sources: readonly SearchResult[]): RenderedSource[] {
    return sources.map((source, index) => ({
        label: `Dialogue ${index + 1}`,
        dialogueId: source.dialogueId,
        similarity: formatSimilarity(source.similarity),
        preview: previewText(source.content),
    }));
}

export function renderTranscript(turns: readonly ConversationTurn[]): RenderedTurn[] {
    return turns.map(turn => ({
        role: turn.role,
        content: turn.content,
        ts: turn.ts,
        sources: renderSources(turn.sources),
    }));
}

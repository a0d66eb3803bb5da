export interface SearchResult {
    recordId: number;
    dialogueId: string;
    content: string;
    similarity: number; // [0, 1]
}

/** Raw row as pg returns it: int columns may arrive as strings, float8 as number. */
export interface SimilarityRow {
    id: number | string;
    dialogue_id: string;
    content: string;
    similarity: number | string | null;
}

import { SearchResult } from '../dialogues/types';

export type RetrievalStage = 'embedding' | 'searching' | 'no_results' | 'context_building' | 'generating' | 'done';

export type RetrievalStatus = 'answered' | 'no_results' | 'generation_failed';

export interface RetrievalOptions {
    topK: number;
    temperature: number;
    maxOutputTokens: number;
    model?: string;
}

export interface RetrievalAnswer {
    answer: string;
    sources: SearchResult[];
    context: string;
    status: RetrievalStatus;
    retrievalError?: string;
}

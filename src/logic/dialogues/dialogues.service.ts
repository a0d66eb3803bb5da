import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Dialogue } from '../../entities';
import { describeError } from '../gemini/gemini.service';
import { SearchResult, SimilarityRow } from './types';

export class RetrievalError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'RetrievalError';
    }
}

// `<=>` is pgvector's cosine distance; ordering by the distance itself lets the index be used.
const NEAREST_DIALOGUES_SQL = `
    SELECT id, dialogue_id, content, 1 - (embedding <=> $1::vector) AS similarity
    FROM dialogues
    ORDER BY embedding <=> $1::vector ASC, id ASC
    LIMIT $2
`;

export function toVectorLiteral(vector: number[]): string {
    return `[${vector.join(',')}]`;
}

export function clampSimilarity(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.min(1, Math.max(0, value));
}

export function toSearchResult(row: SimilarityRow): SearchResult {
    return {
        recordId: Number(row.id),
        dialogueId: String(row.dialogue_id),
        content: row.content ?? '',
        similarity: clampSimilarity(Number(row.similarity)),
    };
}

@Injectable()
export class DialoguesService {
    private readonly logger = new Logger(DialoguesService.name);

    constructor(
        @InjectRepository(Dialogue)
        private readonly dialogueRepository: Repository<Dialogue>,
    ) { }

    async search(queryVector: number[], topK: number): Promise<SearchResult[]> {
        if (!Number.isInteger(topK) || topK < 1) {
            throw new RangeError(`topK must be a positive integer, got ${topK}`);
        }

        let rows: SimilarityRow[];
        try {
            rows = await this.dialogueRepository.query(NEAREST_DIALOGUES_SQL, [toVectorLiteral(queryVector), topK]);
        } catch (error) {
            throw new RetrievalError(`Dialogue search failed: ${describeError(error)}`, error);
        }

        // The database already orders the rows; re-sorting keeps the contract if
        // clamping folds several distances onto the same similarity.
        return rows
            .map(toSearchResult)
            .sort((a, b) => b.similarity - a.similarity || a.recordId - b.recordId)
            .slice(0, topK);
    }

    /** Health indicator only: never throws. */
    async count(): Promise<number | null> {
        try {
            return await this.dialogueRepository.count();
        } catch (error) {
            this.logger.warn(`Could not count dialogues: ${describeError(error)}`);
            return null;
        }
    }
}

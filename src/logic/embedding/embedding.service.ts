import { Injectable, Logger } from '@nestjs/common';
import { GeminiService, describeError } from '../gemini/gemini.service';

export class EmbeddingError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'EmbeddingError';
    }
}

export interface EmbeddingProvider {
    readonly dimensions: number;
    embed(text: string): Promise<number[]>;
}

export function l2Normalize(vector: number[]): number[] {
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (norm === 0) return [...vector];
    return vector.map(v => v / norm);
}

@Injectable()
export class EmbeddingService implements EmbeddingProvider {
    private readonly logger = new Logger(EmbeddingService.name);

    constructor(private readonly geminiService: GeminiService) { }

    get dimensions(): number {
        return this.geminiService.embeddingDimensions;
    }

    /**
     * Embeds one query. The stored vectors are unit-length, and so is the result,
     * which keeps `1 - cosine distance` meaningful as a similarity.
     */
    async embed(text: string): Promise<number[]> {
        let vectors: number[][];
        try {
            vectors = await this.geminiService.embedTexts([text]);
        } catch (error) {
            this.logger.error(`Embedding failed: ${describeError(error)}`);
            throw new EmbeddingError(`Could not embed the question: ${describeError(error)}`, error);
        }

        const [vector] = vectors;
        if (!vector || vector.length === 0) {
            throw new EmbeddingError('Embedding provider returned no vector');
        }
        if (vector.length !== this.dimensions) {
            throw new EmbeddingError(
                `Embedding has ${vector.length} dimensions, expected ${this.dimensions}`,
            );
        }
        return l2Normalize(vector);
    }
}

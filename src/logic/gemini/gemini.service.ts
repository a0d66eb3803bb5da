import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { GoogleGenAI } from '@google/genai';
import { GENAI_CLIENT } from './gemini.constants';

export interface CompletionOptions {
    temperature: number;
    maxOutputTokens: number;
    model?: string;
}

/**
 * Thin wrapper over the shared GoogleGenAI client. Errors are rethrown with the
 * provider message attached; callers decide whether a failure is fatal.
 */
@Injectable()
export class GeminiService {
    readonly embedModel: string;
    readonly chatModel: string;
    readonly embeddingDimensions: number;

    constructor(
        @Inject(GENAI_CLIENT) private readonly genAI: GoogleGenAI,
        configService: ConfigService,
    ) {
        this.embedModel = configService.get<string>('GEMINI_EMBED_MODEL') || 'gemini-embedding-001';
        this.chatModel = configService.get<string>('GEMINI_CHAT_MODEL') || 'gemini-2.5-flash';
        this.embeddingDimensions = configService.get<number>('EMBEDDING_DIMENSIONS') || 768;
    }

    async embedTexts(texts: string[]): Promise<number[][]> {
        try {
            const result = await this.genAI.models.embedContent({
                model: this.embedModel,
                contents: texts,
                config: {
                    taskType: 'RETRIEVAL_QUERY',
                    outputDimensionality: this.embeddingDimensions,
                },
            });
            return (result.embeddings ?? [])
                .map(item => item?.values)
                .filter((values): values is number[] => Array.isArray(values));
        } catch (error) {
            throw new Error(`Failed to generate embeddings: ${describeError(error)}`);
        }
    }

    /**
     * Sends one user-role message and returns the model text.
     * An empty completion is reported as an error rather than an empty answer.
     */
    async complete(prompt: string, options: CompletionOptions): Promise<string> {
        let text: string | undefined;
        try {
            const result = await this.genAI.models.generateContent({
                model: options.model || this.chatModel,
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                config: {
                    temperature: options.temperature,
                    maxOutputTokens: options.maxOutputTokens,
                },
            });
            text = result.text;
        } catch (error) {
            throw new Error(`Failed to generate content: ${describeError(error)}`);
        }
        if (!text?.trim()) {
            throw new Error('Failed to generate content: empty response from model');
        }
        return text;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

import { Injectable, Logger } from '@nestjs/common';
import { CompletionOptions, GeminiService, describeError } from '../gemini/gemini.service';
import { GENERATION_ERROR_PREFIX, buildAnswerPrompt } from './prompts';

export type GenerationOptions = CompletionOptions;

/**
 * `text` is always what the user sees. On failure it carries the provider error,
 * so `ok` is the only reliable way to tell an answer from a failure.
 */
export type GenerationResult =
    | { ok: true; text: string }
    | { ok: false; text: string; error: string };

@Injectable()
export class AnswerGeneratorService {
    private readonly logger = new Logger(AnswerGeneratorService.name);

    constructor(private readonly geminiService: GeminiService) { }

    async generate(question: string, context: string, options: GenerationOptions): Promise<GenerationResult> {
        if (!(options.temperature >= 0 && options.temperature <= 1)) {
            throw new RangeError(`temperature must be within [0, 1], got ${options.temperature}`);
        }
        if (!Number.isInteger(options.maxOutputTokens) || options.maxOutputTokens < 1) {
            throw new RangeError(`maxOutputTokens must be a positive integer, got ${options.maxOutputTokens}`);
        }

        const prompt = buildAnswerPrompt(question, context);
        try {
            const text = await this.geminiService.complete(prompt, options);
            return { ok: true, text };
        } catch (error) {
            const message = describeError(error);
            this.logger.error(`Answer generation failed: ${message}`);
            return { ok: false, text: `${GENERATION_ERROR_PREFIX}: ${message}`, error: message };
        }
    }
}

import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingService } from '../embedding/embedding.service';
import { DialoguesService, RetrievalError } from '../dialogues/dialogues.service';
import { SearchResult } from '../dialogues/types';
import { AnswerGeneratorService } from '../answer/answer-generator.service';
import { RetrievalAnswer, RetrievalOptions, RetrievalStage } from './types';

export const NO_RESULTS_ANSWER = "Désolé, je n'ai pas trouvé de dialogues pertinents pour répondre à votre question.";

export const CONTEXT_SEPARATOR = '\n\n';

/** Order matters: the model reads the most similar excerpt first. */
export function buildContext(results: SearchResult[]): string {
    return results.map(r => r.content).join(CONTEXT_SEPARATOR);
}

@Injectable()
export class RetrievalService {
    private readonly logger = new Logger(RetrievalService.name);

    constructor(
        private readonly embeddingService: EmbeddingService,
        private readonly dialoguesService: DialoguesService,
        private readonly answerGenerator: AnswerGeneratorService,
    ) { }

    /**
     * embedding -> searching -> (no_results | context_building -> generating) -> done.
     * Each stage runs once, in order. An EmbeddingError is the only failure that escapes.
     */
    async ask(question: string, options: RetrievalOptions): Promise<RetrievalAnswer> {
        this.enter('embedding');
        const queryVector = await this.embeddingService.embed(question);

        this.enter('searching');
        let sources: SearchResult[] = [];
        let retrievalError: string | undefined;
        try {
            sources = await this.dialoguesService.search(queryVector, options.topK);
        } catch (error) {
            if (!(error instanceof RetrievalError)) throw error;
            this.logger.error(error.message);
            retrievalError = error.message;
        }

        if (sources.length === 0) {
            this.enter('no_results');
            return {
                answer: NO_RESULTS_ANSWER,
                sources: [],
                context: '',
                status: 'no_results',
                ...(retrievalError ? { retrievalError } : {}),
            };
        }

        this.enter('context_building');
        const context = buildContext(sources);

        this.enter('generating');
        const generation = await this.answerGenerator.generate(question, context, {
            temperature: options.temperature,
            maxOutputTokens: options.maxOutputTokens,
            model: options.model,
        });

        this.enter('done');
        return {
            answer: generation.text,
            sources,
            context,
            status: generation.ok ? 'answered' : 'generation_failed',
        };
    }

    private enter(stage: RetrievalStage) {
        this.logger.debug(`stage: ${stage}`);
    }
}

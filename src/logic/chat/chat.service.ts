import { HttpException, HttpStatus, Injectable, Logger, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { RetrievalService } from '../retrieval/retrieval.service';
import { RetrievalAnswer, RetrievalStatus } from '../retrieval/types';
import { EmbeddingError } from '../embedding/embedding.service';
import { GeminiService } from '../gemini/gemini.service';
import { AskDto } from './dto/ask.dto';
import { CHAT_SETTINGS } from './settings';
import { RenderedSource, RenderedTurn, renderSources, renderTranscript } from './render';

export interface AskResponse {
    sessionId: string;
    answer: string;
    status: RetrievalStatus;
    sources: RenderedSource[];
    retrievalError?: string;
}

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);

    constructor(
        private readonly chatMemoryService: ChatMemoryService,
        private readonly retrievalService: RetrievalService,
        private readonly geminiService: GeminiService,
    ) { }

    getSettings() {
        return {
            ...CHAT_SETTINGS,
            embeddingModel: this.geminiService.embedModel,
            chatModel: this.geminiService.chatModel,
        };
    }

    async ask(body: AskDto): Promise<AskResponse> {
        const question = String(body.question ?? '');
        if (!question.trim()) {
            throw new HttpException('Question is required', HttpStatus.BAD_REQUEST);
        }
        const session = this.chatMemoryService.ensureSession(body.sessionId);

        this.chatMemoryService.appendTurn(session.id, { role: 'user', content: question, sources: [] });

        let result: RetrievalAnswer;
        try {
            result = await this.retrievalService.ask(question, {
                topK: body.topK ?? CHAT_SETTINGS.topK.default,
                temperature: body.temperature ?? CHAT_SETTINGS.temperature.default,
                maxOutputTokens: body.maxTokens ?? CHAT_SETTINGS.maxTokens.default,
                model: body.model,
            });
        } catch (error) {
            if (error instanceof EmbeddingError) {
                throw new ServiceUnavailableException(error.message);
            }
            throw error;
        }

        this.chatMemoryService.appendTurn(session.id, {
            role: 'assistant',
            content: result.answer,
            sources: result.sources,
        });
        this.logger.log(`Session ${session.id}: ${result.status} with ${result.sources.length} source(s)`);

        return {
            sessionId: session.id,
            answer: result.answer,
            status: result.status,
            sources: renderSources(result.sources),
            ...(result.retrievalError ? { retrievalError: result.retrievalError } : {}),
        };
    }

    getMessages(sessionId: string): { sessionId: string; messages: RenderedTurn[] } {
        return {
            sessionId,
            messages: renderTranscript(this.chatMemoryService.getTurns(sessionId)),
        };
    }

    endSession(sessionId: string): { sessionId: string; ended: true } {
        if (!this.chatMemoryService.endSession(sessionId)) {
            throw new NotFoundException(`Session ${sessionId} not found`);
        }
        return { sessionId, ended: true };
    }

    clearMessages(sessionId: string): { sessionId: string; length: number } {
        this.chatMemoryService.clearSession(sessionId);
        return { sessionId, length: this.chatMemoryService.getTurns(sessionId).length };
    }
}

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { GeminiService } from './gemini.service';
import { GENAI_CLIENT } from './gemini.constants';

@Module({
    providers: [
        {
            provide: GENAI_CLIENT,
            useFactory: (configService: ConfigService) =>
                new GoogleGenAI({
                    apiKey: configService.getOrThrow<string>('GEMINI_API_KEY'),
                    httpOptions: { timeout: configService.get<number>('LLM_TIMEOUT_MS', 30000) },
                }),
            inject: [ConfigService],
        },
        GeminiService,
    ],
    exports: [GeminiService],
})
export class GeminiModule {}

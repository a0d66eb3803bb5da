import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { AnswerGeneratorService } from './answer-generator.service';

@Module({
    imports: [GeminiModule],
    providers: [AnswerGeneratorService],
    exports: [AnswerGeneratorService],
})
export class AnswerModule {}

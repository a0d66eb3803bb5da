import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { EmbeddingService } from './embedding.service';

@Module({
    imports: [GeminiModule],
    providers: [EmbeddingService],
    exports: [EmbeddingService],
})
export class EmbeddingModule {}

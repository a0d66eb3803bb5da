import { Module } from '@nestjs/common';
import { EmbeddingModule } from '../embedding/embedding.module';
import { DialoguesModule } from '../dialogues/dialogues.module';
import { AnswerModule } from '../answer/answer.module';
import { RetrievalService } from './retrieval.service';

@Module({
    imports: [EmbeddingModule, DialoguesModule, AnswerModule],
    providers: [RetrievalService],
    exports: [RetrievalService],
})
export class RetrievalModule {}

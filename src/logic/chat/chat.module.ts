import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { GeminiModule } from '../gemini/gemini.module';

@Module({
    imports: [
        ChatMemoryModule,
        RetrievalModule,
        GeminiModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}

import { Module } from '@nestjs/common';
import { ChatMemoryService } from './chat-memory.service';

@Module({
    exports: [ChatMemoryService],
    providers: [ChatMemoryService],
})
export class ChatMemoryModule {}

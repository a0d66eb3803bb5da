import { Body, Controller, Delete, Get, Param, Post } from '@nestjs/common';
import { ChatService } from './chat.service';
import { AskDto } from './dto/ask.dto';

@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Get('settings')
    getSettings() {
        return this.chatService.getSettings();
    }

    @Post()
    async chat(@Body() body: AskDto) {
        return this.chatService.ask(body);
    }

    @Get(':sessionId/messages')
    getMessages(@Param('sessionId') sessionId: string) {
        return this.chatService.getMessages(sessionId);
    }

    @Delete(':sessionId')
    endSession(@Param('sessionId') sessionId: string) {
        return this.chatService.endSession(sessionId);
    }

    @Delete(':sessionId/messages')
    clearMessages(@Param('sessionId') sessionId: string) {
        return this.chatService.clearMessages(sessionId);
    }
}

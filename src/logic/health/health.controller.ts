import { Controller, Get } from '@nestjs/common';
import { DialoguesService } from '../dialogues/dialogues.service';
import { GeminiService } from '../gemini/gemini.service';

@Controller('health')
export class HealthController {
    constructor(
        private readonly dialoguesService: DialoguesService,
        private readonly geminiService: GeminiService,
    ) {}

    @Get()
    async health() {
        return {
            status: 'ok',
            dialogueCount: await this.dialoguesService.count(),
            embeddingModel: this.geminiService.embedModel,
            chatModel: this.geminiService.chatModel,
        };
    }
}

import { Module } from '@nestjs/common';
import { DialoguesModule } from '../dialogues/dialogues.module';
import { GeminiModule } from '../gemini/gemini.module';
import { HealthController } from './health.controller';

@Module({
    imports: [DialoguesModule, GeminiModule],
    controllers: [HealthController],
})
export class HealthModule {}

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Dialogue } from '../../entities';
import { DialoguesService } from './dialogues.service';

@Module({
    imports: [TypeOrmModule.forFeature([Dialogue])],
    providers: [DialoguesService],
    exports: [DialoguesService],
})
export class DialoguesModule {}

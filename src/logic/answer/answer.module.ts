import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { AnswerService } from './answer.service';

@Module({
    imports: [GeminiModule],
    providers: [AnswerService],
    exports: [AnswerService],
})
export class AnswerModule {}

import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { FaqIndexService } from './faq-index.service';

@Module({
    imports: [GeminiModule],
    providers: [FaqIndexService],
    exports: [FaqIndexService],
})
export class FaqIndexModule {}

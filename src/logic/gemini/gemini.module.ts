import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';

// Needs ConfigService; ConfigModule is registered globally in AppModule.
@Module({
    providers: [GeminiService],
    exports: [GeminiService],
})
export class GeminiModule {}

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GeminiService } from '../gemini/gemini.service';
import { Retriever } from '../faq-index/vector-index';
import { AppEnv } from '../../utils/env';
import { answerSystemPrompt, buildAnswerUser } from './prompts';

@Injectable()
export class AnswerService {
    private readonly systemPrompt: string;

    constructor(
        private readonly geminiService: GeminiService,
        configService: ConfigService<AppEnv, true>,
    ) {
        this.systemPrompt = answerSystemPrompt(
            configService.get('ASSISTANT_NAME', { infer: true }),
            configService.get('COLLEGE_NAME', { infer: true }),
        );
    }

    /** Completion is returned as the model wrote it; errors propagate to the caller. */
    async run(retriever: Retriever, query: string): Promise<string> {
        const excerpts = await retriever.retrieve(query);
        return this.geminiService.complete(this.systemPrompt, buildAnswerUser(excerpts, query));
    }
}

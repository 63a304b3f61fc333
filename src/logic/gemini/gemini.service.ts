import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { AppEnv } from '../../utils/env';

// embedContent rejects requests carrying more than this many texts
const EMBED_BATCH_SIZE = 100;

@Injectable()
export class GeminiService {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI;
    private readonly EMBED_MODEL: string;
    private readonly CHAT_MODEL: string;
    private readonly TEMPERATURE: number;

    constructor(private readonly configService: ConfigService<AppEnv, true>) {
        this.genAI = new GoogleGenAI({ apiKey: this.configService.get('GEMINI_API_KEY', { infer: true }) });
        this.EMBED_MODEL = this.configService.get('GEMINI_EMBED_MODEL', { infer: true });
        this.CHAT_MODEL = this.configService.get('GEMINI_CHAT_MODEL', { infer: true });
        this.TEMPERATURE = this.configService.get('GEMINI_TEMPERATURE', { infer: true });
    }

    async embedTexts(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = [];
        for (let i = 0; i < texts.length; i += EMBED_BATCH_SIZE) {
            const batch = texts.slice(i, i + EMBED_BATCH_SIZE);
            try {
                const result = await this.genAI.models.embedContent({ contents: batch, model: this.EMBED_MODEL });
                const embeddings = (result.embeddings ?? [])
                    .map(item => item?.values)
                    .filter((values): values is number[] => Array.isArray(values));
                if (embeddings.length !== batch.length) {
                    throw new Error(`expected ${batch.length} embeddings, got ${embeddings.length}`);
                }
                vectors.push(...embeddings);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                this.logger.error(`Error generating embeddings: ${message}`);
                throw new Error(`Failed to generate embeddings: ${message}`);
            }
        }
        return vectors;
    }

    async complete(system: string, user: string, temperature = this.TEMPERATURE): Promise<string> {
        // Gemini doesn’t have a true 'system' role. Put it in a preamble (first user turn).
        const preamble = system?.trim() ? `${system.trim()}\n\n` : '';

        try {
            const result = await this.genAI.models.generateContent({
                model: this.CHAT_MODEL,
                config: { temperature },
                contents: [
                    ...(preamble ? [{ role: 'user', parts: [{ text: preamble }] }] : []),
                    { role: 'user', parts: [{ text: user }] }
                ]
            });

            return result.text ?? '';
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            this.logger.error(`complete error: ${message}`);
            throw new Error(`Failed to generate content: ${message}`);
        }
    }
}

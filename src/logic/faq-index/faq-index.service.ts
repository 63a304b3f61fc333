import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GeminiService } from '../gemini/gemini.service';
import { AppEnv, IndexRebuildPolicy } from '../../utils/env';
import { FaqSnapshot } from '../../utils/types';
import { Retriever, VectorIndex } from './vector-index';

@Injectable()
export class FaqIndexService {
    private readonly logger = new Logger(FaqIndexService.name);
    private cached: { key: string; index: Promise<VectorIndex> } | null = null;

    constructor(
        private readonly geminiService: GeminiService,
        private readonly configService: ConfigService<AppEnv, true>,
    ) { }

    async buildRetriever(snapshot: FaqSnapshot): Promise<Retriever> {
        const topK = this.configService.get('RETRIEVER_TOP_K', { infer: true });
        const index = await this.getIndex(snapshot);

        return {
            retrieve: async (query: string) => {
                if (index.size === 0) return [];
                const [vector] = await this.geminiService.embedTexts([query]);
                return index.search(vector, topK).map(hit => hit.text);
            },
        };
    }

    async buildIndex(documents: string[]): Promise<VectorIndex> {
        if (documents.length === 0) {
            return VectorIndex.fromEmbeddings([], []);
        }
        const started = Date.now();
        const embeddings = await this.geminiService.embedTexts(documents);
        this.logger.log(`Built FAQ index over ${documents.length} documents in ${Date.now() - started}ms`);
        return VectorIndex.fromEmbeddings(documents, embeddings);
    }

    private getIndex(snapshot: FaqSnapshot): Promise<VectorIndex> {
        if (this.configService.get('INDEX_REBUILD_POLICY', { infer: true }) === IndexRebuildPolicy.PER_REQUEST) {
            return this.buildIndex(snapshot.documents);
        }

        // a new snapshot from the FAQ cache always gets a new index
        const key = `${snapshot.fingerprint}:${snapshot.loadedAt}`;
        if (this.cached?.key === key) {
            return this.cached.index;
        }

        const index = this.buildIndex(snapshot.documents);
        this.cached = { key, index };
        void index.catch(() => {
            if (this.cached?.key === key) this.cached = null;
        });
        return index;
    }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'node:crypto';
import { AppEnv } from '../../utils/env';
import { FaqSnapshot } from '../../utils/types';
import { FaqFetchError } from './errors';
import { buildDocuments, readSheetRows, SheetRow } from './faq-sheet';

@Injectable()
export class FaqService {
    private readonly logger = new Logger(FaqService.name);
    private snapshot: FaqSnapshot | null = null;
    private inflight: Promise<FaqSnapshot> | null = null;
    // bumped by invalidate(); loads started under an older generation are not cached
    private generation = 0;

    constructor(private readonly configService: ConfigService<AppEnv, true>) { }

    /**
     * Returns the cached snapshot while it is younger than FAQ_CACHE_TTL_SECONDS,
     * otherwise downloads and parses the sheet again. Failed loads are not cached.
     */
    async loadDocuments(): Promise<FaqSnapshot> {
        const ttlMs = this.configService.get('FAQ_CACHE_TTL_SECONDS', { infer: true }) * 1000;
        if (this.snapshot && Date.now() - this.snapshot.loadedAt < ttlMs) {
            this.logger.debug(`FAQ cache hit (${this.snapshot.documents.length} documents)`);
            return this.snapshot;
        }
        if (this.inflight) {
            return this.inflight;
        }

        const generation = this.generation;
        const load: Promise<FaqSnapshot> = this.fetchSnapshot()
            .then(snapshot => {
                if (generation === this.generation) this.snapshot = snapshot;
                return snapshot;
            })
            .finally(() => {
                if (this.inflight === load) this.inflight = null;
            });
        this.inflight = load;
        return load;
    }

    /** Drops the cached snapshot and detaches any download already in flight. */
    invalidate() {
        this.generation += 1;
        this.snapshot = null;
        this.inflight = null;
    }

    private async fetchSnapshot(): Promise<FaqSnapshot> {
        const url = this.configService.get('FAQ_SHEET_URL', { infer: true });

        let rows: SheetRow[];
        try {
            const resp = await fetch(url);
            if (!resp.ok) {
                throw new Error(`spreadsheet export returned HTTP ${resp.status}`);
            }
            rows = readSheetRows(Buffer.from(await resp.arrayBuffer()));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(`Failed to load FAQ spreadsheet: ${message}`);
            throw new FaqFetchError(message);
        }

        const { documents, columns } = buildDocuments(rows);
        const fingerprint = createHash('sha256').update(documents.join('\u0000')).digest('hex');
        this.logger.log(`Loaded ${documents.length} FAQ documents from ${rows.length - 1} rows (columns: ${columns.all.join(', ')})`);

        return { documents, columns, loadedAt: Date.now(), fingerprint };
    }
}

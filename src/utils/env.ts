import { z } from 'zod';

export enum IndexRebuildPolicy {
    PER_SNAPSHOT = 'per-snapshot',
    PER_REQUEST = 'per-request',
}

const DEFAULT_FAQ_SHEET_URL = 'https://docs.google.com/spreadsheets/d/1DiTrHpBKZhk3HZcp0HIdFsO_gTQQ9D-V/export?format=xlsx';

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8787),
    CORS_ORIGIN: z.string().default('*'),

    GEMINI_API_KEY: z.string({ required_error: 'GEMINI_API_KEY is required' }).trim().min(1, 'GEMINI_API_KEY is required'),
    GEMINI_EMBED_MODEL: z.string().default('text-embedding-004'),
    GEMINI_CHAT_MODEL: z.string().default('gemini-2.5-flash-lite'),
    GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),

    FAQ_SHEET_URL: z.string().url().default(DEFAULT_FAQ_SHEET_URL),
    FAQ_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(600),
    RETRIEVER_TOP_K: z.coerce.number().int().positive().default(3),
    INDEX_REBUILD_POLICY: z.nativeEnum(IndexRebuildPolicy).default(IndexRebuildPolicy.PER_SNAPSHOT),

    COMPLAINTS_LOG_PATH: z.string().min(1).default('College_Complaints_Log.csv'),
    COMPLAINT_NOTICE_DELAY_MS: z.coerce.number().int().nonnegative().default(4000),

    SESSION_TIMEOUT_MINUTES: z.coerce.number().positive().default(10),
    SESSION_RETENTION_MINUTES: z.coerce.number().positive().default(24 * 60),

    ASSISTANT_NAME: z.string().default('Aadya'),
    COLLEGE_NAME: z.string().default('Ramarpit Group of College'),
});

export type AppEnv = z.infer<typeof envSchema>;

/** Used as `ConfigModule.forRoot({ validate })`; a missing API key stops the boot. */
export function validateEnv(config: Record<string, unknown>): AppEnv {
    const parsed = envSchema.safeParse(config);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
            .join('; ');
        throw new Error(`❌ Invalid environment configuration: ${issues}`);
    }
    return parsed.data;
}

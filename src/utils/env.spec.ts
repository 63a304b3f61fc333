import { IndexRebuildPolicy, validateEnv } from './env';

describe('validateEnv', () => {
  it('refuses to start without a Gemini API key', () => {
    expect(() => validateEnv({})).toThrow('GEMINI_API_KEY: GEMINI_API_KEY is required');
    expect(() => validateEnv({ GEMINI_API_KEY: '  ' })).toThrow('GEMINI_API_KEY is required');
  });

  it('applies defaults', () => {
    const env = validateEnv({ GEMINI_API_KEY: 'test-key' });

    expect(env).toMatchObject({
      PORT: 8787,
      FAQ_CACHE_TTL_SECONDS: 600,
      RETRIEVER_TOP_K: 3,
      INDEX_REBUILD_POLICY: IndexRebuildPolicy.PER_SNAPSHOT,
      COMPLAINTS_LOG_PATH: 'College_Complaints_Log.csv',
      SESSION_TIMEOUT_MINUTES: 10,
    });
  });

  it('coerces numeric strings from the environment', () => {
    const env = validateEnv({ GEMINI_API_KEY: 'test-key', FAQ_CACHE_TTL_SECONDS: '120', GEMINI_TEMPERATURE: '0.5' });

    expect(env.FAQ_CACHE_TTL_SECONDS).toBe(120);
    expect(env.GEMINI_TEMPERATURE).toBe(0.5);
  });

  it('rejects an unknown index policy', () => {
    expect(() => validateEnv({ GEMINI_API_KEY: 'test-key', INDEX_REBUILD_POLICY: 'never' })).toThrow('INDEX_REBUILD_POLICY');
  });
});

import { describe, expect, it } from '@jest/globals';
import { validateEnv } from './env.validation.js';

describe('validateEnv', () => {
  it('applies defaults in the test environment', () => {
    const env = validateEnv({ NODE_ENV: 'test' });

    expect(env.PORT).toBe(3000);
    expect(env.OPENAI_EMBEDDING_MODEL).toBe('text-embedding-3-small');
    expect(env.OPENAI_TRANSCRIPTION_MODEL).toBe('whisper-1');
    expect(env.CHUNK_SIZE).toBe(800);
    expect(env.CHUNK_OVERLAP).toBe(200);
    expect(env.SEARCH_TOP_K).toBe(5);
    expect(env.MAX_TOOL_ROUNDS).toBe(5);
    expect(env.DATABASE_SSL).toBeUndefined();
  });

  it('coerces numeric and boolean strings', () => {
    const env = validateEnv({
      NODE_ENV: 'test',
      PORT: '8080',
      MAX_TOOL_ROUNDS: '3',
      DATABASE_SSL: 'Yes',
    });

    expect(env.PORT).toBe(8080);
    expect(env.MAX_TOOL_ROUNDS).toBe(3);
    expect(env.DATABASE_SSL).toBe(true);
  });

  it('requires an OpenAI key outside of tests', () => {
    expect(() => validateEnv({ NODE_ENV: 'production' })).toThrow(
      'Configuration validation failed - OPENAI_API_KEY: OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
    );
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() =>
      validateEnv({
        NODE_ENV: 'test',
        CHUNK_SIZE: '400',
        CHUNK_OVERLAP: '400',
      }),
    ).toThrow(
      'Configuration validation failed - CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    );
  });

  it('rejects an unknown time zone', () => {
    expect(() =>
      validateEnv({ NODE_ENV: 'test', TIMEZONE: 'Mars/Olympus_Mons' }),
    ).toThrow(
      'Configuration validation failed - TIMEZONE: TIMEZONE must be an IANA time zone',
    );
  });
});

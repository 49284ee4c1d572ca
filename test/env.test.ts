import { describe, it, expect } from 'vitest';
import { parseEnv } from '../src/lib/env';

describe('parseEnv', () => {
  it('fills defaults for an empty environment', () => {
    const config = parseEnv({});
    expect(config.RAGME_COLLECTION).toBe('RagMeDocs');
    expect(config.CHROMA_HOST).toBe('localhost');
    expect(config.CHROMA_PORT).toBe(8000);
    expect(config.CHROMA_SSL).toBe(false);
    expect(config.READER_HTML_TO_TEXT).toBe(true);
    expect(config.DUPLICATE_POLICY).toBe('append');
    expect(config.BATCH_SIZE).toBe(100);
    expect(config.LLM_PROVIDER).toBe('openai');
    expect(config.OPENAI_MODEL).toBe('gpt-4o-mini');
    expect(config.PORT).toBe(4000);
  });

  it('coerces numbers and flags', () => {
    const config = parseEnv({
      CHROMA_PORT: '443',
      CHROMA_SSL: '1',
      READER_HTML_TO_TEXT: 'false',
      BATCH_SIZE: '25',
      DUPLICATE_POLICY: 'replace',
    });
    expect(config.CHROMA_PORT).toBe(443);
    expect(config.CHROMA_SSL).toBe(true);
    expect(config.READER_HTML_TO_TEXT).toBe(false);
    expect(config.BATCH_SIZE).toBe(25);
    expect(config.DUPLICATE_POLICY).toBe('replace');
  });

  it('rejects unknown providers and policies', () => {
    expect(() => parseEnv({ LLM_PROVIDER: 'mystery' })).toThrow();
    expect(() => parseEnv({ DUPLICATE_POLICY: 'merge' })).toThrow();
    expect(() => parseEnv({ BATCH_SIZE: '0' })).toThrow();
  });
});

import { describe, it, expect } from 'vitest';
import { isOracleConfigured, loadConfig } from '../config.js';
import { getAllowedOrigins } from '../middleware/cors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      PORT: 3003,
      MAX_UPLOAD_MB: 5,
      OPENAI_INTENT_MODEL: 'gpt-4o-mini',
      INTENT_TIMEOUT_MS: 15000,
      INTENT_CLASSIFIER: 'auto',
    });
  });

  it('coerces numbers and treats blank entries as unset', () => {
    const config = loadConfig({ PORT: '8080', OPENAI_API_KEY: '  ', INTENT_TIMEOUT_MS: '2000' });
    expect(config.PORT).toBe(8080);
    expect(config.INTENT_TIMEOUT_MS).toBe(2000);
    expect(config.OPENAI_API_KEY).toBeUndefined();
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT/);
    expect(() => loadConfig({ MAX_UPLOAD_MB: '50' })).toThrow(/MAX_UPLOAD_MB/);
    expect(() => loadConfig({ INTENT_CLASSIFIER: 'magic' })).toThrow(/INTENT_CLASSIFIER/);
  });
});

describe('isOracleConfigured', () => {
  it('needs a key and auto classification', () => {
    expect(isOracleConfigured(loadConfig({ OPENAI_API_KEY: 'test-secret' }))).toBe(true);
    expect(isOracleConfigured(loadConfig({}))).toBe(false);
    expect(isOracleConfigured(loadConfig({ OPENAI_API_KEY: 'test-secret', INTENT_CLASSIFIER: 'keyword' }))).toBe(false);
  });
});

describe('getAllowedOrigins', () => {
  it('adds the frontend URL to the local origins', () => {
    expect(getAllowedOrigins('https://insights.example.com')).toContain('https://insights.example.com');
    expect(getAllowedOrigins(undefined)).toContain('http://localhost:5173');
  });
});

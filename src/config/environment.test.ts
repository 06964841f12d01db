import { describe, it, expect, beforeEach, vi } from 'vitest';
import { getEnvironmentConfig, resetEnvironmentConfig } from './environment';

describe('getEnvironmentConfig', () => {
  beforeEach(() => {
    resetEnvironmentConfig();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('applies defaults in development', () => {
    const config = getEnvironmentConfig({});

    expect(config.env).toBe('development');
    expect(config.isDevelopment).toBe(true);
    expect(config.database.url).toBeUndefined();
    expect(config.analysis.model).toBe('gpt-4o-mini');
    expect(config.analysis.timeoutMs).toBe(60000);
    expect(config.phraseMatching.snippetMaxChars).toBe(200);
    expect(config.pipeline.batchConcurrency).toBe(5);
    expect(config.pipeline.artifactRoot).toBe('./data');
  });

  it('coerces numeric settings from strings', () => {
    const config = getEnvironmentConfig({
      ANALYSIS_TIMEOUT_MS: '1500',
      SNIPPET_MAX_CHARS: '80',
      BATCH_CONCURRENCY: '2',
    });

    expect(config.analysis.timeoutMs).toBe(1500);
    expect(config.phraseMatching.snippetMaxChars).toBe(80);
    expect(config.pipeline.batchConcurrency).toBe(2);
  });

  it('requires database and provider credentials in production', () => {
    expect(() => getEnvironmentConfig({ APP_ENV: 'production' })).toThrow(
      /Environment configuration invalid: .*DATABASE_URL/,
    );
  });

  it('accepts a complete production configuration', () => {
    const config = getEnvironmentConfig({
      APP_ENV: 'production',
      DATABASE_URL: 'postgres://localhost:5432/pipeline',
      OPENAI_API_KEY: 'test-key',
    });

    expect(config.isProduction).toBe(true);
    expect(config.analysis.apiKey).toBe('test-key');
  });

  it('caches the first successful load until reset', () => {
    const first = getEnvironmentConfig({ ANALYSIS_MODEL: 'model-a' });
    const second = getEnvironmentConfig({ ANALYSIS_MODEL: 'model-b' });

    expect(second).toBe(first);
    expect(second.analysis.model).toBe('model-a');

    resetEnvironmentConfig();
    expect(getEnvironmentConfig({ ANALYSIS_MODEL: 'model-b' }).analysis.model).toBe('model-b');
  });
});

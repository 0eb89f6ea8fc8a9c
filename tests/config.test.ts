import { describe, it, expect } from 'vitest';
import { DEFAULT_GEMINI_BASE_URL, loadConfig } from '../src/config/env';
import { ConfigError } from '../src/types';

describe('loadConfig', () => {
  it('builds defaults around the API key', () => {
    const config = loadConfig({ GEMINI_API_KEY: 'test-secret' });

    expect(config).toEqual({
      model: {
        apiKey: 'test-secret',
        model: 'gemini-1.5-flash',
        baseURL: DEFAULT_GEMINI_BASE_URL,
        temperature: 0.4,
        maxTokens: 2048,
        timeoutMs: 30000,
        retry: { retries: 0, backoff: 'exponential', baseDelayMs: 1000 }
      },
      language: 'python',
      concurrency: 1,
      logLevel: 'info'
    });
  });

  it('fails with ConfigError when the credential is absent', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ GEMINI_API_KEY: '   ' })).toThrow(/GEMINI_API_KEY not found/);
  });

  it('reads the credential from a configurable variable name', () => {
    const config = loadConfig({ API_KEY_ENV: 'REVIEW_API_KEY', REVIEW_API_KEY: 'test-secret' });
    expect(config.model.apiKey).toBe('test-secret');

    expect(() => loadConfig({ API_KEY_ENV: 'REVIEW_API_KEY', GEMINI_API_KEY: 'test-secret' }))
      .toThrow(/REVIEW_API_KEY not found/);
  });

  it('reads tuning values from the environment', () => {
    const config = loadConfig({
      GEMINI_API_KEY: 'test-secret',
      PRIMARY_GEMINI_MODEL: 'gemini-1.5-pro',
      REVIEW_TIMEOUT_MS: '5000',
      REVIEW_RETRIES: '2',
      REVIEW_BACKOFF: 'fixed',
      REVIEW_CONCURRENCY: '3',
      REVIEW_LANGUAGE: 'typescript'
    });

    expect(config.model.model).toBe('gemini-1.5-pro');
    expect(config.model.timeoutMs).toBe(5000);
    expect(config.model.retry).toEqual({ retries: 2, backoff: 'fixed', baseDelayMs: 1000 });
    expect(config.concurrency).toBe(3);
    expect(config.language).toBe('typescript');
  });

  it('lets command-line overrides win over the environment', () => {
    const config = loadConfig(
      { GEMINI_API_KEY: 'test-secret', REVIEW_RETRIES: '2', PRIMARY_GEMINI_MODEL: 'gemini-1.5-pro' },
      { retries: 5, model: 'gemini-2.0-flash', backoff: 'fixed', timeoutMs: 100 }
    );

    expect(config.model.retry.retries).toBe(5);
    expect(config.model.retry.backoff).toBe('fixed');
    expect(config.model.model).toBe('gemini-2.0-flash');
    expect(config.model.timeoutMs).toBe(100);
  });

  it('rejects out-of-range settings', () => {
    expect(() => loadConfig({ GEMINI_API_KEY: 'test-secret', REVIEW_RETRIES: '-1' })).toThrow(ConfigError);
    expect(() => loadConfig({ GEMINI_API_KEY: 'test-secret', REVIEW_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
    expect(() => loadConfig({ GEMINI_API_KEY: 'test-secret' }, { backoff: 'linear' })).toThrow(/Invalid command-line options/);
  });
});

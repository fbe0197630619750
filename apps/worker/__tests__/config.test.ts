import { describe, expect, it } from 'vitest';

import { DEFAULT_KEYWORDS, getServerEnv } from '@dealwatch/shared';

import { buildDealAlertsConfig } from '../src/config.js';

describe('buildDealAlertsConfig', () => {
  it('applies defaults and normalizes the base url', () => {
    const cfg = buildDealAlertsConfig(getServerEnv({ WOOT_API_KEY: 'test-key', WOOT_API_BASE_URL: 'https://woot.test/' }));

    expect(cfg.woot).toEqual({ apiKey: 'test-key', baseUrl: 'https://woot.test', category: 'Electronics', maxPages: 20 });
    expect(cfg.detail).toEqual({
      batchSize: 20,
      batchDelayMs: 1000,
      maxAttempts: 5,
      initialBackoffMs: 2000,
      maxBackoffMs: 60_000,
      jitterMs: 500,
    });
    expect(cfg.keywords).toEqual(DEFAULT_KEYWORDS);
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.detail)).toBe(true);
  });

  it('reads a comma-separated keyword list and lets callers override it', () => {
    const env = getServerEnv({ WOOT_API_KEY: 'test-key', DEAL_KEYWORDS: ' kindle, kobo,,kindle ' });
    expect(buildDealAlertsConfig(env).keywords).toEqual(['kindle', 'kobo']);
    expect(buildDealAlertsConfig(env, { keywords: ['nook'] }).keywords).toEqual(['nook']);
  });

  it('never lets the backoff cap fall below the initial delay', () => {
    const env = getServerEnv({ WOOT_API_KEY: 'test-key', DETAIL_INITIAL_BACKOFF_MS: '5000', DETAIL_MAX_BACKOFF_MS: '1000' });
    expect(buildDealAlertsConfig(env).detail.maxBackoffMs).toBe(5000);
  });

  it('requires an api key', () => {
    expect(() => buildDealAlertsConfig(getServerEnv({}))).toThrow('Missing Woot API env vars. Set WOOT_API_KEY.');
  });
});

describe('getServerEnv', () => {
  it('treats blank values as unset', () => {
    const env = getServerEnv({ DETAIL_BATCH_SIZE: '', WOOT_API_KEY: '  ' });
    expect(env.DETAIL_BATCH_SIZE).toBe(20);
    expect(env.WOOT_API_KEY).toBeUndefined();
  });

  it('rejects a batch size above the upstream cap', () => {
    expect(() => getServerEnv({ DETAIL_BATCH_SIZE: '30' })).toThrow(/DETAIL_BATCH_SIZE/);
  });
});

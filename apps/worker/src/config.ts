import { parseCsv, type ServerEnv } from '@dealwatch/shared';

export type WootConfig = {
  apiKey: string;
  baseUrl: string;
  category: string;
  maxPages: number;
};

export type RetryPolicy = {
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  jitterMs: number;
};

export type DetailConfig = RetryPolicy & {
  batchSize: number;
  batchDelayMs: number;
};

export type DealAlertsConfig = Readonly<{
  woot: Readonly<WootConfig>;
  detail: Readonly<DetailConfig>;
  keywords: readonly string[];
}>;

export function buildDealAlertsConfig(env: ServerEnv, overrides: { keywords?: string[] } = {}): DealAlertsConfig {
  const apiKey = env.WOOT_API_KEY ?? '';
  if (!apiKey) {
    throw new Error('Missing Woot API env vars. Set WOOT_API_KEY.');
  }
  const keywords = overrides.keywords?.length ? overrides.keywords : parseCsv(env.DEAL_KEYWORDS);
  if (!keywords.length) throw new Error('No deal keywords configured. Set DEAL_KEYWORDS.');

  return Object.freeze({
    woot: Object.freeze({
      apiKey,
      baseUrl: env.WOOT_API_BASE_URL.replace(/\/+$/, ''),
      category: env.WOOT_FEED_CATEGORY,
      maxPages: env.FEED_MAX_PAGES,
    }),
    detail: Object.freeze({
      batchSize: env.DETAIL_BATCH_SIZE,
      batchDelayMs: env.DETAIL_BATCH_DELAY_MS,
      maxAttempts: env.DETAIL_MAX_ATTEMPTS,
      initialBackoffMs: env.DETAIL_INITIAL_BACKOFF_MS,
      maxBackoffMs: Math.max(env.DETAIL_MAX_BACKOFF_MS, env.DETAIL_INITIAL_BACKOFF_MS),
      jitterMs: env.DETAIL_JITTER_MS,
    }),
    keywords: Object.freeze([...keywords]),
  });
}

import type { OfferRecord } from '@dealwatch/shared';

import { jitter, type Clock } from '../clock.js';
import type { DetailConfig, RetryPolicy, WootConfig } from '../config.js';
import type { Logger } from '../log.js';
import { wootRequest, type FetchLike, type WootFailure } from './client.js';
import { asRecord, normalizeOffer } from './normalize.js';

export type BatchAttempt = { ok: true; records: OfferRecord[] } | { ok: false; failure: WootFailure };

// `attempt` counts failed requests so far.
export type BatchState =
  | { kind: 'attempting'; attempt: number; delayMs: number }
  | { kind: 'success'; attempt: number; records: OfferRecord[] }
  | { kind: 'exhausted'; attempt: number; lastFailure: WootFailure };

export type BatchStep = { state: BatchState; backoffMs: number };

export function initialBatchState(policy: RetryPolicy): BatchState {
  return { kind: 'attempting', attempt: 0, delayMs: policy.initialBackoffMs };
}

/**
 * Pure transition for one batch. On failure below the attempt ceiling the
 * caller sleeps `backoffMs` (plus jitter) and retries the same batch; the next
 * delay doubles up to `maxBackoffMs`.
 */
export function nextBatchState(
  state: Extract<BatchState, { kind: 'attempting' }>,
  result: BatchAttempt,
  policy: RetryPolicy,
): BatchStep {
  if (result.ok) {
    return { state: { kind: 'success', attempt: state.attempt, records: result.records }, backoffMs: 0 };
  }
  const attempt = state.attempt + 1;
  if (attempt >= policy.maxAttempts) {
    return { state: { kind: 'exhausted', attempt, lastFailure: result.failure }, backoffMs: 0 };
  }
  return {
    state: { kind: 'attempting', attempt, delayMs: Math.min(state.delayMs * 2, policy.maxBackoffMs) },
    backoffMs: state.delayMs,
  };
}

export function chunk<T>(list: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < list.length; i += size) out.push(list.slice(i, i + size));
  return out;
}

/** getoffers replies with a bare list; some deployments wrap it in `{ Offers }`. */
export function parseDetailBody(body: unknown): unknown[] | null {
  if (Array.isArray(body)) return body;
  const obj = asRecord(body);
  if (!obj) return null;
  const list = obj.Offers ?? obj.offers;
  return Array.isArray(list) ? list : null;
}

async function attemptBatch(ids: readonly string[], cfg: WootConfig, fetchImpl: FetchLike): Promise<BatchAttempt> {
  const res = await wootRequest(cfg, fetchImpl, { method: 'POST', path: '/getoffers', body: ids });
  if (!res.ok) return res;
  const list = parseDetailBody(res.body);
  if (!list) {
    return { ok: false, failure: { kind: 'parse_error', status: res.status, message: 'getoffers_unexpected_body' } };
  }
  const records = list.map(normalizeOffer).filter((o): o is OfferRecord => o != null);
  return { ok: true, records };
}

export type DetailDeps = { fetchImpl: FetchLike; clock: Clock; logger: Logger };

export async function fetchBatch(
  ids: readonly string[],
  cfg: { woot: WootConfig; detail: DetailConfig },
  deps: DetailDeps,
): Promise<Exclude<BatchState, { kind: 'attempting' }>> {
  let state = initialBatchState(cfg.detail);
  while (state.kind === 'attempting') {
    const result = await attemptBatch(ids, cfg.woot, deps.fetchImpl);
    const step = nextBatchState(state, result, cfg.detail);
    if (step.state.kind === 'attempting' && !result.ok) {
      const sleepMs = step.backoffMs + jitter(deps.clock, cfg.detail.jitterMs);
      deps.logger.warn('detail_batch_retry', {
        size: ids.length,
        attempt: step.state.attempt,
        kind: result.failure.kind,
        status: result.failure.status,
        sleepMs,
      });
      await deps.clock.sleep(sleepMs);
    }
    state = step.state;
  }
  return state;
}

export type DetailFetchResult = {
  records: OfferRecord[];
  abandonedIds: string[];
  batches: number;
};

/**
 * Enrich candidate ids through getoffers, one batch at a time. Batches are
 * spaced by `batchDelayMs` plus jitter. A batch that exhausts its attempts is
 * skipped; its ids come back in `abandonedIds`. Records repeating an id
 * already returned are dropped.
 */
export async function fetchDetails(
  ids: readonly string[],
  cfg: { woot: WootConfig; detail: DetailConfig },
  deps: DetailDeps,
): Promise<DetailFetchResult> {
  const batches = chunk(ids, Math.max(1, cfg.detail.batchSize));
  const records: OfferRecord[] = [];
  const byId = new Set<string>();
  const abandonedIds: string[] = [];

  for (const [i, batch] of batches.entries()) {
    if (i > 0) await deps.clock.sleep(cfg.detail.batchDelayMs + jitter(deps.clock, cfg.detail.jitterMs));

    const done = await fetchBatch(batch, cfg, deps);
    if (done.kind === 'success') {
      for (const record of done.records) {
        if (byId.has(record.id)) continue;
        byId.add(record.id);
        records.push(record);
      }
      continue;
    }
    abandonedIds.push(...batch);
    deps.logger.error('detail_batch_abandoned', {
      batch: i + 1,
      of: batches.length,
      size: batch.length,
      attempts: done.attempt,
      kind: done.lastFailure.kind,
      status: done.lastFailure.status,
      message: done.lastFailure.message,
    });
  }

  deps.logger.info('details_fetched', { requested: ids.length, records: records.length, abandoned: abandonedIds.length });
  return { records, abandonedIds, batches: batches.length };
}

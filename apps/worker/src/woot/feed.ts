import type { OfferRecord } from '@dealwatch/shared';

import type { WootConfig } from '../config.js';
import type { Logger } from '../log.js';
import { wootRequest, type FetchLike } from './client.js';
import { asRecord, normalizeOffer } from './normalize.js';

export type FeedPage = { items: unknown[]; totalPages: number | null };

function positiveInt(v: unknown): number | null {
  const n = typeof v === 'string' ? Number(v) : v;
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : null;
}

/** A feed page is either a bare list or `{ Items, TotalPages }` (any casing). */
export function parseFeedPage(body: unknown): FeedPage | null {
  if (Array.isArray(body)) return { items: body, totalPages: null };
  const obj = asRecord(body);
  if (!obj) return null;

  const items = [obj.Items, obj.items, obj.Offers, obj.offers].find((v): v is unknown[] => Array.isArray(v));
  if (!items) return null;
  const totalPages = [obj.TotalPages, obj.totalPages, obj.PageCount, obj.pageCount]
    .map(positiveInt)
    .find((n): n is number => n != null);
  return { items, totalPages: totalPages ?? null };
}

/**
 * Fetch every page of the offer feed. Page count comes from the responses;
 * a failed page ends the walk and whatever was accumulated is returned
 * (a failure on page 1 yields []). Never throws.
 */
export async function fetchFeed(cfg: WootConfig, deps: { fetchImpl: FetchLike; logger: Logger }): Promise<OfferRecord[]> {
  const log = deps.logger;
  const path = `/feed/${encodeURIComponent(cfg.category)}`;
  const byId = new Map<string, OfferRecord>();
  let dropped = 0;
  let totalPages = 1;

  for (let page = 1; page <= Math.min(totalPages, cfg.maxPages); page += 1) {
    const res = await wootRequest(cfg, deps.fetchImpl, { method: 'GET', path, query: { page } });
    if (!res.ok) {
      log.warn('feed_page_failed', { page, kind: res.failure.kind, status: res.failure.status, message: res.failure.message });
      break;
    }
    const parsed = parseFeedPage(res.body);
    if (!parsed) {
      log.warn('feed_page_unrecognized', { page });
      break;
    }
    if (parsed.totalPages != null) totalPages = parsed.totalPages;

    for (const item of parsed.items) {
      const offer = normalizeOffer(item);
      if (!offer) {
        dropped += 1;
        continue;
      }
      if (!byId.has(offer.id)) byId.set(offer.id, offer);
    }
    log.debug('feed_page', { page, totalPages, items: parsed.items.length });
  }

  if (totalPages > cfg.maxPages) log.warn('feed_page_cap_reached', { totalPages, maxPages: cfg.maxPages });
  const offers = Array.from(byId.values());
  log.info('feed_fetched', { offers: offers.length, droppedWithoutId: dropped });
  return offers;
}

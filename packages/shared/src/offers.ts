// Offer domain types shared by the worker and the trigger API.
// Keep these free of runtime dependencies.

export type Price = { kind: 'scalar'; amount: number } | { kind: 'tiered'; amounts: number[] };

export type OfferRecord = {
  id: string;
  title: string;
  description: string;
  features: string;
  subtitle: string;
  snippet: string;
  salePrice: Price | null;
  listPrice: Price | null;
  url: string | null;
  // Upstream object with both identifier fields mirrored to `id`.
  raw: Record<string, unknown>;
};

export type DealAlertsStatus =
  | 'no_feed'
  | 'no_matches'
  | 'notified'
  | 'notify_failed'
  | 'commit_failed'
  | 'error';

export type DealAlertsStats = {
  seenBefore: number;
  feedItems: number;
  candidates: number;
  enriched: number;
  abandoned: number;
  matches: number;
  committed: number;
};

export interface DealAlertsOutcome {
  ok: boolean;
  status: DealAlertsStatus;
  summary: string;
  stats: DealAlertsStats;
}

/** Lowest tier for tiered prices. */
export function representativePrice(price: Price | null): number | null {
  if (!price) return null;
  if (price.kind === 'scalar') return price.amount;
  return price.amounts.length ? Math.min(...price.amounts) : null;
}

export function savingsOf(offer: Pick<OfferRecord, 'salePrice' | 'listPrice'>): number | null {
  const sale = representativePrice(offer.salePrice);
  const list = representativePrice(offer.listPrice);
  if (sale == null || list == null || sale >= list) return null;
  return Math.round((list - sale) * 100) / 100;
}

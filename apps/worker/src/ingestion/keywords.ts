import type { OfferRecord } from '@dealwatch/shared';

import { textOf } from '../woot/normalize.js';

/**
 * Upstream text fields scanned for keywords, in order. Each is read under its
 * PascalCase and camelCase name. Prefilter and match filter share this list,
 * so anything the match filter can hit the prefilter can hit too.
 */
export const KEYWORD_FIELDS = [
  'Title',
  'Description',
  'Subtitle',
  'Snippet',
  'Summary',
  'Name',
  'ProductName',
  'WriteUpBody',
  'WriteUpIntro',
  'Features',
] as const;

function camelCase(field: string): string {
  return field.charAt(0).toLowerCase() + field.slice(1);
}

export function normalizeKeywords(keywords: readonly string[]): string[] {
  return Array.from(new Set(keywords.map((k) => k.trim().toLowerCase()).filter(Boolean)));
}

function* haystacks(record: OfferRecord): Generator<[field: string, text: string]> {
  yield ['title', record.title];
  yield ['subtitle', record.subtitle];
  yield ['snippet', record.snippet];
  yield ['description', record.description];
  yield ['features', record.features];
  for (const field of KEYWORD_FIELDS) {
    yield [field, textOf(record.raw[field])];
    const camel = camelCase(field);
    yield [camel, textOf(record.raw[camel])];
  }
}

export type KeywordHit = { field: string; keyword: string };

/** Case-insensitive substring scan; stops at the first field/keyword hit. */
export function findKeywordHit(record: OfferRecord, normalizedKeywords: readonly string[]): KeywordHit | null {
  if (!normalizedKeywords.length) return null;
  for (const [field, text] of haystacks(record)) {
    if (!text) continue;
    const lower = text.toLowerCase();
    const keyword = normalizedKeywords.find((k) => lower.includes(k));
    if (keyword) return { field, keyword };
  }
  return null;
}

/** Cheap recall-biased check over feed summaries, run before any detail request. */
export function prefilterMatches(record: OfferRecord, keywords: readonly string[]): boolean {
  return findKeywordHit(record, normalizeKeywords(keywords)) != null;
}

/**
 * Authoritative match decision over enriched records: drops id-less,
 * already-seen and repeated records, keeps keyword hits in input order
 * (first occurrence of an id wins).
 */
export function filterMatches(
  records: readonly OfferRecord[],
  seen: ReadonlySet<string>,
  keywords: readonly string[],
): OfferRecord[] {
  const normalized = normalizeKeywords(keywords);
  const accepted = new Set<string>();
  return records.filter((r) => {
    if (!r.id || seen.has(r.id) || accepted.has(r.id)) return false;
    if (findKeywordHit(r, normalized) == null) return false;
    accepted.add(r.id);
    return true;
  });
}

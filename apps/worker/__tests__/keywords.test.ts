import { describe, expect, it } from 'vitest';

import type { OfferRecord } from '@dealwatch/shared';

import { filterMatches, findKeywordHit, KEYWORD_FIELDS, normalizeKeywords, prefilterMatches } from '../src/ingestion/keywords.js';
import { normalizeOffer } from '../src/woot/normalize.js';
import { offer } from './helpers.js';

const keywords = ['kindle', 'e-reader', 'Kobo'];

describe('prefilterMatches', () => {
  it('matches a title keyword regardless of case', () => {
    const o = offer('k1', { title: 'Kindle Paperwhite 8GB' });
    expect(prefilterMatches(o, ['kindle'])).toBe(true);
    expect(filterMatches([o], new Set(), ['kindle'])).toEqual([o]);
  });

  it('matches substrings, not whole words', () => {
    expect(prefilterMatches(offer('a', { snippet: 'Two e-readers for one price' }), keywords)).toBe(true);
  });

  it('scans raw upstream fields under both casings', () => {
    const pascal = normalizeOffer({ Id: 'p', ProductName: 'KOBO Libra 2' });
    const camel = normalizeOffer({ Id: 'c', summary: 'refurbished kindle' });
    expect(pascal && findKeywordHit(pascal, normalizeKeywords(keywords))).toEqual({ field: 'ProductName', keyword: 'kobo' });
    expect(camel && findKeywordHit(camel, normalizeKeywords(keywords))).toEqual({ field: 'summary', keyword: 'kindle' });
  });

  it('rejects records without any keyword', () => {
    expect(prefilterMatches(offer('n', { title: 'Bluetooth speaker', features: 'Loud' }), keywords)).toBe(false);
  });

  it('never matches on an empty keyword list', () => {
    expect(prefilterMatches(offer('k', { title: 'Kindle' }), ['  ', ''])).toBe(false);
  });
});

describe('filterMatches', () => {
  it('drops seen and id-less records and keeps input order', () => {
    const a = offer('a', { title: 'Kobo Clara' });
    const b = offer('b', { title: 'Kindle Scribe' });
    const c = offer('c', { title: 'Speaker' });
    const d = offer('d', { features: 'Works like an e-reader' });
    const noId = offer('', { title: 'Kindle' });

    expect(filterMatches([d, a, b, c, noId], new Set(['b']), keywords)).toEqual([d, a]);
  });

  it('keeps only the first record of a repeated id', () => {
    const first = offer('k1', { title: 'Kindle Basic' });
    const repeat = offer('k1', { title: 'Kindle Basic (again)' });
    const other = offer('k2', { title: 'Kobo Nia' });

    expect(filterMatches([first, other, repeat], new Set(), keywords)).toEqual([first, other]);
  });

  it('sees detail-only fields the feed summary lacked', () => {
    const feedEntry = normalizeOffer({ OfferId: 'x', Title: 'Mystery bundle' });
    const detail = normalizeOffer({ Id: 'x', Title: 'Mystery bundle', WriteUpBody: 'Includes a Kindle Oasis' });
    expect(feedEntry && prefilterMatches(feedEntry, keywords)).toBe(false);
    expect(filterMatches(detail ? [detail] : [], new Set(), keywords).map((o) => o.id)).toEqual(['x']);
  });

  it('never selects a record the prefilter would reject given the same fields', () => {
    const records = KEYWORD_FIELDS.flatMap((field, i) => [
      normalizeOffer({ Id: `p${i}`, [field]: 'has kindle inside' }),
      normalizeOffer({ Id: `c${i}`, [field.charAt(0).toLowerCase() + field.slice(1)]: 'a KOBO reader' }),
      normalizeOffer({ Id: `n${i}`, [field]: 'nothing relevant' }),
    ]).filter((o): o is OfferRecord => o != null);

    const matched = filterMatches(records, new Set(), keywords);
    expect(matched).toHaveLength(KEYWORD_FIELDS.length * 2);
    for (const m of matched) expect(prefilterMatches(m, keywords)).toBe(true);
  });
});

import type { OfferRecord, Price } from '@dealwatch/shared';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function asRecord(v: unknown): Record<string, unknown> | null {
  return isRecord(v) ? v : null;
}

function firstDefined(obj: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const k of keys) {
    const v = obj[k];
    if (v !== undefined && v !== null) return v;
  }
  return undefined;
}

export function textOf(v: unknown): string {
  if (typeof v === 'string') return v;
  if (Array.isArray(v)) return v.filter((x): x is string => typeof x === 'string').join('\n');
  return '';
}

function firstText(obj: Record<string, unknown>, keys: readonly string[]): string {
  for (const k of keys) {
    const t = textOf(obj[k]).trim();
    if (t) return t;
  }
  return '';
}

function idOf(v: unknown): string | null {
  if (typeof v === 'string') return v.trim() || null;
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return null;
}

// OfferId comes from the feed, Id from getoffers; they name the same offer.
const ID_KEYS = ['OfferId', 'Id', 'offerId', 'id'] as const;

export function offerIdOf(raw: unknown): string | null {
  const obj = asRecord(raw);
  if (!obj) return null;
  for (const k of ID_KEYS) {
    const id = idOf(obj[k]);
    if (id) return id;
  }
  return null;
}

function parseAmount(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string') {
    const cleaned = v.replace(/[$,\s]/g, '');
    if (!cleaned) return null;
    const n = Number(cleaned);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function amountsOf(price: Price | null): number[] {
  if (!price) return [];
  return price.kind === 'scalar' ? [price.amount] : price.amounts;
}

/**
 * Resolve any upstream price shape into the tagged variant:
 * scalars and numeric strings become `scalar`; arrays and `{ Minimum, Maximum }`
 * ranges become `tiered`.
 */
export function parsePrice(v: unknown): Price | null {
  const scalar = parseAmount(v);
  if (scalar != null) return { kind: 'scalar', amount: scalar };

  if (Array.isArray(v)) {
    const amounts = v.flatMap((x) => amountsOf(parsePrice(x)));
    return amounts.length ? { kind: 'tiered', amounts } : null;
  }

  const obj = asRecord(v);
  if (!obj) return null;
  const amount = parseAmount(firstDefined(obj, ['Amount', 'amount', 'Value', 'value']));
  if (amount != null) return { kind: 'scalar', amount };
  const range = [firstDefined(obj, ['Minimum', 'minimum', 'Min', 'min']), firstDefined(obj, ['Maximum', 'maximum', 'Max', 'max'])]
    .map(parseAmount)
    .filter((n): n is number => n != null);
  return range.length ? { kind: 'tiered', amounts: range } : null;
}

function priceField(obj: Record<string, unknown>, keys: readonly string[]): Price | null {
  const direct = parsePrice(firstDefined(obj, keys));
  if (direct) return direct;

  // Multi-item offers carry one price per item.
  const items = firstDefined(obj, ['Items', 'items']);
  if (!Array.isArray(items)) return null;
  const amounts = items.flatMap((it) => {
    const rec = asRecord(it);
    return rec ? amountsOf(parsePrice(firstDefined(rec, keys))) : [];
  });
  if (!amounts.length) return null;
  return amounts.length === 1 ? { kind: 'scalar', amount: amounts[0] ?? 0 } : { kind: 'tiered', amounts };
}

/**
 * Normalize one upstream feed or getoffers entry. Returns null when neither
 * identifier field resolves; such entries never enter the pipeline.
 */
export function normalizeOffer(raw: unknown): OfferRecord | null {
  const obj = asRecord(raw);
  if (!obj) return null;
  const id = offerIdOf(obj);
  if (!id) return null;

  const url = firstText(obj, ['Url', 'url', 'OfferUrl', 'offerUrl']);
  return {
    id,
    title: firstText(obj, ['Title', 'title']),
    description: firstText(obj, ['WriteUpIntro', 'writeUpIntro', 'Description', 'description', 'WriteUpBody', 'writeUpBody']),
    features: firstText(obj, ['Features', 'features']),
    subtitle: firstText(obj, ['Subtitle', 'subtitle']),
    snippet: firstText(obj, ['Snippet', 'snippet']),
    salePrice: priceField(obj, ['SalePrice', 'salePrice']),
    listPrice: priceField(obj, ['ListPrice', 'listPrice']),
    url: url || null,
    raw: { ...obj, Id: id, OfferId: id },
  };
}

import { representativePrice, savingsOf, type OfferRecord } from '@dealwatch/shared';

export type DealAlert = {
  subject: string;
  /** Short form: one `title - url` line per deal. */
  text: string;
  /** Long form. */
  html: string;
  sms: string;
  count: number;
};

const DESCRIPTION_MAX = 200;
const SMS_MAX = 160;

function truncate(s: string, max: number): string {
  return s.length > max ? `${s.slice(0, max - 3)}...` : s;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function formatPriceLine(offer: OfferRecord): string {
  const sale = representativePrice(offer.salePrice);
  if (sale == null) return 'Price unknown';
  const savings = savingsOf(offer);
  return `$${sale.toFixed(2)}${savings != null ? ` (Save $${savings.toFixed(2)})` : ''}`;
}

function dealHtml(offer: OfferRecord): string {
  const title = offer.title || 'No Title';
  const description = truncate(offer.description || offer.snippet, DESCRIPTION_MAX);
  const link = offer.url ? `<p><a href="${escapeHtml(offer.url)}">View on Woot!</a></p>` : '';
  return (
    `<h2>${escapeHtml(title)}</h2>` +
    `<p><strong>Price:</strong> ${escapeHtml(formatPriceLine(offer))}</p>` +
    (description ? `<p>${escapeHtml(description)}</p>` : '') +
    link +
    '<hr>'
  );
}

export function renderDealAlert(matches: readonly OfferRecord[]): DealAlert {
  const count = matches.length;
  const text = matches.map((o) => `${o.title || 'No Title'} - ${o.url ?? 'No URL'}`).join('\n\n');
  const html =
    '<html><body>' +
    matches.map(dealHtml).join('') +
    '<p><small>Sent by your deal alert watcher</small></p></body></html>';
  const sms = truncate(`${count} new deal(s): ${matches.map((o) => o.title || 'No Title').join(', ')}`, SMS_MAX);

  return {
    subject: `Deal alert: ${count} new matching deal(s) on Woot`,
    text,
    html,
    sms,
    count,
  };
}

import type { WootConfig } from '../config.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type WootFailureKind = 'rate_limited' | 'http_error' | 'network_error' | 'parse_error';

export type WootFailure = {
  kind: WootFailureKind;
  status: number | null;
  message: string;
};

export type WootResult = { ok: true; status: number; body: unknown } | { ok: false; failure: WootFailure };

/**
 * One request against the Woot affiliate API. Never throws: transport faults,
 * non-2xx replies and unparseable bodies all come back as a `WootFailure`.
 * Retrying is the caller's business.
 */
export async function wootRequest(
  cfg: WootConfig,
  fetchImpl: FetchLike,
  params: { method: 'GET' | 'POST'; path: string; query?: Record<string, string | number>; body?: unknown },
): Promise<WootResult> {
  const url = new URL(`${cfg.baseUrl}${params.path}`);
  for (const [k, v] of Object.entries(params.query ?? {})) url.searchParams.set(k, String(v));

  const headers: Record<string, string> = {
    'x-api-key': cfg.apiKey,
    accept: 'application/json',
  };
  const init: RequestInit = { method: params.method, headers };
  if (params.body !== undefined) {
    headers['content-type'] = 'application/json';
    init.body = JSON.stringify(params.body);
  }

  let res: Response;
  let text: string;
  try {
    res = await fetchImpl(url.toString(), init);
    text = await res.text();
  } catch (e) {
    return { ok: false, failure: { kind: 'network_error', status: null, message: e instanceof Error ? e.message : String(e) } };
  }

  if (res.status === 429) {
    return { ok: false, failure: { kind: 'rate_limited', status: 429, message: text.slice(0, 300) } };
  }
  if (!res.ok) {
    return { ok: false, failure: { kind: 'http_error', status: res.status, message: `woot_http:${res.status}:${text.slice(0, 300)}` } };
  }

  try {
    return { ok: true, status: res.status, body: JSON.parse(text) };
  } catch (e) {
    return {
      ok: false,
      failure: { kind: 'parse_error', status: res.status, message: e instanceof Error ? e.message : String(e) },
    };
  }
}

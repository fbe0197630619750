import { createHash, timingSafeEqual } from 'node:crypto';

import type { GuardedResult } from '@dealwatch/worker';

export type TriggerRequest = {
  method: string;
  pathname: string;
  authorization: string | undefined;
};

export type TriggerResponse = { status: number; body: unknown };

function digest(s: string) {
  return createHash('sha256').update(s, 'utf8').digest();
}

export function isAuthorized(header: string | undefined, secret: string | undefined): boolean {
  if (!secret) return true;
  const token = header?.startsWith('Bearer ') ? header.slice('Bearer '.length) : '';
  return timingSafeEqual(digest(token), digest(secret));
}

function safeError(e: unknown) {
  return e instanceof Error ? e.message : 'Unknown error';
}

/**
 * Routes:
 * - GET  /health → liveness
 * - POST /run    → one pipeline pass (409 while another is in flight, 502 when it did not complete cleanly)
 */
export async function routeTrigger(
  req: TriggerRequest,
  deps: { run: () => Promise<GuardedResult>; secret?: string },
): Promise<TriggerResponse> {
  if (req.pathname === '/health') {
    if (req.method !== 'GET') return { status: 405, body: { error: 'method_not_allowed', message: 'Method not allowed' } };
    return { status: 200, body: { ok: true } };
  }

  if (req.pathname === '/run') {
    if (req.method !== 'POST') return { status: 405, body: { error: 'method_not_allowed', message: 'Method not allowed' } };
    if (!isAuthorized(req.authorization, deps.secret)) {
      return { status: 401, body: { error: 'unauthorized', message: 'Missing or invalid bearer token' } };
    }
    try {
      const res = await deps.run();
      if (!res.started) return { status: 409, body: { error: res.reason, message: 'A run is already in progress' } };
      return { status: res.outcome.ok ? 200 : 502, body: res.outcome };
    } catch (e) {
      return { status: 500, body: { error: 'run_failed', message: safeError(e) } };
    }
  }

  return { status: 404, body: { error: 'not_found', message: 'Not found' } };
}

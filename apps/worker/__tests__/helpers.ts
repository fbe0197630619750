import type { OfferRecord } from '@dealwatch/shared';
import type { SeenSetStore } from '@dealwatch/store';

import type { Clock } from '../src/clock.js';
import type { DealAlertsConfig } from '../src/config.js';
import type { Notifier } from '../src/notify/channels.js';
import type { DealAlert } from '../src/notify/render.js';
import type { FetchLike } from '../src/woot/client.js';

export type RecordedCall = { url: URL; method: string; body: string | null; headers: Record<string, string> };

export type Reply = { status: number; body: unknown } | Error;

function headersOf(init: RequestInit): Record<string, string> {
  return Object.fromEntries(new Headers(init.headers).entries());
}

/**
 * In-process stand-in for `fetch`. `handler` sees each call and returns a
 * status/body pair (serialized as JSON unless it is already a string) or an
 * Error to simulate a transport fault.
 */
export function fakeFetch(handler: (call: RecordedCall) => Reply): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const call: RecordedCall = {
      url: new URL(url),
      method: init.method ?? 'GET',
      body: typeof init.body === 'string' ? init.body : null,
      headers: headersOf(init),
    };
    calls.push(call);
    const reply = handler(call);
    if (reply instanceof Error) throw reply;
    const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status });
  };
  return { fetchImpl, calls };
}

export function fakeClock(randomValue = 0): Clock & { sleeps: number[] } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => randomValue,
  };
}

export class MemorySeenSetStore implements SeenSetStore {
  saves: string[][] = [];
  failLoad: Error | null = null;
  failSave: Error | null = null;

  constructor(public ids: string[] = []) {}

  describe() {
    return 'memory://seen';
  }

  async load() {
    if (this.failLoad) throw this.failLoad;
    return [...this.ids];
  }

  async save(ids: readonly string[]) {
    if (this.failSave) throw this.failSave;
    this.ids = [...ids];
    this.saves.push([...ids]);
  }
}

export class RecordingNotifier implements Notifier {
  readonly name = 'recording';
  sent: DealAlert[] = [];
  fail: Error | null = null;

  async send(alert: DealAlert) {
    if (this.fail) throw this.fail;
    this.sent.push(alert);
  }
}

export function testConfig(overrides: { keywords?: string[]; maxAttempts?: number; batchSize?: number } = {}): DealAlertsConfig {
  return {
    woot: { apiKey: 'test-key', baseUrl: 'https://woot.test', category: 'Electronics', maxPages: 10 },
    detail: {
      batchSize: overrides.batchSize ?? 20,
      batchDelayMs: 100,
      maxAttempts: overrides.maxAttempts ?? 5,
      initialBackoffMs: 1000,
      maxBackoffMs: 8000,
      jitterMs: 500,
    },
    keywords: overrides.keywords ?? ['kindle', 'kobo'],
  };
}

export function offer(id: string, fields: Partial<Omit<OfferRecord, 'id'>> = {}): OfferRecord {
  return {
    id,
    title: '',
    description: '',
    features: '',
    subtitle: '',
    snippet: '',
    salePrice: null,
    listPrice: null,
    url: null,
    raw: { Id: id, OfferId: id },
    ...fields,
  };
}

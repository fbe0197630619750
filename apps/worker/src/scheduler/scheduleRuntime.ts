import type { Logger } from '../log.js';
import type { GuardedResult } from '../runtime.js';

/** Allowed values of one cron field; `null` means `*`. */
export type CronField = ReadonlySet<number> | null;

export type CronSpec = {
  minute: CronField;
  hour: CronField;
  dayOfMonth: CronField;
  month: CronField;
  dayOfWeek: CronField; // Sun=0
};

const FIELDS = [
  { key: 'minute', min: 0, max: 59, read: (d: Date) => d.getUTCMinutes() },
  { key: 'hour', min: 0, max: 23, read: (d: Date) => d.getUTCHours() },
  { key: 'dayOfMonth', min: 1, max: 31, read: (d: Date) => d.getUTCDate() },
  { key: 'month', min: 1, max: 12, read: (d: Date) => d.getUTCMonth() + 1 },
  { key: 'dayOfWeek', min: 0, max: 6, read: (d: Date) => d.getUTCDay() },
] as const;

type FieldDef = (typeof FIELDS)[number];

function bounded(part: string, n: number, def: FieldDef): number {
  if (!Number.isInteger(n)) throw new Error(`invalid_cron_value:${part}`);
  if (n < def.min || n > def.max) throw new Error(`cron_out_of_range:${part}`);
  return n;
}

// One comma-separated term: `*/n`, `a-b` or `n`.
function expandTerm(part: string, def: FieldDef): number[] {
  if (part.startsWith('*/')) {
    const step = Number(part.slice(2));
    if (!Number.isInteger(step) || step <= 0) throw new Error(`invalid_cron_step:${part}`);
    const out: number[] = [];
    for (let v: number = def.min; v <= def.max; v += step) out.push(v);
    return out;
  }
  const dash = part.indexOf('-');
  if (dash < 0) return [bounded(part, Number(part), def)];

  const from = bounded(part, Number(part.slice(0, dash)), def);
  const to = bounded(part, Number(part.slice(dash + 1)), def);
  if (from > to) throw new Error(`cron_out_of_range:${part}`);
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

function parseField(raw: string, def: FieldDef): CronField {
  if (raw === '*') return null;
  const values = new Set(
    raw
      .split(',')
      .map((p) => p.trim())
      .filter(Boolean)
      .flatMap((p) => expandTerm(p, def)),
  );
  if (!values.size) throw new Error(`invalid_cron_empty:${raw}`);
  return values;
}

/** Standard 5-field cron (`m h dom mon dow`), evaluated in UTC. */
export function parseCron(cron: string): CronSpec {
  const parts = cron.trim().split(/\s+/);
  const [m, h, dom, mon, dow] = parts;
  if (parts.length !== FIELDS.length || m == null || h == null || dom == null || mon == null || dow == null) {
    throw new Error('invalid_cron:expected_5_fields');
  }
  return {
    minute: parseField(m, FIELDS[0]),
    hour: parseField(h, FIELDS[1]),
    dayOfMonth: parseField(dom, FIELDS[2]),
    month: parseField(mon, FIELDS[3]),
    dayOfWeek: parseField(dow, FIELDS[4]),
  };
}

// Every field must match, day-of-month and day-of-week included.
export function matchesCron(spec: CronSpec, d: Date): boolean {
  return FIELDS.every((def) => {
    const allowed = spec[def.key];
    return allowed === null || allowed.has(def.read(d));
  });
}

const MINUTE_MS = 60_000;
const SEARCH_LIMIT_MINUTES = 366 * 24 * 60;

/** First matching minute strictly after `after`, or null within a year. */
export function nextRunUtc(spec: CronSpec, after: Date): Date | null {
  let t = Math.floor(after.getTime() / MINUTE_MS) * MINUTE_MS + MINUTE_MS;
  for (let i = 0; i < SEARCH_LIMIT_MINUTES; i++, t += MINUTE_MS) {
    const candidate = new Date(t);
    if (matchesCron(spec, candidate)) return candidate;
  }
  return null;
}

export type ScheduleHandle = { stop(): void };

/**
 * Run `run` on a UTC cron. Overlapping ticks are skipped by the single-flight
 * guard inside `run`; a failing run never stops the schedule.
 */
export function startDealAlertsSchedule(params: {
  cron: string;
  run: () => Promise<GuardedResult>;
  logger: Logger;
  now?: () => Date;
}): ScheduleHandle {
  const spec = parseCron(params.cron);
  const now = params.now ?? (() => new Date());
  const log = params.logger;
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  async function tick() {
    try {
      const res = await params.run();
      if (!res.started) log.warn('skipped', { reason: res.reason });
      else if (res.outcome.ok) log.info('run_completed', { status: res.outcome.status, summary: res.outcome.summary });
      else log.error('run_completed', { status: res.outcome.status, summary: res.outcome.summary });
    } catch (e) {
      log.error('run_crashed', { error: e instanceof Error ? e.message : String(e) });
    }
  }

  function reschedule() {
    if (timer) clearTimeout(timer);
    timer = null;
    if (stopped) return;

    const from = now();
    const next = nextRunUtc(spec, from);
    if (!next) {
      log.warn('no_next_run', { cron: params.cron });
      return;
    }
    const delay = Math.max(0, next.getTime() - from.getTime());
    timer = setTimeout(() => {
      // Arm the next occurrence first; a tick that lands mid-run is skipped by the guard.
      reschedule();
      void tick();
    }, delay);
  }

  reschedule();
  log.info('registered', { cron: params.cron });

  return {
    stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
      timer = null;
    },
  };
}

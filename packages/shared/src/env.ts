import { z } from 'zod';

function formatZodError(e: z.ZodError): string {
  const flat = e.flatten();
  const lines = Object.entries(flat.fieldErrors).flatMap(([k, v]) =>
    (v ?? []).map((msg) => `${k}: ${msg}`),
  );
  const formErrors = flat.formErrors.map((msg) => `env: ${msg}`);
  return [...lines, ...formErrors].join('\n');
}

function emptyToUndefined(v: unknown): unknown {
  return typeof v === 'string' && v.trim() === '' ? undefined : v;
}

const optionalString = () => z.preprocess(emptyToUndefined, z.string().optional());
const intWithDefault = (def: number, min: number, max: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).max(max).default(def));

export const DEFAULT_KEYWORDS = ['kindle', 'ereader', 'e-reader', 'e-ink', 'kobo', 'nook', 'eink'];

// Upstream getoffers hard cap is 25 ids per request.
export const WOOT_GETOFFERS_MAX_IDS = 25;

const serverEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Worker
  WORKER_LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
    .default('info'),

  // Woot affiliate API
  WOOT_API_KEY: optionalString(),
  WOOT_API_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default('https://developer.woot.com')),
  WOOT_FEED_CATEGORY: z.preprocess(emptyToUndefined, z.string().default('Electronics')),
  DEAL_KEYWORDS: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_KEYWORDS.join(','))),

  // Feed + detail rate limiting
  FEED_MAX_PAGES: intWithDefault(20, 1, 500),
  DETAIL_BATCH_SIZE: intWithDefault(20, 1, WOOT_GETOFFERS_MAX_IDS),
  DETAIL_MAX_ATTEMPTS: intWithDefault(5, 1, 20),
  DETAIL_INITIAL_BACKOFF_MS: intWithDefault(2000, 0, 600_000),
  DETAIL_MAX_BACKOFF_MS: intWithDefault(60_000, 0, 3_600_000),
  DETAIL_BATCH_DELAY_MS: intWithDefault(1000, 0, 600_000),
  DETAIL_JITTER_MS: intWithDefault(500, 0, 60_000),

  // Seen-set persistence
  SEEN_STORE: z.enum(['file', 'supabase']).default('file'),
  SEEN_STORE_FILE: z.preprocess(emptyToUndefined, z.string().default('./seen_deals.json')),
  SEEN_STORE_BUCKET: optionalString(),
  SEEN_STORE_OBJECT: z.preprocess(emptyToUndefined, z.string().default('seen_deals.json')),
  SUPABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString(),

  // Notification transports
  RESEND_API_KEY: optionalString(),
  EMAIL_FROM: optionalString(),
  EMAIL_RECIPIENT: optionalString(),
  TWILIO_ACCOUNT_SID: optionalString(),
  TWILIO_AUTH_TOKEN: optionalString(),
  TWILIO_FROM: optionalString(),
  SMS_RECIPIENT: optionalString(),

  // Triggers
  DEAL_ALERTS_CRON: z.preprocess(emptyToUndefined, z.string().default('*/15 * * * *')),
  PORT: intWithDefault(8080, 1, 65_535),
  TRIGGER_SECRET: optionalString(),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;
export type LogLevel = ServerEnv['WORKER_LOG_LEVEL'];

export function getServerEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid server environment variables:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function parseCsv(raw: string): string[] {
  return Array.from(
    new Set(
      raw
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean),
    ),
  );
}

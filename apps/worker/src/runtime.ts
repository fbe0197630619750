import { getServerEnv, type DealAlertsOutcome, type ServerEnv } from '@dealwatch/shared';
import { createSeenSetStore } from '@dealwatch/store';

import { buildDealAlertsConfig } from './config.js';
import { runDealAlerts, type DealAlertsDeps } from './jobs/dealAlerts.js';
import { createLogger } from './log.js';
import { createNotifier } from './notify/channels.js';

export { runDealAlerts, type DealAlertsDeps } from './jobs/dealAlerts.js';
export { createLogger, silentLogger, type Logger } from './log.js';

export function buildDealAlertsDeps(env: ServerEnv = getServerEnv(), overrides: { keywords?: string[] } = {}): DealAlertsDeps {
  return {
    config: buildDealAlertsConfig(env, overrides),
    store: createSeenSetStore(env),
    notifier: createNotifier(env),
    logger: createLogger('deal-alerts', env.WORKER_LOG_LEVEL),
  };
}

export type GuardedResult = { started: true; outcome: DealAlertsOutcome } | { started: false; reason: 'already_running' };

/**
 * Wraps a run so at most one is in flight per process. Runs share one seen
 * set, so an overlapping trigger is refused rather than queued.
 */
export function singleFlight(run: () => Promise<DealAlertsOutcome>): () => Promise<GuardedResult> {
  let running = false;
  return async () => {
    if (running) return { started: false, reason: 'already_running' };
    running = true;
    try {
      return { started: true, outcome: await run() };
    } finally {
      running = false;
    }
  };
}

export function createDealAlertsRunner(env: ServerEnv = getServerEnv()): () => Promise<GuardedResult> {
  const deps = buildDealAlertsDeps(env);
  return singleFlight(() => runDealAlerts(deps));
}

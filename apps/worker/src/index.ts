import { getServerEnv } from '@dealwatch/shared';

import { createLogger } from './log.js';
import { createDealAlertsRunner } from './runtime.js';
import { startDealAlertsSchedule } from './scheduler/scheduleRuntime.js';

async function main() {
  const env = getServerEnv();
  const log = createLogger('worker', env.WORKER_LOG_LEVEL);
  const schedule = startDealAlertsSchedule({
    cron: env.DEAL_ALERTS_CRON,
    run: createDealAlertsRunner(env),
    logger: createLogger('scheduler', env.WORKER_LOG_LEVEL),
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      log.info('stopping', { signal });
      schedule.stop();
    });
  }

  log.info(`initialized (logLevel=${env.WORKER_LOG_LEVEL}) (deal alerts cron=${env.DEAL_ALERTS_CRON})`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('[worker] fatal', err);
  process.exitCode = 1;
});

import { getServerEnv, parseCsv } from '@dealwatch/shared';

import { runDealAlerts } from '../jobs/dealAlerts.js';
import { createLogger } from '../log.js';
import { buildDealAlertsDeps } from '../runtime.js';

function parseArgs(argv: string[]): { keywords: string[] } {
  const keywordsArg = argv.find((a) => a.startsWith('--keywords='))?.slice('--keywords='.length) ?? '';
  return { keywords: keywordsArg ? parseCsv(keywordsArg) : [] };
}

/**
 * Cron-compatible one-shot runner (one pipeline pass, then exit).
 * Exit code is 1 when the run did not complete cleanly.
 */
async function main() {
  const env = getServerEnv();
  const log = createLogger('deal-alerts', env.WORKER_LOG_LEVEL);
  const { keywords } = parseArgs(process.argv.slice(2));

  const outcome = await runDealAlerts(buildDealAlertsDeps(env, { keywords }));
  if (outcome.ok) {
    log.info('SUCCESS', { status: outcome.status, summary: outcome.summary, stats: outcome.stats });
  } else {
    log.error('FAILURE', { status: outcome.status, summary: outcome.summary, stats: outcome.stats });
    process.exitCode = 1;
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('[deal-alerts] fatal', err);
  process.exitCode = 1;
});

import http from 'node:http';
import { URL } from 'node:url';

import { getServerEnv } from '@dealwatch/shared';
import { createDealAlertsRunner, createLogger } from '@dealwatch/worker';

import { routeTrigger } from './trigger.js';

const env = getServerEnv();
const log = createLogger('api', env.WORKER_LOG_LEVEL);
const run = createDealAlertsRunner(env);

function json(res: http.ServerResponse, status: number, body: unknown) {
  const data = JSON.stringify(body);
  res.writeHead(status, {
    'content-type': 'application/json; charset=utf-8',
    'cache-control': 'no-store',
  });
  res.end(data);
}

const server = http.createServer((req, res) => {
  const url = new URL(req.url ?? '/', 'http://localhost');
  routeTrigger(
    { method: req.method ?? 'GET', pathname: url.pathname, authorization: req.headers.authorization },
    { run, secret: env.TRIGGER_SECRET },
  )
    .then((out) => {
      if (url.pathname === '/run') log.info('trigger', { status: out.status });
      json(res, out.status, out.body);
    })
    .catch((e: unknown) => {
      log.error('unhandled', { error: e instanceof Error ? e.message : String(e) });
      json(res, 500, { error: 'internal_error', message: 'Internal error' });
    });
});

server.listen(env.PORT, () => {
  log.info(`listening on :${env.PORT}`);
});

import type { LogLevel } from '@dealwatch/shared';

export type Logger = {
  debug(msg: string, details?: Record<string, unknown>): void;
  info(msg: string, details?: Record<string, unknown>): void;
  warn(msg: string, details?: Record<string, unknown>): void;
  error(msg: string, details?: Record<string, unknown>): void;
  child(scope: string): Logger;
};

const ORDER: Record<LogLevel, number> = { trace: 10, debug: 20, info: 30, warn: 40, error: 50, fatal: 60 };

/**
 * Console logger with a `[scope]` prefix, the same shape the worker has always
 * printed (`[worker] ...`, `[scheduler] ...`). Lines below `level` are dropped.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const min = ORDER[level];
  const emit = (lvl: LogLevel, msg: string, details?: Record<string, unknown>) => {
    if (ORDER[lvl] < min) return;
    const line = `[${scope}] ${msg}`;
    const args: unknown[] = details ? [line, details] : [line];
    /* eslint-disable no-console */
    if (lvl === 'error' || lvl === 'fatal') console.error(...args);
    else if (lvl === 'warn') console.warn(...args);
    else console.log(...args);
    /* eslint-enable no-console */
  };
  return {
    debug: (msg, details) => emit('debug', msg, details),
    info: (msg, details) => emit('info', msg, details),
    warn: (msg, details) => emit('warn', msg, details),
    error: (msg, details) => emit('error', msg, details),
    child: (sub) => createLogger(`${scope}:${sub}`, level),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};

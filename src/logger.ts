/**
 * Leveled logging on top of `debug`.
 *
 * Each level gets its own namespace (`shard-gateway:shard:warn`, ...), so
 * `DEBUG=shard-gateway:*` shows everything and `DEBUG=*:error` only errors.
 * `critical` is reserved for fatal, non-retryable termination and is always on.
 */

import createDebug from 'debug';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

export type LogFn = (formatter: string, ...args: unknown[]) => void;

export type Logger = Record<LogLevel, LogFn>;

export function createLogger(namespace: string): Logger {
  const make = (level: LogLevel): LogFn => {
    const debug = createDebug(level === 'debug' ? namespace : `${namespace}:${level}`);
    if (level === 'critical') debug.enabled = true;
    return (formatter, ...args) => debug(formatter, ...args);
  };

  return {
    debug: make('debug'),
    info: make('info'),
    warn: make('warn'),
    error: make('error'),
    critical: make('critical'),
  };
}

/**
 * Prefix every message, e.g. with the shard a line belongs to.
 */
export function prefixLogger(logger: Logger, prefix: string): Logger {
  const wrap = (fn: LogFn): LogFn => (formatter, ...args) => fn(`${prefix} ${formatter}`, ...args);
  return {
    debug: wrap(logger.debug),
    info: wrap(logger.info),
    warn: wrap(logger.warn),
    error: wrap(logger.error),
    critical: wrap(logger.critical),
  };
}

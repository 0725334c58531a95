import type { AppConfig } from '../../shared/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown>;

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  /** Logger whose records also carry `bindings`, e.g. `{ component: 'aggregator' }`. */
  child: (bindings: LogMeta) => Logger;
}

// Upstream keys travel through request options; they must never reach a log line.
const SECRET_FIELD = /api[-_]?key|secret|token|password/i;

export const redactSecrets = (record: LogMeta): LogMeta =>
  Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, SECRET_FIELD.test(key) && value ? '[redacted]' : value]),
  );

const write = (level: LogLevel, line: string) => {
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
  /* eslint-enable no-console */
};

/**
 * JSON-lines logger. Records below `observability.logLevel` are dropped, except errors.
 */
export const createLogger = (config: Pick<AppConfig, 'observability'>, bindings: LogMeta = {}): Logger => {
  const threshold = levelWeights[config.observability.logLevel];

  const log = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (level !== 'error' && levelWeights[level] < threshold) {
      return;
    }
    const record = redactSecrets({ level, message, ts: new Date().toISOString(), ...bindings, ...meta });
    write(level, JSON.stringify(record));
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    child: (extra) => createLogger(config, { ...bindings, ...extra }),
  };
};

export const createSilentLogger = (): Logger => {
  const noop = () => {};
  const logger: Logger = { debug: noop, info: noop, warn: noop, error: noop, child: () => logger };
  return logger;
};

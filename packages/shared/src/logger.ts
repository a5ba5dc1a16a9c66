import pino from 'pino';

const REDACTED_KEYS = new Set([
  'password',
  'passwordhash',
  'newpassword',
  'token',
  'accesstoken',
  'refreshtoken',
  'tokenhash',
  'secret',
  'pepper',
  'code',
  'codehash',
  'email',
  'phone',
  'ip',
  'ipaddress',
  'remoteaddress',
  'useragent',
  'authorization',
  'cookie',
  'body',
]);

function isRedactedKey(key: string): boolean {
  return REDACTED_KEYS.has(key.toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isRedactedKey(key)) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = sanitize(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isRecord(item) ? sanitize(item) : item));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta: Record<string, unknown>, msg: string) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta: Record<string, unknown>, msg: string) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta: Record<string, unknown>, msg: string) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta: Record<string, unknown>, msg: string) {
      logger.debug(sanitize(meta), msg);
    },
    fatal(meta: Record<string, unknown>, msg: string) {
      logger.fatal(sanitize(meta), msg);
    },
    child(bindings: Record<string, unknown>): SafeLogger {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

/** Errors are logged by message only; stacks and driver payloads can carry row data. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
  return wrapPino(pinoInstance);
}

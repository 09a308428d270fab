export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogLevelProvider = LogLevel | (() => LogLevel);
export type LogMeta = Record<string, unknown>;

export interface Logger {
  log(level: LogLevel, message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const MAX_LOG_META_LENGTH = 4000;
const MAX_LOG_VALUE_STRING_LENGTH = 512;
const MAX_LOG_ARRAY_ITEMS = 32;
const LOG_NUMBER_PRECISION = 1e4;

// Matrices and vectors carry float noise (6.1e-17 instead of 0); round for readability.
const roundForLog = (value: number): number => {
  if (!Number.isFinite(value)) return value;
  const rounded = Math.round(value * LOG_NUMBER_PRECISION) / LOG_NUMBER_PRECISION;
  return Object.is(rounded, -0) ? 0 : rounded;
};

export const safeStringify = (value: unknown, maxLength: number = MAX_LOG_META_LENGTH): string => {
  const seen = new WeakSet<object>();
  try {
    const json = JSON.stringify(value, (_key, v: unknown) => {
      if (v instanceof Error) {
        return {
          name: v.name,
          message: v.message,
          ...('code' in v && typeof v.code === 'string' ? { code: v.code } : {})
        };
      }
      if (typeof v === 'number') return roundForLog(v);
      if (typeof v === 'string') {
        if (v.length <= MAX_LOG_VALUE_STRING_LENGTH) return v;
        return `${v.slice(0, MAX_LOG_VALUE_STRING_LENGTH)}...[truncated]`;
      }
      if (typeof v === 'object' && v !== null) {
        if (seen.has(v)) return '[Circular]';
        seen.add(v);
        if (Array.isArray(v) && v.length > MAX_LOG_ARRAY_ITEMS) {
          return [...v.slice(0, MAX_LOG_ARRAY_ITEMS), `[+${v.length - MAX_LOG_ARRAY_ITEMS} more]`];
        }
      }
      return v;
    });
    if (json.length <= maxLength) return json;
    return `${json.slice(0, maxLength)}...[truncated]`;
  } catch (err) {
    const fallback = err instanceof Error ? err.message : String(err);
    return `[unserializable meta: ${fallback}]`;
  }
};

export const safeFormatMeta = (meta?: LogMeta): string | null => {
  if (!meta) return null;
  return safeStringify(meta);
};

export const errorMessage = (err: unknown, fallback?: string): string => {
  if (err instanceof Error) return err.message;
  if (fallback !== undefined) return fallback;
  return String(err);
};

export const isLogLevelEnabled = (level: LogLevel, minLevel: LogLevel): boolean =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly minLevel: LogLevelProvider;

  constructor(prefix: string, minLevel: LogLevelProvider = 'info') {
    this.prefix = prefix;
    this.minLevel = minLevel;
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) return;
    const formatted = safeFormatMeta(meta);
    const payload = formatted ? `${message} ${formatted}` : message;
    const line = `[${this.prefix}] [${level}] ${payload}`;
    if (level === 'warn' || level === 'error') {
      // eslint-disable-next-line no-console
      console.error(line);
      return;
    }
    // eslint-disable-next-line no-console
    console.log(line);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log('error', message, meta);
  }

  private shouldLog(level: LogLevel): boolean {
    const minLevel = typeof this.minLevel === 'function' ? this.minLevel() : this.minLevel;
    return isLogLevelEnabled(level, minLevel);
  }
}

/**
 * Prefixes every message with a scope label (a module's node name) and merges
 * fixed metadata into each entry.
 */
export class ScopedLogger implements Logger {
  private readonly inner: Logger;
  private readonly scope: () => string;
  private readonly baseMeta: LogMeta;

  constructor(inner: Logger, scope: string | (() => string), baseMeta: LogMeta = {}) {
    this.inner = inner;
    this.scope = typeof scope === 'function' ? scope : () => scope;
    this.baseMeta = baseMeta;
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    const merged = meta ? { ...this.baseMeta, ...meta } : this.baseMeta;
    const hasMeta = Object.keys(merged).length > 0;
    this.inner.log(level, `${this.scope()}: ${message}`, hasMeta ? merged : undefined);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log('error', message, meta);
  }
}

/**
 * Tagged console logger
 * Every line is prefixed with the component tag, e.g. "[ContinuousListener] Wake word detected"
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const REDACTION = '[REDACTED]';
const REDACT_PATTERN = /password|secret|token|voiceprint/gi;

export function redact(value: string): string {
  return value.replace(REDACT_PATTERN, REDACTION);
}

function redactArg(value: unknown): unknown {
  if (typeof value === 'string') return redact(value);
  if (value instanceof Error) return redact(value.message);
  return value;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

export function createLogger(tag: string, level: LogLevel = resolveLevel()): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  const prefix = `[${tag}]`;

  return {
    debug(message, ...meta) {
      if (enabled('debug')) console.debug(prefix, redact(message), ...meta.map(redactArg));
    },
    info(message, ...meta) {
      if (enabled('info')) console.log(prefix, redact(message), ...meta.map(redactArg));
    },
    warn(message, ...meta) {
      if (enabled('warn')) console.warn(prefix, redact(message), ...meta.map(redactArg));
    },
    error(message, ...meta) {
      if (enabled('error')) console.error(prefix, redact(message), ...meta.map(redactArg));
    },
  };
}

const noop = () => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

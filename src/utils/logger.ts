/**
 * stderr logging
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Every line goes through console.error() as "[tag] message".
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function emit(level: LogLevel, tag: string, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const prefix = level === 'info' ? `[${tag}]` : `[${tag}] ${level.toUpperCase()}:`;
  console.error(`${prefix} ${message}`);
}

export const logger = {
  debug: (tag: string, message: string) => emit('debug', tag, message),
  info: (tag: string, message: string) => emit('info', tag, message),
  warn: (tag: string, message: string) => emit('warn', tag, message),
  error: (tag: string, message: string) => emit('error', tag, message),
};

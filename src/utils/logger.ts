/**
 * Module-scoped console logger.
 *
 *   const logger = createLogger('suggest');
 *   logger.warn('Embedding provider timed out', { timeoutMs: 3000 });
 *
 * Output is `[module] message {context}`, coloured by level. The threshold
 * comes from LOG_LEVEL, else from `logging.level` in config.yaml.
 */

import { loadConfig } from '../config.js';
import type { LogLevel } from '../types.js';
import { error as errorStyle, warning, muted } from './chalk.js';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext, err?: unknown): void;
  error(message: string, context?: LogContext, err?: unknown): void;
  child(module: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let levelOverride: LogLevel | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return loadConfig().logging.level;
}

/** Forces a log level regardless of env and config; pass null to clear */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function emit(level: Exclude<LogLevel, 'silent'>, module: string, message: string, context?: LogContext, err?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return;

  const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  const errorStr = err !== undefined ? ` ${describeError(err)}` : '';
  const line = `[${module}] ${message}${contextStr}${errorStr}`;

  switch (level) {
    case 'debug':
      console.log(muted(line));
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(warning(line));
      break;
    case 'error':
      console.error(errorStyle(line));
      break;
  }
}

export function createLogger(module: string): Logger {
  return {
    debug: (message, context) => emit('debug', module, message, context),
    info: (message, context) => emit('info', module, message, context),
    warn: (message, context, err) => emit('warn', module, message, context, err),
    error: (message, context, err) => emit('error', module, message, context, err),
    child: (name) => createLogger(`${module}:${name}`),
  };
}


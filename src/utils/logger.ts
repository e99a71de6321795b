/**
 * Structured logger.
 *
 * One JSON line per record on stderr; stdout carries the JSON-RPC stream.
 * Methods are async so call sites read the same whether or not a sink flushes.
 */

import { config, LOG_LEVELS, type LogLevel } from '../config/env.js';
import { maskIdentifiers } from './masking.js';

export type LogData = Record<string, unknown>;

export interface LogRecord {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

export interface Logger {
  debug(event: string, data?: LogData): Promise<void>;
  info(event: string, data?: LogData): Promise<void>;
  warning(event: string, data?: LogData): Promise<void>;
  error(event: string, data?: LogData): Promise<void>;
  child(bindings: LogData): Logger;
}

const MAX_DEPTH = 4;

function sanitize(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') {
    return maskIdentifiers(value);
  }
  if (value instanceof Error) {
    return maskIdentifiers(value.message);
  }
  if (depth >= MAX_DEPTH || value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item, depth + 1));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = sanitize(v, depth + 1);
  }
  return out;
}

export function createLogger(options?: {
  level?: LogLevel;
  sink?: LogSink;
  bindings?: LogData;
}): Logger {
  const threshold = LOG_LEVELS.indexOf(options?.level ?? config.LOG_LEVEL);
  const sink: LogSink = options?.sink ?? ((line) => console.error(line));
  const bindings = options?.bindings ?? {};

  const write = async (level: LogLevel, event: string, data?: LogData) => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const record: LogRecord = {
      ...bindings,
      ts: new Date().toISOString(),
      level,
      event,
    };
    if (data) {
      for (const [k, v] of Object.entries(data)) {
        record[k] = sanitize(v);
      }
    }
    sink(JSON.stringify(record));
  };

  return {
    debug: (event, data) => write('debug', event, data),
    info: (event, data) => write('info', event, data),
    warning: (event, data) => write('warning', event, data),
    error: (event, data) => write('error', event, data),
    child: (extra) =>
      createLogger({
        level: options?.level,
        sink,
        bindings: { ...bindings, ...extra },
      }),
  };
}

export const logger: Logger = createLogger();

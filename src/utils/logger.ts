/**
 * statuswatch — Logging Utilities
 *
 * Structured logging using Pino with redaction of sensitive fields
 * and consistent formatting.
 *
 * @module utils/logger
 */

import pino from 'pino';
import { LogLevelSchema, type LogLevel } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

const registry = new Set<pino.Logger>();

function envLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.STATUSWATCH_LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

let defaultLevel: LogLevel = envLevel();

export function createLogger(name: string, options?: { level?: LogLevel }): pino.Logger {
  const opts: pino.LoggerOptions = {
    name,
    level: options?.level ?? defaultLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  const instance = pino(opts);
  registry.add(instance);
  return instance;
}

/**
 * Apply a level to every logger created so far and to those created later.
 * The environment variable still wins so operators can raise verbosity
 * without touching the config file.
 */
export function setLogLevel(level: LogLevel): void {
  defaultLevel = process.env.STATUSWATCH_LOG_LEVEL ? envLevel() : level;
  for (const instance of registry) {
    instance.level = defaultLevel;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'key', 'auth', 'credential', 'private'];

export function redact<T extends Record<string, unknown>>(obj: T, additionalFields: string[] = []): T {
  const fieldsToRedact = [...SENSITIVE_FIELDS, ...additionalFields];
  const result: Record<string, unknown> = { ...obj };

  for (const key of Object.keys(result)) {
    const lowerKey = key.toLowerCase();
    const value = result[key];
    if (fieldsToRedact.some((field) => lowerKey.includes(field))) {
      result[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      result[key] = redact(value, additionalFields);
    }
  }

  return result as T;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    if ('code' in error && typeof error.code === 'string') {
      result.code = error.code;
    }
    return result;
  }

  return { message: String(error) };
}

/**
 * voxpipe — Logging Utilities
 *
 * Structured logging using Pino with redaction of sensitive fields.
 * Logs go to stderr so CLI output on stdout stays clean.
 *
 * @module kernel/logger
 * @version 1.0.0
 */

import pino, { type Logger } from 'pino';
import { getConfig } from '../config/config.js';

export type { Logger };

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

let root: Logger | null = null;

function getRootLogger(): Logger {
  if (root === null) {
    const config = getConfig();
    root = pino(
      {
        name: 'voxpipe',
        level: config.logging.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
          level: (label: string) => ({ level: label }),
        },
      },
      pino.destination(2),
    );
  }
  return root;
}

export function createLogger(name: string, options?: { level?: string }): Logger {
  const child = getRootLogger().child({ module: name });
  if (options?.level !== undefined) {
    child.level = options.level;
  }
  return child;
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

const SENSITIVE_FIELDS = [
  'password',
  'secret',
  'token',
  'key',
  'auth',
  'credential',
  'subscription',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redact(
  obj: Record<string, unknown>,
  additionalFields: string[] = [],
): Record<string, unknown> {
  const fieldsToRedact = [...SENSITIVE_FIELDS, ...additionalFields];
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (fieldsToRedact.some((field) => lowerKey.includes(field))) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = redact(value, additionalFields);
    } else {
      result[key] = value;
    }
  }

  return result;
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
    const code: unknown = Reflect.get(error, 'code');
    if (typeof code === 'string') {
      result.code = code;
    }
    return result;
  }

  return { message: String(error) };
}

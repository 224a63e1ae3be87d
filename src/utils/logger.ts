// Structured logging
// Shared pino instance plus helpers that keep tool payloads bounded and free of secrets

import { pino, type Logger, type LoggerOptions } from 'pino';
import { env } from '../env.js';

const isTest = env.NODE_ENV === 'test' || !!process.env.VITEST;

function buildOptions(): LoggerOptions {
  const options: LoggerOptions = {
    level: isTest ? 'silent' : env.LOG_LEVEL,
    base: { service: 'travel-tool-gateway' },
  };

  if (env.NODE_ENV === 'development' && !isTest) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
}

export const logger: Logger = pino(buildOptions());

export function createChildLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}

export type { Logger } from 'pino';

const SENSITIVE_KEY_REGEX = /(api[_-]?key|password|passwd|token|secret|authorization|card[_-]?number|credit[_-]?card|cvv|cvc|ssn|e[_-]?mail)/i;
const REDACTED = '[REDACTED]';

/**
 * Deep copy of `value` with every sensitive-looking key replaced by a marker.
 */
export function redactSensitive(value: unknown, depth: number = 0): unknown {
  if (depth > 8) return value;

  if (Array.isArray(value)) {
    return value.map(item => redactSensitive(item, depth + 1));
  }

  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = SENSITIVE_KEY_REGEX.test(key) ? REDACTED : redactSensitive(inner, depth + 1);
    }
    return out;
  }

  return value;
}

function serialize(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Circular structures
    return String(value);
  }
}

/**
 * Serialize `value` and cap it at `limitBytes` UTF-8 bytes.
 * Truncated output ends with `…[truncated N bytes]`, N being the dropped byte count.
 */
export function truncateForLog(value: unknown, limitBytes: number): string {
  const text = serialize(value);
  const bytes = Buffer.from(text, 'utf8');

  if (bytes.length <= limitBytes) {
    return text;
  }

  // Back off to a character boundary so the head decodes cleanly
  let end = limitBytes;
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }

  const head = bytes.subarray(0, end).toString('utf8');
  return `${head}…[truncated ${bytes.length - end} bytes]`;
}

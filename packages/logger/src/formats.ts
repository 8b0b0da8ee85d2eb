/**
 * @fileoverview Custom winston formats: secret redaction, standard fields and
 * the human-readable console layout.
 */

import { format } from 'winston';
import { getRequestContext } from './request-context.js';

/**
 * Field names whose values must never reach a log sink.
 */
const SECRET_FIELD_PATTERNS: readonly RegExp[] = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

export const REDACTED = '[REDACTED]';

/** Winston-owned keys that are never redacted or re-printed as context. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSecretFieldName(name: string): boolean {
  return SECRET_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a redacted copy of a metadata value. Plain objects and arrays are
 * walked recursively; everything else is returned as-is.
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSecretFieldName(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Replaces the values of secret-looking fields with {@link REDACTED}.
 * Must run first in the chain so later formats never see the raw values.
 *
 * @example
 * ```typescript
 * logger.info('Provider configured', { baseUrl: 'https://example.test', apiKey: 'test-secret' });
 * // {"message":"Provider configured","baseUrl":"https://example.test","apiKey":"[REDACTED]",...}
 * ```
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) continue;
    info[key] = isSecretFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO timestamp, error stacks, and the fields of the active request context
 * (its `request_id` plus any extras) that the entry does not carry already.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const context = getRequestContext();
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        if (info[key] === undefined) info[key] = value;
      }
    }
    return info;
  })()
);

/**
 * Renders an entry as
 * `[timestamp] level: message component=analysis symbol=AAPL key=value`.
 */
export function renderLine(info: Record<string, unknown>): string {
  const { timestamp, level, message, component, symbol, strategy, request_id, ...rest } = info;

  const context: string[] = [];
  if (component) context.push(`component=${String(component)}`);
  if (symbol) context.push(`symbol=${String(symbol)}`);
  if (strategy) context.push(`strategy=${String(strategy)}`);
  if (request_id) context.push(`request_id=${String(request_id)}`);

  for (const [key, value] of Object.entries(rest)) {
    if (CORE_FIELDS.has(key)) continue;
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const line = `[${String(timestamp)}] ${String(level)}: ${String(message)}${contextStr}`;

  return typeof info['stack'] === 'string' ? `${line}\n${info['stack']}` : line;
}

export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderLine(info))
);

/**
 * Redaction utilities for logs. Masks callback URL tokens, e-mail addresses
 * and phone numbers. Redaction is disabled when LOG_LEVEL=debug to aid local
 * debugging.
 */

function scrubString(input: string): string {
  let out = input;
  // Callback URLs carry a one-time token in the query string
  out = out.replace(/(https?:\/\/[^\s?#"']+)\?[^\s#"']*/g, '$1?[REDACTED_QUERY]');
  out = out.replace(/[\w.+-]+@[\w-]+\.[\w.-]+/g, '[REDACTED_EMAIL]');
  // Korean mobile / landline numbers (010-1234-5678, 064 123 4567, 01012345678)
  out = out.replace(/\b0\d{1,2}[-\s]?\d{3,4}[-\s]?\d{4}\b/g, '[REDACTED_PHONE]');
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof Error) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub PII-like patterns from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

/**
 * Convenience for messages.
 */
export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}

import { setTimeout as delay } from 'node:timers/promises';
import { fetch } from 'undici';
import { observeExternal } from './metrics.js';
import { createLogger } from './logging.js';
import { scheduleWithLimit } from './limiter.js';

const log = createLogger();

const ALLOWLIST = new Set<string>([
  'openapi.naver.com',
  'api.search.brave.com',
]);

export type ExternalFetchErrorKind = 'timeout' | 'http' | 'network';

export class ExternalFetchError extends Error {
  kind: ExternalFetchErrorKind;
  status?: number;
  constructor(kind: ExternalFetchErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ExternalFetchError';
    this.kind = kind;
    this.status = status;
  }
}

const BASE_DELAY = 200;
const MAX_DELAY = 4000;
const JITTER_FACTOR = 0.25;

async function backoff(attempt: number): Promise<void> {
  const expDelay = BASE_DELAY * Math.pow(1.5, attempt);
  const jitter = expDelay * JITTER_FACTOR * (Math.random() * 2 - 1);
  await delay(Math.min(expDelay + jitter, MAX_DELAY));
}

function statusLabel(err: ExternalFetchError): string {
  if (err.kind === 'http') return err.status && err.status >= 500 ? '5xx' : '4xx';
  return err.kind;
}

interface RequestOpts {
  timeoutMs?: number;
  target?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * One HTTP exchange with a timeout. Resolves with the response body text;
 * throws ExternalFetchError on timeout, network failure or non-2xx status.
 */
async function exchange(
  url: string,
  init: { method: 'GET' | 'POST'; body?: string },
  opts: RequestOpts,
): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? 4000;
  const target = opts.target ?? 'unknown';
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const signal = opts.signal ? AbortSignal.any([timeoutSignal, opts.signal]) : timeoutSignal;
  try {
    const res = await fetch(url, { ...init, headers: opts.headers, signal });
    const text = await res.text();
    if (!res.ok) {
      log.debug({ target, status: res.status, body: text.slice(0, 300) }, 'HTTP error response');
      throw new ExternalFetchError('http', `HTTP_${res.status}`, res.status);
    }
    return text;
  } catch (err: unknown) {
    if (err instanceof ExternalFetchError) throw err;
    if (timeoutSignal.aborted) throw new ExternalFetchError('timeout', 'timeout');
    if (opts.signal?.aborted) throw new ExternalFetchError('timeout', 'aborted');
    log.debug({ target, error: err instanceof Error ? err.message : String(err) }, 'Network error');
    throw new ExternalFetchError('network', 'network_error');
  }
}

function parseJSON(target: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    log.debug({ target, body: text.slice(0, 300) }, 'JSON parse error');
    throw new ExternalFetchError('network', 'json_parse_error');
  }
}

/**
 * Fetches JSON from an allowlisted host with timeout, per-host rate limiting
 * and exponential backoff retry with jitter. 4xx responses other than 429
 * are not retried.
 */
export async function fetchJSON(
  url: string,
  opts: RequestOpts & { retries?: number } = {},
): Promise<unknown> {
  const retries = opts.retries ?? 1;
  const target = opts.target ?? 'unknown';

  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }
  if (!ALLOWLIST.has(host)) {
    throw new ExternalFetchError('network', 'host_not_allowed');
  }

  let lastErr: unknown;
  for (let i = 0; i <= retries; i++) {
    try {
      const text = await scheduleWithLimit(host, () => exchange(url, { method: 'GET' }, opts));
      observeExternal(target, 'ok');
      return parseJSON(target, text);
    } catch (err: unknown) {
      lastErr = err;
      if (!(err instanceof ExternalFetchError)) throw err;
      observeExternal(target, statusLabel(err));
      if (err.kind === 'http' && err.status && err.status < 500 && err.status !== 429) {
        throw err;
      }
      if (i < retries) {
        log.debug({ target, attempt: i + 1, maxAttempts: retries + 1 }, 'Retrying after error');
        await backoff(i);
      }
    }
  }
  throw lastErr;
}

/**
 * POSTs a JSON body through the host's limiter pool. Resolves with the parsed
 * JSON response, the raw text when the body is not JSON, or null for an empty
 * body. Single attempt; retry policy belongs to the caller.
 */
export async function postJSON(url: string, body: unknown, opts: RequestOpts = {}): Promise<unknown> {
  const target = opts.target ?? 'unknown';
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }
  try {
    const text = await scheduleWithLimit(host, () =>
      exchange(
        url,
        { method: 'POST', body: JSON.stringify(body) },
        { ...opts, headers: { 'Content-Type': 'application/json', ...opts.headers } },
      ),
    );
    observeExternal(target, 'ok');
    if (text.trim() === '') return null;
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  } catch (err: unknown) {
    if (err instanceof ExternalFetchError) observeExternal(target, statusLabel(err));
    throw err;
  }
}

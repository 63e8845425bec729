import { TaskCancelledError } from 'cockatiel';
import { ExternalFetchError } from '../util/fetch.js';
import { isBreakerOpen } from '../util/resilience.js';

export interface StandardError {
  code: string;
  message: string;
  details?: unknown;
  causeId?: string;
}

/**
 * Maps anything thrown by a gateway, file read or parser to a standard error
 * shape for structured logs. Never shown to end users.
 */
export function toStdError(error: unknown, ctx?: string): StandardError {
  if (error instanceof ExternalFetchError) {
    if (error.kind === 'timeout') {
      return { code: 'timeout', message: 'Request timeout', causeId: ctx };
    }
    if (error.kind === 'http') {
      const status = error.status ?? 500;
      if (status === 401 || status === 403) {
        return { code: 'auth_error', message: 'Authentication failed', details: { status }, causeId: ctx };
      }
      if (status === 429) {
        return { code: 'rate_limit', message: 'Rate limit exceeded', details: { status }, causeId: ctx };
      }
      if (status >= 500) {
        return { code: 'server_error', message: 'Server error', details: { status }, causeId: ctx };
      }
      return { code: 'http_error', message: error.message, details: { status }, causeId: ctx };
    }
    return { code: 'network_error', message: error.message, causeId: ctx };
  }

  if (isBreakerOpen(error)) {
    return { code: 'circuit_open', message: 'Circuit breaker is open', causeId: ctx };
  }

  if (error instanceof TaskCancelledError) {
    return { code: 'timeout', message: 'Deadline exceeded', causeId: ctx };
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return { code: 'timeout', message: 'Request timeout', causeId: ctx };
    }
    if (error.name === 'ZodError') {
      return { code: 'invalid_response', message: 'Unexpected response shape', causeId: ctx };
    }
    return { code: 'internal_error', message: error.message, causeId: ctx };
  }

  return {
    code: 'unknown_error',
    message: 'Unknown error occurred',
    details: error,
    causeId: ctx,
  };
}

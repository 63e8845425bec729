import {
  BrokenCircuitError,
  ConsecutiveBreaker,
  ConstantBackoff,
  TaskCancelledError,
  TimeoutStrategy,
  circuitBreaker,
  handleAll,
  retry,
  timeout,
  type CircuitBreakerPolicy,
} from 'cockatiel';

export type BoundedResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'timeout' }
  | { ok: false; reason: 'error'; error: unknown };

/**
 * Races `fn` against a timer. Whichever settles first decides the outcome;
 * on timeout the task is abandoned and its signal is aborted, but it is not
 * awaited. Never rejects.
 */
export async function boundedAttempt<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<BoundedResult<T>> {
  const policy = timeout(Math.max(1, timeoutMs), TimeoutStrategy.Aggressive);
  try {
    const value = await policy.execute(({ signal }) => fn(signal));
    return { ok: true, value };
  } catch (error: unknown) {
    if (error instanceof TaskCancelledError) return { ok: false, reason: 'timeout' };
    return { ok: false, reason: 'error', error };
  }
}

/**
 * Runs `fn`, retrying once after a fixed delay when it throws. The second
 * failure propagates.
 */
export async function retryOnce<T>(fn: () => Promise<T>, delayMs: number): Promise<T> {
  const policy = retry(handleAll, { maxAttempts: 1, backoff: new ConstantBackoff(delayMs) });
  return policy.execute(() => fn());
}

const BREAKER_THRESHOLD = Number(process.env.EXT_BREAKER_THRESHOLD || 5);
const BREAKER_HALF_OPEN_MS = Number(process.env.EXT_BREAKER_RESET_MS || 30_000);

const breakers = new Map<string, CircuitBreakerPolicy>();

function getBreaker(service: string): CircuitBreakerPolicy {
  let breaker = breakers.get(service);
  if (!breaker) {
    breaker = circuitBreaker(handleAll, {
      halfOpenAfter: BREAKER_HALF_OPEN_MS,
      breaker: new ConsecutiveBreaker(BREAKER_THRESHOLD),
    });
    breakers.set(service, breaker);
  }
  return breaker;
}

/**
 * Executes `fn` behind the named service's circuit breaker. While the
 * breaker is open calls fail fast with BrokenCircuitError.
 */
export async function withBreaker<T>(service: string, fn: () => Promise<T>): Promise<T> {
  return getBreaker(service).execute(() => fn());
}

export function isBreakerOpen(error: unknown): boolean {
  return error instanceof BrokenCircuitError;
}

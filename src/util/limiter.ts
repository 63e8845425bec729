import Bottleneck from 'bottleneck';

/** One Bottleneck pool per outbound host (search providers, LLM, callback). */
const pools = new Map<string, Bottleneck>();

export interface LimiterStats {
  queued: number;
  running: number;
}

function getConfig(host: string): Bottleneck.ConstructorOptions {
  const defaultMinTime = Number(process.env.EXT_RATE_MIN_TIME_MS || 50);
  const defaultMaxConcurrency = Number(process.env.EXT_RATE_MAX_CONCURRENCY || 8);

  // e.g. RATE_MAX_CONC_OPENAPI_NAVER_COM=2
  const hostKey = host.replace(/[.-]/g, '_').toUpperCase();
  const minTime = Number(process.env[`RATE_MIN_MS_${hostKey}`] || defaultMinTime);
  const maxConcurrent = Number(process.env[`RATE_MAX_CONC_${hostKey}`] || defaultMaxConcurrency);

  return { minTime, maxConcurrent };
}

export function getLimiter(host: string): Bottleneck {
  let limiter = pools.get(host);
  if (!limiter) {
    limiter = new Bottleneck(getConfig(host));
    pools.set(host, limiter);
  }
  return limiter;
}

export async function scheduleWithLimit<T>(host: string, fn: () => Promise<T>): Promise<T> {
  return getLimiter(host).schedule(() => fn());
}

/** Queue depth of every pool created so far, keyed by host. */
export function getAllLimiterStats(): Record<string, LimiterStats> {
  const stats: Record<string, LimiterStats> = {};
  for (const [host, limiter] of pools) {
    const counts = limiter.counts();
    stats[host] = { queued: counts.QUEUED, running: counts.RUNNING + counts.EXECUTING };
  }
  return stats;
}

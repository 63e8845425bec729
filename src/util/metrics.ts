import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

/**
 * Prometheus metrics for the skill endpoint, LLM refinement, callback
 * delivery and outbound HTTP. Exposed as text at GET /metrics.
 */
export const registry = new Registry();

if (process.env.METRICS_DEFAULTS === 'true') {
  collectDefaultMetrics({ register: registry });
}

const skillRequests = new Counter({
  name: 'skill_requests_total',
  help: 'Skill webhook requests by handling route',
  labelNames: ['route'] as const,
  registers: [registry],
});

const skillLatency = new Histogram({
  name: 'skill_latency_ms',
  help: 'Synchronous skill response latency in milliseconds',
  buckets: [50, 100, 300, 600, 1000, 2000, 3500, 5000],
  registers: [registry],
});

const llmRefinements = new Counter({
  name: 'llm_refinements_total',
  help: 'Draft refinement attempts by mode and outcome',
  labelNames: ['mode', 'outcome'] as const,
  registers: [registry],
});

const callbackDeliveries = new Counter({
  name: 'callback_deliveries_total',
  help: 'Callback POST deliveries by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

const externalRequests = new Counter({
  name: 'external_requests_total',
  help: 'Outbound HTTP requests by target and status',
  labelNames: ['target', 'status'] as const,
  registers: [registry],
});

export type SkillRoute =
  | 'guarded'
  | 'reset'
  | 'greeting'
  | 'address'
  | 'spots'
  | 'weather'
  | 'event'
  | 'slot_filling'
  | 'recommendation'
  | 'callback_ack'
  | 'fallback';

export function observeSkill(route: SkillRoute, ms: number): void {
  skillRequests.inc({ route });
  skillLatency.observe(ms);
}

export function incRefinement(mode: 'sync' | 'callback', outcome: 'refined' | 'timeout' | 'error' | 'skipped' | 'expired'): void {
  llmRefinements.inc({ mode, outcome });
}

export function incCallbackDelivery(outcome: 'delivered' | 'failed'): void {
  callbackDeliveries.inc({ outcome });
}

export function observeExternal(target: string, status: string): void {
  externalRequests.inc({ target, status });
}

export async function getPrometheusText(): Promise<string> {
  return registry.metrics();
}

import path from 'node:path';
import { z } from 'zod';
import { loadSessionConfig, type SessionConfig } from './session.js';

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => {
      if (v === undefined || v.trim() === '') return fallback;
      return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
    });

const AppConfigSchema = z.object({
  port: z.coerce.number().int().min(0).default(8080),
  llm: z.object({
    apiKey: z.string().default(''),
    baseUrl: z.string().url().default('https://api.openai.com/v1'),
    model: z.string().min(1).default('gpt-4o-mini'),
    maxTokens: z.coerce.number().int().min(1).default(700),
    temperature: z.coerce.number().min(0).max(2).default(0.2),
    syncTimeoutMs: z.coerce.number().int().min(100).default(3500),
    fastMode: flag(false),
  }),
  callback: z.object({
    enabled: flag(true),
    validitySec: z.coerce.number().min(1).default(60),
    safetyMarginSec: z.coerce.number().min(0).default(10),
    llmMaxSec: z.coerce.number().min(1).default(40),
    retryDelayMs: z.coerce.number().int().min(0).default(800),
    timeoutMs: z.coerce.number().int().min(100).default(5000),
    concurrency: z.coerce.number().int().min(1).default(4),
    waitText: z.string().min(1).default('답변을 준비하고 있어요… 잠시만 기다려 주세요.'),
  }),
  guardEnabled: flag(true),
  dataDir: z.string().min(1),
  docsDir: z.string().min(1),
  search: z.object({
    enabled: flag(true),
    provider: z.enum(['naver', 'brave']).default('naver'),
    timeoutMs: z.coerce.number().int().min(100).default(4000),
    naverClientId: z.string().default(''),
    naverClientSecret: z.string().default(''),
    braveApiKey: z.string().default(''),
  }),
  debugRoutes: flag(false),
});

export type AppConfig = z.infer<typeof AppConfigSchema> & { session: SessionConfig };

const pick = (...values: Array<string | undefined>): string | undefined =>
  values.map((v) => v?.trim()).find((v) => v !== undefined && v !== '');

/**
 * Reads and validates the service configuration from the environment.
 * Throws a ZodError on invalid values so the process fails at start-up.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.parse({
    port: env.PORT || undefined,
    llm: {
      apiKey: pick(env.LLM_API_KEY, env.OPENAI_API_KEY),
      baseUrl: pick(env.LLM_PROVIDER_BASEURL),
      model: pick(env.LLM_MODEL, env.OPENAI_MODEL),
      maxTokens: pick(env.LLM_MAX_TOKENS, env.MAX_TOKENS),
      temperature: pick(env.LLM_TEMPERATURE),
      syncTimeoutMs: pick(env.SYNC_LLM_TIMEOUT_MS),
      fastMode: env.FAST_MODE,
    },
    callback: {
      enabled: env.CALLBACK_ENABLED,
      validitySec: pick(env.CALLBACK_VALIDITY_SEC),
      safetyMarginSec: pick(env.CALLBACK_SAFETY_MARGIN_SEC),
      llmMaxSec: pick(env.CALLBACK_LLM_MAX_SEC),
      retryDelayMs: pick(env.CALLBACK_RETRY_DELAY_MS),
      timeoutMs: pick(env.CALLBACK_TIMEOUT_MS),
      concurrency: pick(env.CALLBACK_CONCURRENCY),
      waitText: pick(env.CALLBACK_WAIT_TEXT),
    },
    guardEnabled: env.GUARD_ENABLED,
    dataDir: path.resolve(pick(env.DATA_DIR) ?? path.join(process.cwd(), 'data')),
    docsDir: path.resolve(pick(env.DOCS_DIR) ?? path.join(process.cwd(), 'docs')),
    search: {
      enabled: env.SEARCH_ENABLED,
      provider: pick(env.SEARCH_PROVIDER)?.toLowerCase(),
      timeoutMs: pick(env.SEARCH_TIMEOUT_MS),
      naverClientId: pick(env.NAVER_CLIENT_ID),
      naverClientSecret: pick(env.NAVER_CLIENT_SECRET),
      braveApiKey: pick(env.BRAVE_SEARCH_API_KEY),
    },
    debugRoutes: env.DEBUG_ROUTES,
  });
  return { ...parsed, session: loadSessionConfig(env) };
}

/**
 * LLM budget of a background callback job: the platform's callback validity
 * window minus the safety margin, clamped to [1s, llmMaxSec].
 */
export function callbackBudgetMs(cfg: AppConfig['callback']): number {
  const sec = Math.min(Math.max(cfg.validitySec - cfg.safetyMarginSec, 1), cfg.llmMaxSec);
  return Math.round(sec * 1000);
}

/** True when a completion call can be attempted at all. */
export function llmAvailable(cfg: AppConfig['llm']): boolean {
  return !cfg.fastMode && cfg.apiKey !== '';
}

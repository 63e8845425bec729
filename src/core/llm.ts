import { z } from 'zod';
import type { AppConfig } from '../config/app.js';
import { llmAvailable } from '../config/app.js';
import { postJSON } from '../util/fetch.js';
import { withBreaker } from '../util/resilience.js';
import type { Logger } from '../util/logging.js';
import type { Prompts } from './prompts.js';

export interface CompletionRequest {
  system: string;
  user: string;
  /** Draft the model should polish rather than answer from scratch. */
  draft?: string;
  /** Formatted web search results to ground the answer in. */
  webContext?: string;
  maxTokens?: number;
}

export interface LlmGateway {
  readonly enabled: boolean;
  /** Resolves with the completion text; throws on any failure. */
  complete(req: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

const ChatCompletion = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

// Upper bound for one HTTP exchange; callers impose their own deadline.
const HARD_TIMEOUT_MS = 60_000;

export function buildMessages(req: CompletionRequest, prompts: Pick<Prompts, 'refine' | 'webContext'>): ChatMessage[] {
  const messages: ChatMessage[] = [
    { role: 'system', content: req.system },
    { role: 'user', content: req.user || '안녕하세요' },
  ];
  if (req.webContext) {
    messages.push({ role: 'system', content: `${prompts.webContext}\n${req.webContext}` });
  }
  if (req.draft) {
    messages.push({ role: 'system', content: `${prompts.refine}\n${req.draft}` });
  }
  return messages;
}

/** Parses an OpenAI-style chat completion body into its first message text. */
export function completionText(body: unknown): string {
  const parsed = ChatCompletion.parse(body);
  const text = parsed.choices[0]?.message.content?.trim() ?? '';
  if (!text) throw new Error('empty_completion');
  return text;
}

/**
 * OpenAI-compatible chat completion client behind the `llm` circuit breaker.
 */
export function createLlmGateway(deps: {
  cfg: AppConfig['llm'];
  prompts: Pick<Prompts, 'refine' | 'webContext'>;
  log: Logger;
}): LlmGateway {
  const { cfg, prompts, log } = deps;
  const url = `${cfg.baseUrl.replace(/\/$/, '')}/chat/completions`;

  return {
    enabled: llmAvailable(cfg),

    async complete(req: CompletionRequest, signal?: AbortSignal): Promise<string> {
      if (!llmAvailable(cfg)) throw new Error('llm_disabled');
      const started = Date.now();
      const body = {
        model: cfg.model,
        messages: buildMessages(req, prompts),
        temperature: cfg.temperature,
        max_tokens: req.maxTokens ?? cfg.maxTokens,
      };
      const res = await withBreaker('llm', () =>
        postJSON(url, body, {
          target: 'llm',
          timeoutMs: HARD_TIMEOUT_MS,
          headers: { Authorization: `Bearer ${cfg.apiKey}` },
          signal,
        }),
      );
      const text = completionText(res);
      log.debug({ model: cfg.model, ms: Date.now() - started, chars: text.length }, 'LLM completion');
      return text;
    },
  };
}

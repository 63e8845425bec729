import Bottleneck from 'bottleneck';
import type { Logger } from '../util/logging.js';
import { boundedAttempt, retryOnce } from '../util/resilience.js';
import { incCallbackDelivery, incRefinement } from '../util/metrics.js';
import { toStdError } from '../tools/errors.js';
import type { CallbackSender } from '../tools/callback.js';
import { simpleText } from './composers.js';
import type { LlmGateway } from './llm.js';

export interface CallbackJob {
  userId: string;
  utterance: string;
  draft: string;
  callbackUrl: string;
  /**
   * Epoch ms by which the refinement must finish, fixed at enqueue time so
   * that time spent waiting in the queue counts against it.
   */
  deadline: number;
}

export type CallbackOutcome = { delivered: boolean; refined: boolean; text: string };

export interface CallbackDispatcher {
  /** Queues the job and returns immediately; the job is never cancelled. */
  enqueue(job: CallbackJob): void;
  /** Resolves once every queued job has finished. */
  onIdle(): Promise<void>;
  pending(): number;
}

export interface DispatcherDeps {
  llm: LlmGateway;
  sender: CallbackSender;
  system: string;
  cfg: { concurrency: number; retryDelayMs: number; maxTokens?: number };
  log: Logger;
}

/**
 * Runs one job: refine the draft within what is left of its deadline (falling
 * back to the draft), then POST the text to the callback URL with a single
 * retry. A job whose deadline already passed in the queue posts the draft.
 */
export async function runCallbackJob(job: CallbackJob, deps: DispatcherDeps): Promise<CallbackOutcome> {
  const { llm, sender, system, cfg, log } = deps;
  let text = job.draft;
  let refined = false;

  const budgetMs = job.deadline - Date.now();

  if (!llm.enabled) {
    incRefinement('callback', 'skipped');
  } else if (budgetMs <= 0) {
    incRefinement('callback', 'expired');
    log.warn({ userId: job.userId, lateMs: -budgetMs }, 'Callback deadline passed in queue, sending draft');
  } else {
    const res = await boundedAttempt(
      (signal) => llm.complete({ system, user: job.utterance, draft: job.draft, maxTokens: cfg.maxTokens }, signal),
      budgetMs,
    );
    if (res.ok) {
      text = res.value;
      refined = true;
      incRefinement('callback', 'refined');
    } else {
      incRefinement('callback', res.reason);
      log.warn(
        {
          userId: job.userId,
          budgetMs,
          reason: res.reason,
          ...(res.reason === 'error' ? { err: toStdError(res.error, 'llm') } : {}),
        },
        'Callback refinement fell back to draft',
      );
    }
  }

  try {
    await retryOnce(() => sender.send(job.callbackUrl, simpleText(text)), cfg.retryDelayMs);
    incCallbackDelivery('delivered');
    log.info({ userId: job.userId, refined }, 'Callback delivered');
    return { delivered: true, refined, text };
  } catch (err: unknown) {
    incCallbackDelivery('failed');
    log.error({ userId: job.userId, callbackUrl: job.callbackUrl, err: toStdError(err, 'callback') }, 'Callback delivery failed');
    return { delivered: false, refined, text };
  }
}

export function createCallbackDispatcher(deps: DispatcherDeps): CallbackDispatcher {
  const limiter = new Bottleneck({ maxConcurrent: deps.cfg.concurrency });
  const inflight = new Set<Promise<unknown>>();

  return {
    enqueue(job: CallbackJob): void {
      const task = limiter
        .schedule(() => runCallbackJob(job, deps))
        .catch((err: unknown) => {
          deps.log.error({ userId: job.userId, err: toStdError(err, 'callback_job') }, 'Callback job crashed');
        });
      inflight.add(task);
      void task.finally(() => inflight.delete(task));
    },

    async onIdle(): Promise<void> {
      while (inflight.size > 0) {
        await Promise.all([...inflight]);
      }
    },

    pending(): number {
      return inflight.size;
    },
  };
}

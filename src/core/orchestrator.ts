import type { AppConfig } from '../config/app.js';
import { callbackBudgetMs } from '../config/app.js';
import type { Logger } from '../util/logging.js';
import { boundedAttempt } from '../util/resilience.js';
import { incRefinement, observeSkill, type SkillRoute } from '../util/metrics.js';
import type { SkillInput, SkillResponseT, TemplateResponseT } from '../schemas/kakao.js';
import { POPULAR_SPOTS } from '../data/spots.js';
import { toStdError } from '../tools/errors.js';
import { formatWebContext, pickWeatherLinks, type SearchGateway, type SearchResult } from '../tools/search.js';
import { guessLang } from './address.js';
import type { CallbackDispatcher } from './callback_dispatcher.js';
import { callbackAck, directionsReply, simpleText, spotCarousel, weatherReply } from './composers.js';
import { classify } from './intent.js';
import { EMPTY_KNOWLEDGE, type KnowledgeSnapshot } from './knowledge.js';
import type { LlmGateway } from './llm.js';
import type { Prompts } from './prompts.js';
import { buildDraft } from './rule_engine.js';
import type { SessionStore } from './session_store.js';
import { describeSlots, extractSlots, firstMissingSlot, slotQuestion } from './slots.js';

export const REFUSAL_TEXT = '비밀이에요 🤫 공식적으로 공개되지 않은 정보입니다.';

export const GREETING_TEXT = [
  '안녕하세요! 제주 여행 코스를 함께 짜 드릴게요 🍊',
  '아래 내용을 편하게 알려주세요.',
  '1) 몇 박 일정인가요?',
  '2) 숙소 유형 (호텔/리조트/펜션/게스트하우스/풀빌라/캠핑)',
  '3) 여행 분위기 (바다·해변 / 산·자연 / 도시·문화)',
  '4) 음식 취향 (해산물/흑돼지·고기/카페·디저트/한식·향토)',
  '5) 함께 가는 분 (혼자/커플/친구/가족/부모님)',
].join('\n');

export const EVENT_NOTICE =
  '실시간 운영 정보는 지금 확인하기 어려워요. 비짓제주(visitjeju.net)나 해당 기관의 공식 공지를 확인해 주세요.';

/** Log label for turns without a user id; such turns keep no session. */
const ANONYMOUS_USER = 'anonymous';

export interface OrchestratorDeps {
  config: Pick<AppConfig, 'llm' | 'callback' | 'guardEnabled'>;
  knowledge: KnowledgeSnapshot;
  prompts: Prompts;
  sessions: SessionStore;
  llm: LlmGateway;
  search: SearchGateway;
  dispatcher: CallbackDispatcher;
  log: Logger;
}

export interface Orchestrator {
  /** Answers one webhook turn. Never rejects. */
  handle(input: SkillInput): Promise<SkillResponseT>;
}

type Turn = { route: SkillRoute; response: SkillResponseT };

export function summaryLine(known: string): string {
  return `✅ 선택하신 조건: ${known}`;
}

export function slotFillingText(known: string, question: string): string {
  return known ? `지금까지 정리한 조건: ${known}\n\n${question}` : question;
}

export function eventFallbackText(results: readonly SearchResult[]): string {
  if (results.length === 0) return EVENT_NOTICE;
  const lines = results.map((r) => `- ${r.title}\n  ${r.link}`);
  return ['관련 안내를 찾았어요. 최신 내용은 링크에서 확인해 주세요.', ...lines].join('\n');
}

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { config, knowledge, prompts, sessions, llm, search, dispatcher, log } = deps;

  async function recommend(input: SkillInput, userId: string, known: string): Promise<Turn> {
    const draft = `${summaryLine(known)}\n\n${buildDraft(knowledge).text}`;

    if (config.callback.enabled && input.callbackUrl) {
      dispatcher.enqueue({
        userId,
        utterance: input.utterance,
        draft,
        callbackUrl: input.callbackUrl,
        deadline: Date.now() + callbackBudgetMs(config.callback),
      });
      return { route: 'callback_ack', response: callbackAck(config.callback.waitText) };
    }

    if (!llm.enabled) {
      incRefinement('sync', 'skipped');
      return { route: 'recommendation', response: simpleText(draft) };
    }

    const res = await boundedAttempt(
      (signal) => llm.complete({ system: prompts.system, user: input.utterance, draft }, signal),
      config.llm.syncTimeoutMs,
    );
    if (res.ok) {
      incRefinement('sync', 'refined');
      return { route: 'recommendation', response: simpleText(res.value) };
    }
    incRefinement('sync', res.reason);
    log.warn(
      {
        userId,
        timeoutMs: config.llm.syncTimeoutMs,
        reason: res.reason,
        ...(res.reason === 'error' ? { err: toStdError(res.error, 'llm') } : {}),
      },
      'Sync refinement fell back to draft',
    );
    return { route: 'recommendation', response: simpleText(draft) };
  }

  async function answerEvent(utterance: string): Promise<TemplateResponseT> {
    const results = await search.search(utterance, 3);
    if (!llm.enabled) return simpleText(eventFallbackText(results));

    const webContext = formatWebContext(results);
    const res = await boundedAttempt(
      (signal) =>
        llm.complete({ system: prompts.system, user: utterance, ...(webContext ? { webContext } : {}) }, signal),
      config.llm.syncTimeoutMs,
    );
    if (res.ok) return simpleText(res.value);
    log.warn({ reason: res.reason, results: results.length }, 'Event answer fell back to search results');
    return simpleText(eventFallbackText(results));
  }

  async function route(input: SkillInput): Promise<Turn> {
    const utterance = input.utterance;
    const stateless = input.userId === '';
    const userId = input.userId || ANONYMOUS_USER;
    const c = classify(utterance, { guardEnabled: config.guardEnabled });

    switch (c.intent) {
      case 'internal_probe':
        log.info({ userId }, 'Internal probe refused');
        return { route: 'guarded', response: simpleText(REFUSAL_TEXT) };
      case 'reset':
        if (!stateless) await sessions.reset(userId);
        return { route: 'reset', response: simpleText(slotQuestion('nights')) };
      case 'short_greeting':
        return { route: 'greeting', response: simpleText(GREETING_TEXT) };
      case 'address_pair':
        return {
          route: 'address',
          response: directionsReply(c.addresses.from, c.addresses.to, guessLang(utterance)),
        };
      case 'spot_request':
        return { route: 'spots', response: spotCarousel(POPULAR_SPOTS) };
      case 'weather_request': {
        const results = await search.search(utterance, 3);
        return { route: 'weather', response: weatherReply(pickWeatherLinks(results), guessLang(utterance)) };
      }
      case 'event_request':
        return { route: 'event', response: await answerEvent(utterance) };
      case 'generic':
        break;
    }

    const extracted = extractSlots(utterance);
    const slots = stateless ? extracted : (await sessions.update(userId, extracted)).slots;
    const known = describeSlots(slots);
    const missing = firstMissingSlot(slots);
    if (missing) {
      return { route: 'slot_filling', response: simpleText(slotFillingText(known, slotQuestion(missing))) };
    }
    return recommend(input, userId, known);
  }

  return {
    async handle(input: SkillInput): Promise<SkillResponseT> {
      const started = Date.now();
      try {
        const turn = await route(input);
        observeSkill(turn.route, Date.now() - started);
        log.debug({ route: turn.route, ms: Date.now() - started }, 'Skill turn handled');
        return turn.response;
      } catch (err: unknown) {
        observeSkill('fallback', Date.now() - started);
        log.error({ userId: input.userId, err: toStdError(err, 'orchestrator') }, 'Skill turn failed');
        return simpleText(buildDraft(EMPTY_KNOWLEDGE).text);
      }
    },
  };
}

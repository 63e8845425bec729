import { parseAddressPair, type AddressPair } from './address.js';

export type Intent =
  | 'internal_probe'
  | 'reset'
  | 'short_greeting'
  | 'address_pair'
  | 'spot_request'
  | 'weather_request'
  | 'event_request'
  | 'generic';

export type Classification =
  | { intent: 'address_pair'; addresses: AddressPair }
  | { intent: Exclude<Intent, 'address_pair'> };

export interface KeywordRule {
  intent: Exclude<Intent, 'address_pair' | 'short_greeting' | 'generic'>;
  keywords: readonly string[];
}

export const PROBE_KEYWORDS = [
  '지침', '룰엔진', '만들어졌', 'internal', 'prompt', '프롬프트', '시스템', 'csv', '데이터셋', '코드 보여줘', '내용 보여줘',
] as const;

export const RESET_KEYWORDS = ['처음부터', '다시 시작', '초기화', '리셋', 'reset', 'restart'] as const;

export const GREETING_TOKENS: readonly string[] = ['안녕', '안녕하세요', '하이', 'ㅎㅇ', 'hi', 'hello', 'hey', '시작', '도움말'];

export const SPOT_KEYWORDS = ['명소', '관광지', '볼만한 곳', '가볼만한', '어디가 좋아', '핫플'] as const;

export const WEATHER_KEYWORDS = ['날씨', '기온', '강수', '태풍', 'weather'] as const;

export const EVENT_KEYWORDS = [
  '축제', '행사', '공연', '운항', '운행', '실시간', '시간표', '공지', '폐장', '휴무', '입장료', '요금', '대회',
  '오늘', '이번주', '오늘밤', 'festival', 'event', 'today', 'tonight', 'hours',
] as const;

// Evaluated after the greeting and address checks, in this order.
export const KEYWORD_RULES: readonly KeywordRule[] = [
  { intent: 'spot_request', keywords: SPOT_KEYWORDS },
  { intent: 'weather_request', keywords: WEATHER_KEYWORDS },
  { intent: 'event_request', keywords: EVENT_KEYWORDS },
];

const containsAny = (text: string, keywords: readonly string[]): boolean => {
  const lower = text.toLowerCase();
  return keywords.some((k) => lower.includes(k));
};

export function isInternalProbe(utterance: string): boolean {
  return utterance !== '' && containsAny(utterance, PROBE_KEYWORDS);
}

export function isResetCommand(utterance: string): boolean {
  return containsAny(utterance, RESET_KEYWORDS);
}

export function isShortGreeting(utterance: string): boolean {
  const compact = utterance.replace(/\s+/g, '').toLowerCase();
  return GREETING_TOKENS.includes(compact);
}

/**
 * Routes an utterance to a handling path. Precedence: probe guard, reset,
 * greeting, address pair, keyword rules, then generic.
 */
export function classify(utterance: string, opts: { guardEnabled?: boolean } = {}): Classification {
  const text = (utterance ?? '').trim();
  if ((opts.guardEnabled ?? true) && isInternalProbe(text)) return { intent: 'internal_probe' };
  if (isResetCommand(text)) return { intent: 'reset' };
  if (isShortGreeting(text)) return { intent: 'short_greeting' };

  const addresses = parseAddressPair(text);
  if (addresses) return { intent: 'address_pair', addresses };

  const rule = KEYWORD_RULES.find((r) => containsAny(text, r.keywords));
  if (rule) return { intent: rule.intent };
  return { intent: 'generic' };
}

import type { BlacklistEntry, CongestionRule, KnowledgeSnapshot, PoiRecord } from './knowledge.js';

export const TOP_N = 3;
export const SECTION_MAX_LINES = 5;

export const SECTION_TIPS = '📌 여행 기본 팁';
export const SECTION_COURSES = '📍 추천 여행지 & 코스 아이디어';
export const SECTION_FOOD = '🍽️ 맛집 추천';
export const CLOSING_LINE = '최신 운영시간과 예약은 공식 안내 확인이 필요합니다.';
export const PLACEHOLDER_COURSE = '- 반나절 2~3곳 위주로 이동 동선 최소화';
export const CONGESTION_TIP = '혼잡 구간이 있어 대체 시간대/인근 코스를 권장해요.';

const BASE_TIPS = [
  '이동 시간은 여유 있게 30~40분 단위로 잡아주세요.',
  '바람이 강할 수 있어 바람막이/우산을 준비하세요.',
  '주요 스팟은 주차 대기가 발생할 수 있어요.',
];

const FOOD_LINES = [
  '- 인근 해산물/한식 위주로 동선 맞춰 추천',
  '- 카페·디저트 1곳 포함해 휴식 동선 구성',
];

export interface DraftRecommendation {
  text: string;
  congestionNotice: boolean;
  candidates: PoiRecord[];
}

const norm = (s: string): string => s.trim().toLowerCase();

/** Top-N from the primary list, or from the sample list when the primary is empty. */
export function pickCandidates(knowledge: KnowledgeSnapshot, n = TOP_N): PoiRecord[] {
  const source = knowledge.primaryCourses.length > 0 ? knowledge.primaryCourses : knowledge.sampleCourses;
  return source.slice(0, n);
}

/** Drops candidates whose id or name is blacklisted with high severity. */
export function filterBlacklist(pois: readonly PoiRecord[], blacklist: readonly BlacklistEntry[]): PoiRecord[] {
  const blocked = new Set<string>();
  for (const entry of blacklist) {
    if (norm(entry.severity) !== 'high') continue;
    const key = norm(entry.id || entry.name);
    if (key) blocked.add(key);
  }
  return pois.filter((p) => {
    const keys = [p.id, p.name].map(norm).filter((k) => k !== '');
    return !keys.some((k) => blocked.has(k));
  });
}

/**
 * Drops candidates in high-congestion areas. The notice flag reports whether
 * anything would be dropped; when everything would be, the unfiltered list
 * is returned instead.
 */
export function applyCongestionRules(
  pois: readonly PoiRecord[],
  rules: readonly CongestionRule[],
): { pois: PoiRecord[]; notice: boolean } {
  const high = new Set(
    rules.filter((r) => norm(r.level) === 'high').map((r) => r.area.trim()).filter((a) => a !== ''),
  );
  const filtered = pois.filter((p) => !high.has(p.area.trim()));
  const notice = filtered.length < pois.length;
  return { pois: filtered.length > 0 ? filtered : [...pois], notice };
}

function section(title: string, lines: string[]): string {
  return `${title}\n${lines.slice(0, SECTION_MAX_LINES).join('\n')}`;
}

/**
 * Deterministic draft recommendation from the current knowledge snapshot.
 * Missing data degrades to the placeholder course line.
 */
export function buildDraft(knowledge: KnowledgeSnapshot): DraftRecommendation {
  const picked = filterBlacklist(pickCandidates(knowledge), knowledge.blacklist);
  const { pois, notice } = applyCongestionRules(picked, knowledge.congestion);

  const tips = notice ? [CONGESTION_TIP, ...BASE_TIPS] : [...BASE_TIPS];
  const courseLines = pois.length
    ? pois.map((p) => `- ${p.name || '추천 코스'} (${p.area}) — 운영시간은 공식 안내 확인 필요`)
    : [PLACEHOLDER_COURSE];

  const text = [
    section(SECTION_TIPS, tips),
    section(SECTION_COURSES, courseLines),
    section(SECTION_FOOD, FOOD_LINES),
    CLOSING_LINE,
  ].join('\n\n');

  return { text, congestionNotice: notice, candidates: pois };
}

/**
 * Trip-preference slots and their extraction from free text.
 *
 * Each slot is matched by an ordered table of (pattern, canonical value)
 * rules; the first rule that matches wins. Slots with no match are left
 * undefined so that merging never overwrites a value known from an earlier
 * turn.
 */

export const SLOT_ORDER = ['nights', 'lodging', 'vibe', 'food', 'group'] as const;

export type SlotName = (typeof SLOT_ORDER)[number];

export type TripSlots = Record<SlotName, string | undefined>;

export type PartialSlots = Partial<TripSlots>;

export interface SlotRule {
  pattern: RegExp;
  value: string;
}

export const EMPTY_SLOTS: Readonly<TripSlots> = Object.freeze({
  nights: undefined,
  lodging: undefined,
  vibe: undefined,
  food: undefined,
  group: undefined,
});

export const LODGING_RULES: readonly SlotRule[] = [
  { pattern: /풀빌라/, value: '풀빌라' },
  { pattern: /게스트\s*하우스|게하/, value: '게스트하우스' },
  { pattern: /호텔|hotel/i, value: '호텔' },
  { pattern: /리조트|resort/i, value: '리조트' },
  { pattern: /펜션/, value: '펜션' },
  { pattern: /에어비앤비|airbnb|독채/i, value: '독채·에어비앤비' },
  { pattern: /캠핑|글램핑/, value: '캠핑' },
];

// Sea before mountain before city: the first bucket hit wins.
export const VIBE_RULES: readonly SlotRule[] = [
  { pattern: /바다|해변|해수욕|해안|비치|오션|beach|\bsea\b/i, value: '바다·해변' },
  { pattern: /등산|한라산|오름|숲|자연|트레킹|올레|(?<![가-힣])산(?:이|을|에|과|도|으로)?(?![가-힣])|mountain|nature/i, value: '산·자연' },
  { pattern: /도시|시내|문화|박물관|미술관|전시|쇼핑|city|culture/i, value: '도시·문화' },
];

export const FOOD_RULES: readonly SlotRule[] = [
  { pattern: /해산물|해물|회덮밥|전복|갈치|고등어|seafood/i, value: '해산물' },
  { pattern: /흑돼지|고기|돼지|bbq/i, value: '흑돼지·고기' },
  { pattern: /카페|디저트|베이커리|빵집|cafe|dessert/i, value: '카페·디저트' },
  { pattern: /이색|특별한\s*경험|체험|로컬\s*맛집/, value: '이색 체험' },
  { pattern: /한식|향토|국수|백반/, value: '한식·향토' },
];

// Child-related words count as family even without the word 가족.
export const GROUP_RULES: readonly SlotRule[] = [
  { pattern: /아이(?!스)|아기|유아|어린이|키즈|애들|자녀/, value: '가족(아이 동반)' },
  { pattern: /가족|family/i, value: '가족(아이 동반)' },
  { pattern: /부모님|효도/, value: '부모님' },
  { pattern: /커플|연인|신혼|부부|couple/i, value: '커플' },
  { pattern: /친구|우정|friends?/i, value: '친구' },
  { pattern: /혼자|나홀로|솔로|solo/i, value: '혼자' },
];

const NIGHTS_PATTERN = /(\d+)\s*(?:박|nights?\b)/i;

export function emptySlots(): TripSlots {
  return { ...EMPTY_SLOTS };
}

/** Slot-wise merge where only non-empty values in `patch` overwrite. */
export function mergeSlots(base: TripSlots, patch: PartialSlots): TripSlots {
  const out: TripSlots = { ...base };
  for (const name of SLOT_ORDER) {
    const value = patch[name]?.trim();
    if (value) out[name] = value;
  }
  return out;
}

/** First rule whose pattern matches, as its canonical value. */
export function matchFirst(rules: readonly SlotRule[], text: string): string | undefined {
  return rules.find((r) => r.pattern.test(text))?.value;
}

export function extractNights(text: string): string | undefined {
  const m = NIGHTS_PATTERN.exec(text);
  if (!m) return undefined;
  return String(Number(m[1]));
}

/**
 * Pulls every slot it can recognise out of one utterance. Unrecognised
 * slots are undefined.
 */
export function extractSlots(utterance: string): TripSlots {
  const text = utterance ?? '';
  return {
    nights: extractNights(text),
    lodging: matchFirst(LODGING_RULES, text),
    vibe: matchFirst(VIBE_RULES, text),
    food: matchFirst(FOOD_RULES, text),
    group: matchFirst(GROUP_RULES, text),
  };
}

export function firstMissingSlot(slots: TripSlots): SlotName | undefined {
  return SLOT_ORDER.find((name) => slots[name] === undefined);
}

export const SLOT_QUESTIONS: Readonly<Record<SlotName, string>> = {
  nights: '몇 박 일정이신가요? (예: 1박, 2박, 3박)',
  lodging: '숙소 유형은 어떻게 되세요? (호텔/리조트/펜션/게스트하우스/풀빌라/캠핑)',
  vibe: '여행 분위기는 어느 쪽이 좋으세요? (바다·해변 / 산·자연 / 도시·문화)',
  food: '음식 취향을 알려주세요. (해산물/흑돼지·고기/카페·디저트/한식·향토/이색 체험)',
  group: '누구와 함께 가시나요? (혼자/커플/친구/가족(아이 동반)/부모님)',
};

export function slotQuestion(name: SlotName): string {
  return SLOT_QUESTIONS[name];
}

function displayValue(name: SlotName, value: string): string {
  return name === 'nights' ? `${value}박` : value;
}

/** Known slot values in priority order, joined for display. Empty when none are known. */
export function describeSlots(slots: TripSlots): string {
  return SLOT_ORDER.flatMap((name) => {
    const value = slots[name];
    return value === undefined ? [] : [displayValue(name, value)];
  }).join(' · ');
}

import { describe, expect, it } from '@jest/globals';
import {
  SLOT_QUESTIONS,
  describeSlots,
  emptySlots,
  extractNights,
  extractSlots,
  firstMissingSlot,
  mergeSlots,
  slotQuestion,
} from '../../../src/core/slots.js';

describe('extractSlots', () => {
  it('pulls four slots out of a comma separated answer', () => {
    expect(extractSlots('2박, 호텔, 바다, 해산물')).toEqual({
      nights: '2',
      lodging: '호텔',
      vibe: '바다·해변',
      food: '해산물',
      group: undefined,
    });
  });

  it('leaves every slot unset when nothing is recognised', () => {
    const slots = extractSlots('음 글쎄요');
    expect(Object.values(slots).every((v) => v === undefined)).toBe(true);
  });

  it('checks sea before mountain before city', () => {
    expect(extractSlots('바다도 좋고 산도 좋아').vibe).toBe('바다·해변');
    expect(extractSlots('도시랑 등산').vibe).toBe('산·자연');
    expect(extractSlots('시내 박물관').vibe).toBe('도시·문화');
  });

  it('canonicalises cafe and dessert into one value', () => {
    expect(extractSlots('카페 투어').food).toBe('카페·디저트');
    expect(extractSlots('디저트 맛집').food).toBe('카페·디저트');
    expect(extractSlots('이색 체험 맛집').food).toBe('이색 체험');
  });

  it('treats child words as family', () => {
    expect(extractSlots('아이랑 같이 가요').group).toBe('가족(아이 동반)');
    expect(extractSlots('가족 여행').group).toBe('가족(아이 동반)');
    expect(extractSlots('아이스크림 먹고 싶다').group).toBeUndefined();
  });

  it('reads nights in both languages', () => {
    expect(extractNights('3 nights please')).toBe('3');
    expect(extractNights('02박')).toBe('2');
    expect(extractNights('2일')).toBeUndefined();
  });
});

describe('mergeSlots', () => {
  const known = { nights: '2', lodging: '호텔', vibe: undefined, food: undefined, group: undefined };

  it('is unchanged by an all-unset patch', () => {
    expect(mergeSlots(known, emptySlots())).toEqual(known);
    expect(mergeSlots(known, extractSlots('음'))).toEqual(known);
  });

  it('overwrites with non-empty values only', () => {
    expect(mergeSlots(known, { nights: '3', lodging: '  ' })).toEqual({ ...known, nights: '3' });
  });
});

describe('slot questions', () => {
  it('asks for the first missing slot in priority order', () => {
    expect(firstMissingSlot(emptySlots())).toBe('nights');
    expect(
      firstMissingSlot({ nights: '2', lodging: '호텔', vibe: '바다·해변', food: undefined, group: '커플' }),
    ).toBe('food');
    expect(
      firstMissingSlot({ nights: '2', lodging: '호텔', vibe: '바다·해변', food: '해산물', group: '커플' }),
    ).toBeUndefined();
    expect(slotQuestion('group')).toBe(SLOT_QUESTIONS.group);
  });

  it('describes known slots in order', () => {
    expect(
      describeSlots({ nights: '2', lodging: '호텔', vibe: '바다·해변', food: '해산물', group: undefined }),
    ).toBe('2박 · 호텔 · 바다·해변 · 해산물');
    expect(describeSlots(emptySlots())).toBe('');
  });
});

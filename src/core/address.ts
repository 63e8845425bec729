export type ReplyLang = 'ko' | 'en';

export interface AddressPair {
  from: string;
  to: string;
}

const LATIN_PAIR = /(.+?)\s*(?:\bto\b|->|→|⇒)\s*(.+)/i;
const KOREAN_PAIR = /(.+?)\s*에서\s*(.+?)\s*까지/;

// Two-syllable Korean place names (서울, 부산) are complete addresses.
const MIN_LATIN_LENGTH = 3;
const MIN_KOREAN_LENGTH = 2;

function accept(m: RegExpExecArray | null, minLength: number): AddressPair | undefined {
  if (!m) return undefined;
  const from = (m[1] ?? '').trim();
  const to = (m[2] ?? '').trim();
  if (from.length < minLength || to.length < minLength) return undefined;
  return { from, to };
}

/**
 * Parses "A to B", "A -> B", "A → B" or "A에서 B까지" into two addresses.
 */
export function parseAddressPair(utterance: string): AddressPair | undefined {
  const text = (utterance ?? '').trim();
  if (!text) return undefined;
  return accept(LATIN_PAIR.exec(text), MIN_LATIN_LENGTH) ?? accept(KOREAN_PAIR.exec(text), MIN_KOREAN_LENGTH);
}

/** Korean when the text contains any Hangul syllable. */
export function guessLang(text: string): ReplyLang {
  return /[가-힣]/.test(text ?? '') ? 'ko' : 'en';
}

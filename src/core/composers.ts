import type { ReplyLang } from './address.js';
import type { Spot } from '../data/spots.js';
import type {
  BasicCardT,
  CallbackAckResponseT,
  OutputT,
  TemplateResponseT,
  WebLinkButtonT,
} from '../schemas/kakao.js';

const VERSION = '2.0' as const;

export const MARKER_IMAGE_URL = 'https://t1.daumcdn.net/localimg/localimages/07/mapapidoc/marker_red.png';
export const NAVER_WEATHER_SEARCH_URL =
  'https://search.naver.com/search.naver?query=%EC%A0%9C%EC%A3%BC+%EB%82%A0%EC%94%A8';

export function envelope(outputs: OutputT[]): TemplateResponseT {
  return { version: VERSION, template: { outputs } };
}

export function simpleText(text: string): TemplateResponseT {
  return envelope([{ simpleText: { text } }]);
}

export function textWithCard(text: string, card: BasicCardT): TemplateResponseT {
  return envelope([{ simpleText: { text } }, { basicCard: card }]);
}

export function textWithCarousel(text: string, cards: BasicCardT[]): TemplateResponseT {
  return envelope([{ simpleText: { text } }, { carousel: { type: 'basicCard', items: cards } }]);
}

/** Tells the platform that the real answer follows on the callback URL. */
export function callbackAck(waitText: string): CallbackAckResponseT {
  return { version: VERSION, useCallback: true, data: { text: waitText } };
}

export function webLink(label: string, url: string): WebLinkButtonT {
  return { action: 'webLink', label, webLinkUrl: url };
}

export function basicCard(
  title: string,
  description: string,
  buttons: WebLinkButtonT[],
  imageUrl?: string,
): BasicCardT {
  return { title, description, buttons, ...(imageUrl ? { thumbnail: { imageUrl } } : {}) };
}

/** Form-style encoding: spaces become '+'. */
export function encodeQuery(value: string): string {
  return encodeURIComponent(value.trim()).replace(/%20/g, '+');
}

export function directionLinks(from: string, to: string): { google: string; kakao: string; apple: string } {
  const o = encodeQuery(from);
  const d = encodeQuery(to);
  return {
    google: `https://www.google.com/maps/dir/?api=1&origin=${o}&destination=${d}`,
    kakao: `https://map.kakao.com/?sName=${o}&eName=${d}`,
    apple: `https://maps.apple.com/?saddr=${o}&daddr=${d}`,
  };
}

export function directionsCard(from: string, to: string, lang: ReplyLang): BasicCardT {
  const links = directionLinks(from, to);
  const route = `${from.trim()} → ${to.trim()}`;
  if (lang === 'ko') {
    return basicCard(
      '길찾기',
      `${route}\n원하는 지도에서 열어보세요.`,
      [webLink('Google 지도', links.google), webLink('카카오맵(웹)', links.kakao), webLink('Apple 지도', links.apple)],
      MARKER_IMAGE_URL,
    );
  }
  return basicCard(
    'Directions',
    `${route}\nOpen in your preferred map.`,
    [webLink('Google Maps', links.google), webLink('Kakao Map (Web)', links.kakao), webLink('Apple Maps', links.apple)],
    MARKER_IMAGE_URL,
  );
}

export function directionsReply(from: string, to: string, lang: ReplyLang): TemplateResponseT {
  const explain = lang === 'ko' ? '아래 버튼으로 지도에서 길찾기를 확인하세요.' : 'Tap a button below to open directions.';
  return textWithCard(explain, directionsCard(from, to, lang));
}

export function spotCarousel(spots: readonly Spot[]): TemplateResponseT {
  const cards = spots.map((s) => basicCard(s.title, s.description, [webLink('지도 보기', s.mapUrl)], s.imageUrl));
  return textWithCarousel(`제주 인기 명소 TOP ${spots.length}를 추천드려요 🌴`, cards);
}

export interface WeatherLinks {
  kma?: string;
  naver?: string;
}

export function weatherReply(links: WeatherLinks, lang: ReplyLang): TemplateResponseT {
  const buttons: WebLinkButtonT[] = [];
  if (links.kma) buttons.push(webLink('기상청 날씨', links.kma));
  if (links.naver) buttons.push(webLink('네이버 날씨', links.naver));
  if (buttons.length === 0) buttons.push(webLink('네이버 검색', NAVER_WEATHER_SEARCH_URL));

  if (lang === 'ko') {
    return textWithCard(
      '아래 버튼을 눌러 확인하세요.',
      basicCard('제주시 실시간 날씨', '공식 페이지에서 현재 기온·강수·바람 정보를 확인하세요.', buttons),
    );
  }
  return textWithCard(
    'Tap a button to check live weather.',
    basicCard('Jeju City Weather (Live)', 'Open the official page for real-time temperature, precipitation and wind.', buttons),
  );
}

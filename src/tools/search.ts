import { z } from 'zod';
import type { AppConfig } from '../config/app.js';
import { fetchJSON } from '../util/fetch.js';
import { withBreaker } from '../util/resilience.js';
import type { Logger } from '../util/logging.js';
import type { WeatherLinks } from '../core/composers.js';
import { toStdError } from './errors.js';

export interface SearchResult {
  title: string;
  snippet: string;
  link: string;
}

export interface SearchGateway {
  readonly enabled: boolean;
  /** Never throws: disabled search, missing keys and failures all yield []. */
  search(query: string, maxResults?: number): Promise<SearchResult[]>;
}

const NaverResponse = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(''),
        link: z.string().default(''),
        description: z.string().default(''),
      }),
    )
    .default([]),
});

const BraveResponse = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().default(''),
            url: z.string().default(''),
            description: z.string().default(''),
          }),
        )
        .default([]),
    })
    .optional(),
});

const stripTags = (s: string): string => s.replace(/<[^>]+>/g, '').trim();

export function parseNaverResults(body: unknown, size: number): SearchResult[] {
  return NaverResponse.parse(body)
    .items.slice(0, size)
    .map((it) => ({ title: stripTags(it.title), snippet: stripTags(it.description), link: it.link }));
}

export function parseBraveResults(body: unknown, size: number): SearchResult[] {
  return (BraveResponse.parse(body).web?.results ?? [])
    .slice(0, size)
    .map((it) => ({ title: stripTags(it.title), snippet: stripTags(it.description), link: it.url }));
}

/** Numbered plain-text block of results for the LLM, empty for no results. */
export function formatWebContext(results: readonly SearchResult[]): string {
  return results.map((r, i) => `[${i + 1}] ${r.title}\n${r.snippet}\n${r.link}`).join('\n\n');
}

/** First KMA and Naver weather links among the results. */
export function pickWeatherLinks(results: readonly SearchResult[]): WeatherLinks {
  const out: WeatherLinks = {};
  for (const r of results) {
    if (!out.kma && (r.link.includes('weather.go.kr') || r.link.includes('kma.go.kr'))) out.kma = r.link;
    if (!out.naver && r.link.includes('search.naver.com')) out.naver = r.link;
  }
  return out;
}

export function createSearchGateway(deps: { cfg: AppConfig['search']; log: Logger }): SearchGateway {
  const { cfg, log } = deps;
  const hasKeys =
    cfg.provider === 'naver' ? Boolean(cfg.naverClientId && cfg.naverClientSecret) : Boolean(cfg.braveApiKey);
  const enabled = cfg.enabled && hasKeys;

  async function naver(query: string, size: number): Promise<SearchResult[]> {
    const params = new URLSearchParams({ query, display: String(Math.max(1, Math.min(size, 5))), start: '1' });
    const body = await fetchJSON(`https://openapi.naver.com/v1/search/webkr.json?${params}`, {
      target: 'naver_search',
      timeoutMs: cfg.timeoutMs,
      headers: {
        'X-Naver-Client-Id': cfg.naverClientId,
        'X-Naver-Client-Secret': cfg.naverClientSecret,
        Accept: 'application/json',
      },
    });
    return parseNaverResults(body, size);
  }

  async function brave(query: string, size: number): Promise<SearchResult[]> {
    const params = new URLSearchParams({ q: query, count: String(Math.max(1, Math.min(size, 20))) });
    const body = await fetchJSON(`https://api.search.brave.com/res/v1/web/search?${params}`, {
      target: 'brave_search',
      timeoutMs: cfg.timeoutMs,
      headers: { 'X-Subscription-Token': cfg.braveApiKey, Accept: 'application/json' },
    });
    return parseBraveResults(body, size);
  }

  return {
    enabled,

    async search(query: string, maxResults = 3): Promise<SearchResult[]> {
      if (!cfg.enabled) return [];
      if (!hasKeys) {
        log.warn({ provider: cfg.provider }, 'Search credentials missing');
        return [];
      }
      const q = query.trim();
      if (!q) return [];
      try {
        const results = await withBreaker('search', () =>
          cfg.provider === 'naver' ? naver(q, maxResults) : brave(q, maxResults),
        );
        if (results.length === 0) log.info({ provider: cfg.provider }, 'Search returned no items');
        return results;
      } catch (err: unknown) {
        log.error({ provider: cfg.provider, err: toStdError(err, 'search') }, 'Search failed');
        return [];
      }
    },
  };
}

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { Logger } from '../util/logging.js';
import { toStdError } from '../tools/errors.js';

export const DATA_FILES = {
  primaryCourses: 'jeju_hotel_halftime_courses.csv',
  sampleCourses: 'jeju_sample_halfday_courses.csv',
  blacklist: 'jeju_access_blacklist.csv',
  congestion: 'jeju_congestion_rules.csv',
} as const;

export const DOC_FILES = {
  readme: 'README_jeju_planner_v1.md',
  ruleSpec: 'jeju_rule_engine_spec.md',
  arrivedHook: 'jeju_arrived_mode_prompt_hook.md',
} as const;

export interface PoiRecord {
  id: string;
  name: string;
  area: string;
}

export interface BlacklistEntry {
  id: string;
  name: string;
  severity: string;
}

export interface CongestionRule {
  area: string;
  level: string;
}

export interface KnowledgeSnapshot {
  readonly primaryCourses: readonly PoiRecord[];
  readonly sampleCourses: readonly PoiRecord[];
  readonly blacklist: readonly BlacklistEntry[];
  readonly congestion: readonly CongestionRule[];
  readonly docs: Readonly<Record<keyof typeof DOC_FILES, string>>;
}

export const EMPTY_KNOWLEDGE: KnowledgeSnapshot = Object.freeze({
  primaryCourses: [],
  sampleCourses: [],
  blacklist: [],
  congestion: [],
  docs: { readme: '', ruleSpec: '', arrivedHook: '' },
});

const Rows = z.array(z.record(z.string()));
type Row = Record<string, string>;

const col = (row: Row, ...names: string[]): string =>
  names.map((n) => (row[n] ?? '').trim()).find((v) => v !== '') ?? '';

const toPoi = (row: Row): PoiRecord => ({
  id: col(row, 'poi_id', 'id'),
  name: col(row, 'name', 'title'),
  area: col(row, 'area'),
});

const toBlacklist = (row: Row): BlacklistEntry => ({
  id: col(row, 'poi_id', 'id'),
  name: col(row, 'name'),
  severity: col(row, 'severity'),
});

const toCongestion = (row: Row): CongestionRule => ({
  area: col(row, 'area'),
  level: col(row, 'level'),
});

/** Parses CSV text with a header row into string records. */
export function parseCsv(content: string): Row[] {
  const records: unknown = parse(content, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return Rows.parse(records);
}

async function readCsv(dir: string, file: string, log: Logger): Promise<Row[]> {
  const filePath = path.join(dir, file);
  try {
    return parseCsv(await readFile(filePath, 'utf-8'));
  } catch (err: unknown) {
    log.warn({ file: filePath, err: toStdError(err, 'knowledge.csv') }, 'CSV read failed');
    return [];
  }
}

/** Directories searched for markdown documents, first hit wins. */
export function docSearchPath(docsDir: string): string[] {
  const candidates = [
    docsDir,
    path.join(process.cwd(), 'docs'),
    path.resolve(__dirname, '..', '..', 'docs'),
    process.cwd(),
  ];
  return [...new Set(candidates.map((c) => path.resolve(c)))];
}

const isMissingFile = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';

async function readDoc(dirs: string[], file: string, log: Logger): Promise<string> {
  for (const dir of dirs) {
    const filePath = path.join(dir, file);
    try {
      return await readFile(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) continue;
      log.warn({ file: filePath, err: toStdError(err, 'knowledge.md') }, 'Markdown read failed');
      return '';
    }
  }
  log.warn({ file, dirs }, 'Markdown document not found');
  return '';
}

/**
 * Loads the point-of-interest lists, rule tables and prompt documents.
 * Called once at start-up; missing or unreadable files become empty data.
 */
export async function loadKnowledge(
  opts: { dataDir: string; docsDir: string },
  log: Logger,
): Promise<KnowledgeSnapshot> {
  const dirs = docSearchPath(opts.docsDir);
  const [primary, sample, blacklist, congestion, readme, ruleSpec, arrivedHook] = await Promise.all([
    readCsv(opts.dataDir, DATA_FILES.primaryCourses, log),
    readCsv(opts.dataDir, DATA_FILES.sampleCourses, log),
    readCsv(opts.dataDir, DATA_FILES.blacklist, log),
    readCsv(opts.dataDir, DATA_FILES.congestion, log),
    readDoc(dirs, DOC_FILES.readme, log),
    readDoc(dirs, DOC_FILES.ruleSpec, log),
    readDoc(dirs, DOC_FILES.arrivedHook, log),
  ]);

  const snapshot: KnowledgeSnapshot = Object.freeze({
    primaryCourses: Object.freeze(primary.map(toPoi)),
    sampleCourses: Object.freeze(sample.map(toPoi)),
    blacklist: Object.freeze(blacklist.map(toBlacklist)),
    congestion: Object.freeze(congestion.map(toCongestion)),
    docs: Object.freeze({ readme, ruleSpec, arrivedHook }),
  });
  log.info(
    {
      dataDir: opts.dataDir,
      primary: snapshot.primaryCourses.length,
      sample: snapshot.sampleCourses.length,
      blacklist: snapshot.blacklist.length,
      congestion: snapshot.congestion.length,
    },
    'Knowledge loaded',
  );
  return snapshot;
}

import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';
import type { KnowledgeSnapshot } from './knowledge.js';
import type { Logger } from '../util/logging.js';

type PromptName = 'system' | 'refine' | 'web_context';

export type PromptTemplates = Record<PromptName, string>;

export interface Prompts {
  /** System instructions with the knowledge documents substituted. */
  system: string;
  /** Instruction that precedes the draft to refine. */
  refine: string;
  /** Instruction that precedes formatted web search results. */
  webContext: string;
}

const FALLBACK_REFINE = '아래 초안을 다듬어 출력하세요.';
const FALLBACK_WEB_CONTEXT = 'Web context (non-authoritative):';

async function loadFileSafe(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch {
    return '';
  }
}

export function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
}

export async function loadPromptTemplates(log?: Logger): Promise<PromptTemplates> {
  const base = promptsDir();
  const [system, refine, webContext] = await Promise.all([
    loadFileSafe(path.join(base, 'system.md')),
    loadFileSafe(path.join(base, 'refine.md')),
    loadFileSafe(path.join(base, 'web_context.md')),
  ]);
  if (!system) log?.warn({ dir: base }, 'System prompt template missing');
  return { system, refine, web_context: webContext };
}

/** Fills `{{name}}` placeholders; unknown names become empty. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_m, name: string) => vars[name] ?? '');
}

export function buildPrompts(templates: PromptTemplates, knowledge: KnowledgeSnapshot): Prompts {
  return {
    system: renderTemplate(templates.system, { ...knowledge.docs }).trim(),
    refine: templates.refine.trim() || FALLBACK_REFINE,
    webContext: templates.web_context.trim() || FALLBACK_WEB_CONTEXT,
  };
}

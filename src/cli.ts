#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { loadAppConfig } from './config/app.js';
import { createCallbackDispatcher } from './core/callback_dispatcher.js';
import { loadKnowledge } from './core/knowledge.js';
import { createLlmGateway } from './core/llm.js';
import { createOrchestrator } from './core/orchestrator.js';
import { buildPrompts, loadPromptTemplates } from './core/prompts.js';
import { createStore } from './core/session_store.js';
import type { BasicCardT, SkillResponseT } from './schemas/kakao.js';
import { createCallbackSender } from './tools/callback.js';
import { createSearchGateway } from './tools/search.js';
import { createLogger } from './util/logging.js';

const USER_ID = 'local';
const FRAME_BAR = '─'.repeat(44);

function renderCard(card: BasicCardT): string[] {
  const lines = [chalk.bold(`[${card.title}]`), chalk.gray(card.description)];
  for (const b of card.buttons) lines.push(`  ${chalk.cyan(b.label)} ${chalk.underline(b.webLinkUrl)}`);
  return lines;
}

/** Plain-terminal rendering of a skill response. */
export function render(res: SkillResponseT): string {
  if ('useCallback' in res) return chalk.yellow(res.data.text);
  const lines: string[] = [];
  for (const o of res.template.outputs) {
    if ('simpleText' in o) lines.push(o.simpleText.text);
    else if ('basicCard' in o) lines.push(...renderCard(o.basicCard));
    else for (const item of o.carousel.items) lines.push(...renderCard(item));
  }
  return lines.join('\n');
}

async function main(): Promise<void> {
  const log = createLogger({ mode: 'cli' });
  const loaded = loadAppConfig();
  // The console has no callback URL to answer on.
  const config = { ...loaded, callback: { ...loaded.callback, enabled: false } };

  const knowledge = await loadKnowledge({ dataDir: config.dataDir, docsDir: config.docsDir }, log);
  const prompts = buildPrompts(await loadPromptTemplates(log), knowledge);
  const sessions = createStore(config.session);
  const llm = createLlmGateway({ cfg: config.llm, prompts, log });
  const search = createSearchGateway({ cfg: config.search, log });
  const dispatcher = createCallbackDispatcher({
    llm,
    sender: createCallbackSender(config.callback),
    system: prompts.system,
    cfg: { concurrency: 1, retryDelayMs: config.callback.retryDelayMs },
    log,
  });
  const orchestrator = createOrchestrator({ config, knowledge, prompts, sessions, llm, search, dispatcher, log });

  const rl = readline.createInterface({ input, output });
  output.write(chalk.green(`Jeju trip planner console (LLM ${llm.enabled ? 'on' : 'off'}). Type "exit" to quit.\n`));

  for (;;) {
    const line = (await rl.question(chalk.blue('you> '))).trim();
    if (line === 'exit' || line === 'quit') break;
    if (!line) continue;
    const res = await orchestrator.handle({ utterance: line, userId: USER_ID });
    output.write(`${chalk.gray(FRAME_BAR)}\n${render(res)}\n${chalk.gray(FRAME_BAR)}\n`);
  }
  rl.close();
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(chalk.red('CLI failed:'), err);
    process.exit(1);
  });
}

import 'dotenv/config';
import { loadAppConfig } from '../config/app.js';
import { createCallbackDispatcher } from '../core/callback_dispatcher.js';
import { loadKnowledge } from '../core/knowledge.js';
import { createLlmGateway } from '../core/llm.js';
import { createOrchestrator } from '../core/orchestrator.js';
import { buildPrompts, loadPromptTemplates } from '../core/prompts.js';
import { createStore } from '../core/session_store.js';
import { createCallbackSender } from '../tools/callback.js';
import { createSearchGateway } from '../tools/search.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const log = createLogger();

async function main(): Promise<void> {
  const config = loadAppConfig();
  const knowledge = await loadKnowledge({ dataDir: config.dataDir, docsDir: config.docsDir }, log);
  const prompts = buildPrompts(await loadPromptTemplates(log), knowledge);

  const sessions = createStore(config.session);
  log.info({ ttlSec: config.session.ttlSec, maxEntries: config.session.maxEntries }, 'Session store initialized');

  const llm = createLlmGateway({ cfg: config.llm, prompts, log });
  const search = createSearchGateway({ cfg: config.search, log });
  const dispatcher = createCallbackDispatcher({
    llm,
    sender: createCallbackSender(config.callback),
    system: prompts.system,
    cfg: {
      concurrency: config.callback.concurrency,
      retryDelayMs: config.callback.retryDelayMs,
      maxTokens: config.llm.maxTokens,
    },
    log,
  });
  const orchestrator = createOrchestrator({
    config,
    knowledge,
    prompts,
    sessions,
    llm,
    search,
    dispatcher,
    log,
  });

  const app = createApp({ config, orchestrator, sessions, search, log });
  const server = app.listen(config.port, () =>
    log.info({ port: config.port, model: config.llm.model, llm: llm.enabled, callback: config.callback.enabled }, 'HTTP server started'),
  );

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    log.info({ signal, pending: dispatcher.pending() }, 'Shutting down');
    server.close(() => {
      dispatcher
        .onIdle()
        .then(() => {
          log.info('Callback jobs drained');
          process.exit(0);
        })
        .catch((err: unknown) => {
          log.error({ err }, 'Drain failed');
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Startup failed');
  process.exit(1);
});

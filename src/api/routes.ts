import type { Router } from 'express';
import express from 'express';
import type { AppConfig } from '../config/app.js';
import { llmAvailable } from '../config/app.js';
import type { Orchestrator } from '../core/orchestrator.js';
import type { SessionStore } from '../core/session_store.js';
import { parseSkillRequest } from '../schemas/kakao.js';
import type { SearchGateway } from '../tools/search.js';
import type { Logger } from '../util/logging.js';
import { getAllLimiterStats } from '../util/limiter.js';
import { getPrometheusText } from '../util/metrics.js';

export interface RouteDeps {
  config: AppConfig;
  orchestrator: Orchestrator;
  sessions: SessionStore;
  search: SearchGateway;
  log: Logger;
}

export const router = (deps: RouteDeps): Router => {
  const { config, orchestrator, sessions, search, log } = deps;
  const r = express.Router();

  // Always 200: the platform shows an error bubble for anything else.
  r.post('/kakao/skill', async (req, res) => {
    const input = parseSkillRequest(req.body);
    log.debug({ userId: input.userId, callback: Boolean(input.callbackUrl) }, 'skill:in');
    const out = await orchestrator.handle(input);
    res.status(200).json(out);
  });

  r.get('/health', (_req, res) => {
    res.status(200).json({
      ok: true,
      service: 'jeju-trip-skill',
      model: config.llm.model,
      llm: llmAvailable(config.llm),
      callback: config.callback.enabled,
      sessions: sessions.size(),
    });
  });

  r.get('/metrics', async (_req, res) => {
    try {
      const text = await getPrometheusText();
      res.setHeader('Content-Type', 'text/plain; version=0.0.4');
      res.send(text);
    } catch (err: unknown) {
      log.error({ err }, 'metrics_render_failed');
      res.status(500).send('');
    }
  });

  if (config.debugRoutes) {
    r.get('/debug/env', (_req, res) => {
      res.json({
        model: config.llm.model,
        llmKeySet: config.llm.apiKey !== '',
        fastMode: config.llm.fastMode,
        callbackEnabled: config.callback.enabled,
        guardEnabled: config.guardEnabled,
        searchEnabled: config.search.enabled,
        searchProvider: config.search.provider,
        naverKeysSet: Boolean(config.search.naverClientId && config.search.naverClientSecret),
        braveKeySet: config.search.braveApiKey !== '',
        dataDir: config.dataDir,
        docsDir: config.docsDir,
        limiters: getAllLimiterStats(),
      });
    });

    r.get('/debug/search', async (req, res) => {
      const q = typeof req.query.q === 'string' ? req.query.q : '';
      const results = await search.search(q, 3);
      res.json({ query: q, count: results.length, results });
    });
  }

  return r;
};

import express from 'express';
import type { ErrorRequestHandler, Express, Response } from 'express';
import { router, type RouteDeps } from './routes.js';

function resOnFinish(res: Response, cb: () => void) {
  res.on('finish', cb);
}

/** Any client-side failure raised while express.json reads the body. */
function isBodyReadError(err: unknown): boolean {
  if (err instanceof SyntaxError) return true;
  if (typeof err !== 'object' || err === null) return false;
  const status = 'status' in err ? err.status : undefined;
  const type = 'type' in err ? err.type : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) return true;
  return typeof type === 'string' && (type.startsWith('entity.') || type.endsWith('.unsupported'));
}

export function createApp(deps: RouteDeps): Express {
  const { log } = deps;
  const app = express();

  app.use(express.json({ limit: '512kb' }));

  // Unreadable bodies (malformed, oversized, unknown charset) continue as {}.
  const tolerateBadJson: ErrorRequestHandler = (err: unknown, req, _res, next) => {
    if (isBodyReadError(err)) {
      log.warn({ path: req.path, err: err instanceof Error ? err.message : String(err) }, 'Unreadable body replaced with {}');
      req.body = {};
      next();
      return;
    }
    next(err);
  };
  app.use(tolerateBadJson);

  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.use('/', router(deps));
  return app;
}

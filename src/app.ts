/**
 * @fileoverview Express application factory.
 *
 * Kept apart from the entry point so tests can mount the full route table
 * against in-memory stores without listening on a port.
 */

import express from 'express';
import { healthHandler } from './routes/health.js';
import { createQueryRouter, type QueryRouteDeps } from './routes/query.js';
import { methodNotAllowed, sendDetail } from './routes/errors.js';

export type AppDeps = QueryRouteDeps;

export function createApp(deps: AppDeps): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', healthHandler);
  app.all('/health', methodNotAllowed('GET'));

  app.use(createQueryRouter(deps));

  // Malformed JSON bodies
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      sendDetail(res, 422, 'Request body is not valid JSON');
      return;
    }
    next(err);
  });

  return app;
}

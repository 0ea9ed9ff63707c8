/**
 * @fileoverview Express application factory.
 *
 * Builds the app without listening, so tests can drive it with supertest.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { healthHandler } from './routes/health.js';
import { createToolsRouter } from './routes/tools.js';
import type { ToolRegistry } from './tools/index.js';
import { errorMessage } from './utils/errors.js';
import { createLogger } from './utils/observability/index.js';

const log = createLogger({ domain: 'http' });

export function createApp(registry: ToolRegistry): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', healthHandler);

  // Tool routes
  app.use(createToolsRouter(registry));

  // Malformed JSON and anything a route failed to handle
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'Request body must be valid JSON' });
      return;
    }
    log.error('request_failed', { error: errorMessage(err) });
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}

import express from 'express';
import type { Express, RequestHandler } from 'express';
import type { Logger } from 'pino';
import type { TaskDb } from '@tasklane/core';
import { createAuthMiddleware } from './auth.js';
import { createErrorHandler } from './errors.js';
import { createTaskRouter } from './routes/tasks.js';

export interface AppOptions {
  db: TaskDb;
  tokens: ReadonlySet<string>;
  logger: Logger;
  basePath?: string;
  /** Largest accepted JSON body; imports are the big ones */
  bodyLimit?: string;
}

/** Logs method, path, status and duration of every finished request */
function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      logger.info({
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10,
      }, 'request');
    });
    next();
  };
}

export function createApp(options: AppOptions): Express {
  const { db, tokens, logger } = options;
  const basePath = options.basePath ?? '/task/v1';

  const app = express();
  // ETags are set explicitly from updated_at
  app.set('etag', false);
  app.set('query parser', 'simple');
  app.disable('x-powered-by');

  app.use(requestLogger(logger.child({ module: 'http' })));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(express.json({ limit: options.bodyLimit ?? '10mb' }));
  app.use(basePath, createAuthMiddleware(tokens), createTaskRouter(db, logger.child({ module: 'tasks' })));

  app.use((req, res) => {
    res.status(404).json({ code: 'not_found', message: `No route for ${req.method} ${req.path}` });
  });
  app.use(createErrorHandler(logger.child({ module: 'errors' })));

  return app;
}

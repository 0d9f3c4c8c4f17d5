import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import type { SeenStore } from '../scan/seenStore.js';
import type { Watcher } from '../scan/watcher.js';
import { ListwatchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sourceRoutes } from './routes/sources.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
  store: SeenStore;
  watcher: Watcher | null;
}

export function errorCodeToHttpStatus(code: string): number {
  switch (code) {
    case 'SOURCE_ERROR':
    case 'CONFIG_ERROR':
      return 400;
    case 'FETCH_TIMEOUT':
      return 504;
    case 'FETCH_ERROR':
    case 'FETCH_EMPTY':
    case 'DELIVERY_ERROR':
      return 502;
    default:
      return 500;
  }
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.route('/api', sourceRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof ListwatchError) {
      const status = errorCodeToHttpStatus(err.code) as ContentfulStatusCode;
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

/**
 * Serve the admin API. Resolves with a close function for shutdown.
 */
export function startServer(ctx: AppContext): Promise<() => Promise<void>> {
  const { port, host } = ctx.config.server;
  const app = createApp(ctx);

  return new Promise((resolve) => {
    const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
      logger.info({ port: info.port, host }, 'Admin API listening');
      resolve(
        () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      );
    });
  });
}

import { Hono } from 'hono';
import type { AppContext } from '../server.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health: basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
    });
  });

  // GET /api/status: scheduler state and last cycle
  app.get('/status', (c) => {
    if (!ctx.watcher) {
      return c.json({ running: false, seenCount: ctx.store.count() });
    }
    return c.json(ctx.watcher.getStatus());
  });

  // POST /api/seen/sweep: drop seen records past the retention horizon now
  app.post('/seen/sweep', (c) => {
    const retentionMs = ctx.config.store.retention_hours * 3600 * 1000;
    const removed = ctx.store.sweep(retentionMs, new Date());
    return c.json({ removed, remaining: ctx.store.count() });
  });

  return app;
}

import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { addSource, getSource, listSources, removeSource, updateSource } from '../../source/sourceDb.js';

const AddSourceBody = z.object({
  url: z.string().url(),
  hashtag: z.string().optional(),
  title: z.string().optional(),
});

const PatchSourceBody = z.object({
  url: z.string(),
  hashtag: z.string().nullable().optional(),
  title: z.string().nullable().optional(),
  active: z.boolean().optional(),
});

export function sourceRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/sources: track a new listings page
  app.post('/sources', async (c) => {
    const parsed = AddSourceBody.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: 'Invalid body', details: parsed.error.flatten().fieldErrors }, 400);
    }

    const added = addSource(ctx.db, parsed.data);
    if (!added) {
      return c.json({ error: 'Source already exists', url: parsed.data.url }, 409);
    }
    return c.json(getSource(ctx.db, parsed.data.url) ?? null, 201);
  });

  // GET /api/sources
  app.get('/sources', (c) => {
    return c.json(listSources(ctx.db));
  });

  // PATCH /api/sources: retag, rename, enable or disable; applies from the next cycle
  app.patch('/sources', async (c) => {
    const parsed = PatchSourceBody.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json({ error: 'Invalid body', details: parsed.error.flatten().fieldErrors }, 400);
    }

    const { url, hashtag, title, active } = parsed.data;
    if (!getSource(ctx.db, url)) {
      return c.json({ error: 'Source not found', url }, 404);
    }
    updateSource(ctx.db, url, {
      hashtag,
      title,
      is_active: active === undefined ? undefined : active ? 1 : 0,
    });
    return c.json(getSource(ctx.db, url) ?? null);
  });

  // DELETE /api/sources?url=...
  app.delete('/sources', (c) => {
    const url = c.req.query('url');
    if (!url) {
      return c.json({ error: 'url query parameter is required' }, 400);
    }
    if (!removeSource(ctx.db, url)) {
      return c.json({ error: 'Source not found', url }, 404);
    }
    return c.json({ ok: true });
  });

  return app;
}

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { zValidator } from '@hono/zod-validator';
import { applyControl, type SignalStore } from '@director/signal';
import { sinceQuerySchema } from './pages.js';

/**
 * JSON surface for scripts and non-htmx clients.
 *
 * GET  /api/signal               current { signal, revision }
 * GET  /api/signal?since=<rev>   long-poll: 200 on change, 204 on timeout
 * POST /api/signal               apply a control command, e.g.
 *                                { "action": "select-letter", "letter": "V" }
 */
export function createApiRoutes(store: SignalStore, longPollTimeoutMs: number): Hono {
  const app = new Hono();

  app.get('/signal', zValidator('query', sinceQuerySchema), async (c) => {
    const { since } = c.req.valid('query');
    if (since === undefined) {
      return c.json(store.get());
    }

    const outcome = await store.waitForChange(since, {
      timeoutMs: longPollTimeoutMs,
      signal: c.req.raw.signal,
    });
    if (outcome.status !== 'changed') {
      c.header('X-Signal-Revision', String(outcome.snapshot.revision));
      return c.body(null, 204);
    }
    return c.json(outcome.snapshot);
  });

  app.post('/signal', async (c) => {
    const input: unknown = await c.req.json().catch((err: unknown) => {
      throw new HTTPException(400, { message: 'Request body must be JSON', cause: err });
    });
    const { snapshot, changed } = applyControl(store, input);
    return c.json({ ...snapshot, changed });
  });

  return app;
}

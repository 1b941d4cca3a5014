import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { SignalStore } from '@director/signal';
import { controllerPage, sectionDisplay, viewerPage } from '../render.js';

export const sinceQuerySchema = z.object({
  since: z
    .string()
    .regex(/^\d+$/, 'Expected a non-negative whole number')
    .pipe(z.coerce.number().int().max(Number.MAX_SAFE_INTEGER))
    .optional(),
});

/**
 * Director and viewer pages.
 *
 * GET /view?since=<revision> is the long-poll behind the display element:
 * it answers at once when the caller's revision is stale, otherwise when the
 * next commit lands or the wait window closes. A timed-out poll gets the
 * unchanged fragment plus "X-Long-Poll: timeout", and the element it swaps in
 * starts the next poll.
 */
export function createPageRoutes(store: SignalStore, longPollTimeoutMs: number): Hono {
  const app = new Hono();

  app.get('/', (c) => c.html(controllerPage(store.get())));

  app.get('/view', zValidator('query', sinceQuerySchema), async (c) => {
    const { since } = c.req.valid('query');
    if (since === undefined) {
      return c.html(viewerPage(store.get()));
    }

    const outcome = await store.waitForChange(since, {
      timeoutMs: longPollTimeoutMs,
      signal: c.req.raw.signal,
    });
    if (outcome.status === 'cancelled') {
      // Nobody is listening any more
      return c.body(null, 204);
    }

    c.header('X-Signal-Revision', String(outcome.snapshot.revision));
    if (outcome.status === 'timeout') {
      c.header('X-Long-Poll', 'timeout');
    }
    return c.html(sectionDisplay(outcome.snapshot));
  });

  return app;
}

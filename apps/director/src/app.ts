import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { InvalidInputError, type SignalStore } from '@director/signal';
import { log } from './log.js';
import { sectionDisplay } from './render.js';
import { createApiRoutes } from './routes/api.js';
import { createPageRoutes } from './routes/pages.js';
import { createSectionRoutes } from './routes/section.js';

export interface AppOptions {
  longPollTimeoutMs: number;
  logRequests: boolean;
}

/**
 * Build the Hono app around an existing store.
 * Static assets are mounted by the entry point, after these routes.
 */
export function createApp(store: SignalStore, options: AppOptions): Hono {
  const app = new Hono();

  if (options.logRequests) {
    app.use(logger((line) => log(line)));
  }

  app.route('/', createPageRoutes(store, options.longPollTimeoutMs));
  app.route('/section', createSectionRoutes(store));
  app.route('/api', createApiRoutes(store, options.longPollTimeoutMs));

  app.get('/health', (c) =>
    c.json({
      ok: true,
      revision: store.get().revision,
      waiters: store.pendingWaiters,
      subscribers: store.subscribers,
    }),
  );

  app.onError((err, c) => {
    if (err instanceof InvalidInputError) {
      // State is unchanged; show the caller what is actually live
      if (c.req.path.startsWith('/api/')) {
        return c.json({ error: err.message, field: err.field }, 400);
      }
      c.header('X-Signal-Revision', String(store.get().revision));
      return c.html(sectionDisplay(store.get()), 400);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    log(`Unhandled error on ${c.req.method} ${c.req.path}: ${err.stack ?? String(err)}`);
    return c.text('Internal Server Error', 500);
  });

  return app;
}

import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { applyControl, type MutationResult, type SignalStore, type Snapshot } from '@director/signal';
import { log } from '../log.js';
import { sectionDisplay } from '../render.js';

const HEARTBEAT_MS = 30_000;

function respondWithDisplay(c: Context, result: MutationResult): Response | Promise<Response> {
  c.header('X-Signal-Revision', String(result.snapshot.revision));
  return c.html(sectionDisplay(result.snapshot));
}

/**
 * Control surface used by the director page's htmx forms.
 *
 * PUT    /section/type    section_type=<letter>
 * PUT    /section/number  section_number=<digit>
 * DELETE /section
 * GET    /section/events  server-sent "signal" events
 *
 * Each control answers with the display fragment for the resulting state.
 * Validation failures surface as InvalidInputError and are turned into a 400
 * by the app's error handler.
 */
export function createSectionRoutes(store: SignalStore): Hono {
  const app = new Hono();

  app.put('/type', async (c) => {
    const body = await c.req.parseBody();
    return respondWithDisplay(c, applyControl(store, { action: 'select-letter', letter: body['section_type'] }));
  });

  app.put('/number', async (c) => {
    const body = await c.req.parseBody();
    return respondWithDisplay(c, applyControl(store, { action: 'append-digit', digit: body['section_number'] }));
  });

  app.delete('/', (c) => respondWithDisplay(c, applyControl(store, { action: 'clear' })));

  app.get('/events', (c) => {
    return streamSSE(c, async (stream) => {
      const send = (snapshot: Snapshot): Promise<void> =>
        stream.writeSSE({
          event: 'signal',
          data: JSON.stringify(snapshot),
          id: String(snapshot.revision),
        });

      // Subscribe before the first write so no commit falls in between
      const unsubscribe = store.subscribe((snapshot) => {
        send(snapshot).catch((err: unknown) => {
          log(`Dropping SSE update for revision ${snapshot.revision}: ${String(err)}`);
        });
      });

      // Comment line, ignored by EventSource, keeps proxies from idling out
      const heartbeatInterval = setInterval(() => {
        stream.write(': heartbeat\n\n').catch((err: unknown) => {
          log(`SSE heartbeat failed: ${String(err)}`);
        });
      }, HEARTBEAT_MS);

      const closed = new Promise<void>((resolve) => {
        stream.onAbort(() => {
          unsubscribe();
          clearInterval(heartbeatInterval);
          resolve();
        });
      });

      await send(store.get());
      await closed;
    });
  });

  return app;
}

import { readFileSync } from 'node:fs';
import { serve } from '@hono/node-server';
import { serveStatic } from '@hono/node-server/serve-static';
import { z } from 'zod';
import { SignalStore } from '@director/signal';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { log } from './log.js';

/**
 * Server entry point.
 * Owns the process-wide SignalStore and hands it to the app; assets under
 * PUBLIC_DIR are served after the app's own routes.
 */

const { version } = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')));

const config = loadConfig();
const store = new SignalStore();

store.subscribe((snapshot) => {
  log(`Signal is now ${snapshot.signal} (revision ${snapshot.revision})`, 'signal');
});

const app = createApp(store, {
  longPollTimeoutMs: config.longPollTimeoutMs,
  logRequests: config.logRequests,
});

// Mount static file serving AFTER the routes so it never shadows them
app.use('/*', serveStatic({ root: config.publicDir }));

const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  log(`Song director v${version} listening on http://${info.address}:${info.port}`);
});

const shutdown = (): void => {
  log('Shutting down...');
  server.close();
  process.exit(0);
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

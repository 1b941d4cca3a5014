import { z } from 'zod';

export interface DirectorConfig {
  port: number;
  host: string;
  /** Upper bound on how long a long-poll is held open before answering "no change". */
  longPollTimeoutMs: number;
  publicDir: string;
  logRequests: boolean;
}

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const directorConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65_535),
  host: z.string().min(1),
  longPollTimeoutMs: z.coerce.number().int().min(1_000).max(120_000),
  publicDir: z.string().min(1),
  logRequests: booleanString,
});

/**
 * Load server configuration from environment variables.
 *
 *   PORT                  listening port (3000)
 *   HOST                  bind address (0.0.0.0)
 *   LONG_POLL_TIMEOUT_MS  long-poll wait window (25000)
 *   PUBLIC_DIR            static asset directory (./public)
 *   LOG_REQUESTS          log one line per request (true)
 *
 * Throws a ZodError on malformed values so the server never starts half-configured.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DirectorConfig {
  const raw = {
    port: env.PORT ?? '3000',
    host: env.HOST ?? '0.0.0.0',
    longPollTimeoutMs: env.LONG_POLL_TIMEOUT_MS ?? '25000',
    publicDir: env.PUBLIC_DIR ?? './public',
    logRequests: env.LOG_REQUESTS ?? 'true',
  };

  return directorConfigSchema.parse(raw);
}

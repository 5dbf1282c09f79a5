/**
 * server.ts — HTTP entry point
 *
 * Startup: validate env (exits on missing DB secrets) → Sentry → property
 * loader → Express. Shutdown closes the HTTP server, the pg pool and flushes Sentry.
 */
import 'dotenv/config';
import { env } from './config/env.ts';
import { closeDb, pingDb } from './config/database.ts';
import { initSentry, flushSentry } from './config/sentry.ts';
import { logger } from './shared/logger.ts';
import { createDbPropertySource } from './services/dal.ts';
import { getPropertyLoader, initPropertyLoader } from './services/state.ts';
import { createApp } from './app.ts';

await initSentry();

initPropertyLoader(createDbPropertySource(), { ttlMs: env.CACHE_TTL_SECONDS * 1000 });
const app = createApp({ loader: getPropertyLoader(), pingStore: pingDb });

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, cacheTtlSeconds: env.CACHE_TTL_SECONDS }, `API listening on http://localhost:${env.PORT}`);
});

// ─── Graceful shutdown ───

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  server.close();
  try {
    await closeDb();
    await flushSentry();
  } catch (err) {
    logger.error({ err }, 'Error during shutdown');
    process.exitCode = 1;
  }
  process.exit();
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}

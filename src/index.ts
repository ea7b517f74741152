import { serve } from '@hono/node-server';
import { getEnv } from './config/env.js';
import { createChildLogger } from './config/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('server');

const env = getEnv();
const app = createApp();

// ─── Graceful Shutdown ───────────────────────────────────────────────

let isShuttingDown = false;

function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    log.warn({ signal }, 'Shutdown already in progress, ignoring');
    return;
  }
  isShuttingDown = true;

  log.info({ signal }, 'Graceful shutdown initiated');
  server.close((err) => {
    if (err) {
      log.error({ err }, 'Error while closing HTTP server');
      process.exit(1);
    }
    log.info('HTTP server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

// ─── Start Server ────────────────────────────────────────────────────

const server = serve({ fetch: app.fetch, port: env.PORT }, () => {
  log.info({ port: env.PORT }, `slack-notify running on port ${env.PORT}`);
  log.info('Endpoints:');
  log.info('  GET    /health                   → Liveness');
  log.info('  POST   /tasks/slack              → Post, edit or upload (Bearer API_KEY; ?dryRun=true to simulate)');
});

export default app;

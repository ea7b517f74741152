import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { getEnv } from './config/env.js';
import { createChildLogger } from './config/logger.js';
import { createHealthRoutes } from './api/health.js';
import { createTaskRoutes } from './api/tasks.js';
import { createAuthMiddleware } from './middleware/auth.js';

const log = createChildLogger('server');

export function createApp() {
  const env = getEnv();
  const app = new Hono();

  // Global middleware
  app.use('*', cors({
    origin: env.ALLOWED_ORIGINS.split(','),
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use('*', honoLogger());

  // Security headers
  app.use('*', async (c, next) => {
    await next();
    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');
  });

  app.route('/', createHealthRoutes());

  // Tasks run with the server's Slack credential and may read local files.
  app.use('/tasks/*', createAuthMiddleware(env.API_KEY));
  app.route('/tasks', createTaskRoutes());

  // ─── Error Handler ─────────────────────────────────────────────

  app.onError((err, c) => {
    log.error({ err, path: c.req.path }, 'Unhandled error');
    const isDev = env.NODE_ENV !== 'production';
    return c.json(
      { error: 'Internal server error', ...(isDev ? { message: err.message } : {}) },
      500,
    );
  });

  return app;
}

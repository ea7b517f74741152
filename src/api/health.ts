import { Hono } from 'hono';

export const VERSION = '0.1.0';

export function createHealthRoutes() {
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok', version: VERSION }));

  return app;
}

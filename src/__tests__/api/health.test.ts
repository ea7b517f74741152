import { describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';
import { VERSION, createHealthRoutes } from '../../api/health.js';

describe('Health Routes', () => {
  let app: Hono;

  beforeEach(() => {
    app = new Hono();
    app.route('/', createHealthRoutes());
  });

  describe('GET /health', () => {
    it('should return ok with the service version', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', version: VERSION });
    });

    it('should not answer other methods', async () => {
      const res = await app.request('/health', { method: 'POST' });

      expect(res.status).toBe(404);
    });
  });
});

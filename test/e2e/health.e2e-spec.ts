import { describe, it, expect, beforeEach } from '@jest/globals';
import type { Hono } from 'hono';
import { createTestApp } from './test-app.factory.js';

describe('Health (e2e)', () => {
  let app: Hono;

  beforeEach(() => {
    // Create fresh app instance for each test for better isolation
    app = createTestApp();
  });

  describe('GET /api/health', () => {
    it('returns simple ok status without a key', async () => {
      const response = await app.request('/api/health', {
        method: 'GET',
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'ok' });
    });
  });

  describe('unknown routes', () => {
    it('returns 404 JSON', async () => {
      const response = await app.request('/api/unknown');

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        statusCode: 404,
        message: 'Cannot GET /api/unknown',
        error: 'Not Found',
      });
    });
  });
});

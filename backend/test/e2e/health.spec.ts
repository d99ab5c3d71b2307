import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  ok: z.boolean(),
  env: z.string(),
  service: z.string(),
  requestId: z.string(),
});

describe('GET /health', () => {
  it('returns ok payload with a generated request id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);

      const parsed = HealthResponseSchema.parse(res.json());

      expect(parsed.ok).toBe(true);
      expect(parsed.env).toBe('test');
      expect(parsed.service).toBe('users-api-test');
      expect(res.headers['x-request-id']).toBe(parsed.requestId);
    } finally {
      await close();
    }
  });

  it('reuses an inbound x-request-id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'req-123' },
      });

      expect(HealthResponseSchema.parse(res.json()).requestId).toBe('req-123');
    } finally {
      await close();
    }
  });
});

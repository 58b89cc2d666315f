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
  it('returns the service identity and echoes a well-formed request id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'trace-12345678' },
      });

      expect(res.statusCode).toBe(200);
      expect(HealthResponseSchema.parse(res.json())).toEqual({
        ok: true,
        env: 'test',
        service: 'chapterhouse-test',
        requestId: 'trace-12345678',
      });
    } finally {
      await close();
    }
  });

  it('replaces a malformed request id with a fresh one', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-request-id': 'bad id!' },
      });

      const body = HealthResponseSchema.parse(res.json());
      expect(body.requestId).toMatch(/^[0-9a-f-]{36}$/);
    } finally {
      await close();
    }
  });
});

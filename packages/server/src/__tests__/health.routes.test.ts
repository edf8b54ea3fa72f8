import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { logger } from '@specnest/core';
import { buildApp, testSettings } from './helpers.js';

describe('health routes', () => {
  it('health_AllBackendsUp_ReturnsOk', async () => {
    const { app } = buildApp();

    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'ok',
      version: '0.1.0',
      checks: { database: 'ok', cache: 'ok' },
    });
  });

  it('health_DatabaseDown_Returns503Degraded', async () => {
    const { app, store } = buildApp();
    vi.spyOn(store, 'ping').mockResolvedValue(false);

    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(503);
    expect(res.body.status).toBe('degraded');
    expect(res.body.checks).toEqual({ database: 'unavailable', cache: 'ok' });
  });

  it('health_OverApiLimit_IsNotRateLimited', async () => {
    const { app } = buildApp(testSettings({ requestsPerHour: 1 }));

    await request(app).get('/api/v1/health');
    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.headers['x-ratelimit-limit']).toBeUndefined();
  });

  it('health_TrailingSlash_IsNotRateLimited', async () => {
    const { app } = buildApp(testSettings({ requestsPerHour: 1 }));

    const first = await request(app).get('/api/v1/health/');
    const second = await request(app).get('/api/v1/health/');

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
    expect(second.headers['x-ratelimit-limit']).toBeUndefined();
  });

  it('unknownRoute_Returns404Envelope', async () => {
    const { app } = buildApp();

    const res = await request(app).get('/api/v1/nope');

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('NOT_FOUND');
    expect(res.body.error.message).toBe('Route GET /api/v1/nope not found');
    expect(typeof res.body.error.timestamp).toBe('string');
  });
});

describe('rate limiting', () => {
  it('rateLimit_UnderLimit_SetsHeaders', async () => {
    const { app } = buildApp(testSettings({ requestsPerHour: 3 }));

    const res = await request(app).get('/api/v1/nope');

    expect(res.headers['x-ratelimit-limit']).toBe('3');
    expect(res.headers['x-ratelimit-remaining']).toBe('2');
    expect(res.headers['x-ratelimit-reset']).toBe('3600');
  });

  it('rateLimit_OverLimit_Returns429WithRetryAfter', async () => {
    const { app } = buildApp(testSettings({ requestsPerHour: 2 }));

    await request(app).get('/api/v1/nope');
    await request(app).get('/api/v1/nope');
    const res = await request(app).get('/api/v1/nope');

    expect(res.status).toBe(429);
    expect(res.body.error.code).toBe('RATE_LIMITED');
    expect(res.body.error.message).toBe('Rate limit exceeded. Please try again later');
    expect(res.headers['x-ratelimit-remaining']).toBe('0');
    expect(Number(res.headers['retry-after'])).toBeGreaterThan(0);
  });

  it('rateLimit_SeparateUsers_CountedSeparately', async () => {
    const { app, authHeader } = buildApp(testSettings({ requestsPerHour: 1 }));
    const alice = await authHeader('alice');
    const bob = await authHeader('bob');

    const first = await request(app).get('/api/v1/projects').set('Authorization', alice);
    const second = await request(app).get('/api/v1/projects').set('Authorization', bob);

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
  });

  it('rateLimit_CounterStoreFails_AllowsRequest', async () => {
    const { app, backend } = buildApp(testSettings({ requestsPerHour: 1 }));
    vi.spyOn(backend.counters, 'increment').mockRejectedValue(new Error('connection refused'));

    const res = await request(app).get('/api/v1/nope');

    expect(res.status).toBe(404);
    expect(res.headers['x-ratelimit-limit']).toBeUndefined();
  });

  it('malformedJson_Returns400', async () => {
    const { app, authHeader } = buildApp();

    const res = await request(app)
      .post('/api/v1/projects')
      .set('Authorization', await authHeader('alice'))
      .set('Content-Type', 'application/json')
      .send('{ "title": ');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.message).toBe('Malformed JSON body');
  });
});

describe('response headers', () => {
  it('securityHeaders_AnyResponse_SetsFixedHeaders', async () => {
    const { app } = buildApp();

    const res = await request(app).get('/api/v1/nope');

    expect(res.status).toBe(404);
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-frame-options']).toBe('DENY');
    expect(res.headers['referrer-policy']).toBe('strict-origin-when-cross-origin');
    expect(res.headers['content-security-policy']).toBe(
      "default-src 'self'; script-src 'self'; style-src 'self'; img-src 'self' data:; font-src 'self'"
    );
    expect(res.headers['strict-transport-security']).toBeUndefined();
  });

  it('securityHeaders_Production_AddsHsts', async () => {
    const { app } = buildApp(testSettings({}, true));

    const res = await request(app).get('/api/v1/health');

    expect(res.headers['strict-transport-security']).toBe('max-age=31536000; includeSubDomains');
  });

  it('requestId_CallerSuppliesId_EchoesIt', async () => {
    const { app } = buildApp();

    const res = await request(app).get('/api/v1/health').set('X-Request-ID', 'trace-42');

    expect(res.headers['x-request-id']).toBe('trace-42');
  });

  it('requestId_NoneOrUnsafe_GeneratesUuid', async () => {
    const { app } = buildApp();
    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

    const plain = await request(app).get('/api/v1/health');
    const unsafe = await request(app).get('/api/v1/health').set('X-Request-ID', 'two words');

    expect(plain.headers['x-request-id']).toMatch(uuid);
    expect(unsafe.headers['x-request-id']).toMatch(uuid);
  });

  it('requestLogger_FinishedRequest_LogsRequestId', async () => {
    const { app } = buildApp();
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.setLevel('info');

    try {
      await request(app).get('/api/v1/health').set('X-Request-ID', 'trace-7');
      await vi.waitFor(() => {
        const lines = info.mock.calls.map((call) => String(call[0]));
        expect(lines.filter((line) => line.startsWith('[http] GET /api/v1/health 200'))).toHaveLength(1);
      });
    } finally {
      logger.setLevel('silent');
    }

    const line = info.mock.calls.map((call) => String(call[0])).find((l) => l.startsWith('[http] GET'));
    expect(line).toMatch(/^\[http\] GET \/api\/v1\/health 200 \d+ms - requestId=trace-7$/);
    info.mockRestore();
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { pino } from 'pino';
import { buildApp } from '../app.js';

describe('HTTP API', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = buildApp({ logger: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health with security headers', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json().ok).toBe(true);
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  it('exposes the fine schedule', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/config' });
    expect(res.json().fines).toEqual({ uncollected: 100, contamination: 200 });
    expect(res.json().dayTypes).toEqual(['garbage', 'recycle']);
  });

  it('runs a seeded simulation', async () => {
    const payload = { dayType: 'garbage', locations: 5, seed: 7 };
    const res = await app.inject({ method: 'POST', url: '/api/simulate', payload });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.result.outcomes).toHaveLength(5);
    const sum = body.result.outcomes.reduce((s: number, o: { fineAmount: number }) => s + o.fineAmount, 0);
    expect(body.result.totalFines).toBe(sum);
    expect(body.summary.totalFines).toBe(sum);
    const first = body.result.outcomes[0];
    expect(body.log[0]).toBe(first.action === 'collect'
      ? '[step 1] Collected garbage at location 1.'
      : '[step 1] No garbage at location 1, moving on.');

    const again = await app.inject({ method: 'POST', url: '/api/simulate', payload });
    expect(again.json().result).toEqual(body.result);

    const metrics = await app.inject({ method: 'GET', url: '/api/metrics' });
    expect(metrics.json()).toEqual({ runs: 2, locationsVisited: 10, finesIssued: 2 * sum });
  });

  it('rejects a non-positive location count', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/simulate', payload: { dayType: 'recycle', locations: 0 } });
    expect(res.statusCode).toBe(400);
    expect(res.json().reason).toBe('invalid_configuration');
  });

  it('rejects out-of-range probabilities', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/simulate',
      payload: { dayType: 'recycle', locations: 3, probabilities: { scheduledWaste: 2 } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().reason).toBe('invalid_configuration');
  });

  it('rejects an unknown day type', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/simulate', payload: { dayType: 'compost', locations: 3 } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, reason: 'invalid_request' });
  });

  it.each([
    [{ dayType: 'garbage', locations: true }],
    [{ dayType: 'garbage', locations: '5' }],
    [{ dayType: 'garbage', locations: 3, bogus: 1 }],
  ])('rejects a body it would otherwise coerce or strip: %j', async (payload) => {
    const res = await app.inject({ method: 'POST', url: '/api/simulate', payload });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, reason: 'invalid_request' });
  });

  it('answers malformed JSON with the invalid_request shape', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/simulate',
      headers: { 'content-type': 'application/json' },
      payload: '{"dayType":',
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, reason: 'invalid_request' });
  });
});

describe('HTTP API logging', () => {
  it('does not log rate-limited requests as errors', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'info' }, { write: (line: string) => { lines.push(line); } });
    const app = buildApp({ logger, rateLimit: { max: 1, timeWindow: '1 minute' } });
    await app.ready();
    try {
      expect((await app.inject({ method: 'GET', url: '/api/health' })).statusCode).toBe(200);
      expect((await app.inject({ method: 'GET', url: '/api/health' })).statusCode).toBe(429);
    } finally {
      await app.close();
    }
    const levels = lines.map(line => (JSON.parse(line) as { level: number }).level);
    expect(levels.length).toBeGreaterThan(0);
    expect(levels.filter(level => level >= 50)).toEqual([]);
  });
});

/**
 * Dashboard Routes Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import { setupRoutes } from '../routes.js';
import { createEngine, type AdaptiveEngine } from '../../engine.js';
import { routeKey } from '../../metrics/types.js';
import { silentLogger } from '../../__tests__/fixtures.js';

const START = Date.UTC(2026, 4, 1);
const items = routeKey('GET', '/items/:id');

describe('Dashboard Routes', () => {
  let now: number;
  let engine: AdaptiveEngine;
  let app: Hono;

  const serve = (count: number) => {
    for (let i = 0; i < count; i++) {
      engine.onRequestEnd(engine.onRequestStart(items), 25, 200);
    }
  };

  beforeEach(() => {
    now = START;
    engine = createEngine({}, { logger: silentLogger(), now: () => now });
    app = setupRoutes(engine);
  });

  describe('GET /health', () => {
    it('should report the switch state', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', enabled: true, scheduled: false, cycle: 0 });
    });
  });

  describe('GET /report', () => {
    it('should return the snapshot as JSON', async () => {
      serve(20);
      const res = await app.request('/report');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        reportNumber: 1,
        enabled: true,
        totals: { totalRequests: 20 },
        routes: [{ route: 'GET /items/:id', state: 'cold' }],
      });
    });

    it('should return the printable report as text', async () => {
      const res = await app.request('/report/text');

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toMatch(/^text\/plain/);
      expect(await res.text()).toContain('HOTPATH REPORT #1');
    });
  });

  describe('GET /routes', () => {
    it('should describe a known route', async () => {
      serve(5);
      const res = await app.request(`/routes?method=get&path=${encodeURIComponent('/items/:id')}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ route: 'GET /items/:id', stats: { totalRequests: 5 } });
    });

    it('should answer 404 for an unknown route', async () => {
      const res = await app.request('/routes?method=GET&path=/missing');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Unknown route GET /missing' });
    });

    it('should require method and path', async () => {
      const res = await app.request('/routes?method=GET');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Query parameters "method" and "path" are required' });
    });
  });

  describe('GET /evolution', () => {
    it('should return the newest entries up to the limit', async () => {
      serve(20);
      engine.runCycle();
      const orders = routeKey('GET', '/orders');
      for (let i = 0; i < 20; i++) {
        engine.onRequestEnd(engine.onRequestStart(orders), 25, 200);
      }
      engine.runCycle();

      const res = await app.request('/evolution?limit=1');
      const body: unknown = await res.json();

      expect(body).toMatchObject({ total: 2, entries: [{ cycle: 2 }] });
    });

    it('should reject a limit out of range', async () => {
      const res = await app.request('/evolution?limit=0');
      expect(res.status).toBe(400);
    });
  });

  describe('POST /control/:action', () => {
    it('should disable and re-enable the engine', async () => {
      const off = await app.request('/control/disable', { method: 'POST' });
      expect(await off.json()).toEqual({ action: 'disable', ok: true, enabled: false });
      expect(engine.isEnabled).toBe(false);

      const on = await app.request('/control/enable', { method: 'POST' });
      expect(await on.json()).toEqual({ action: 'enable', ok: true, enabled: true });
    });

    it('should reset engine state', async () => {
      serve(20);
      const res = await app.request('/control/reset', { method: 'POST' });

      expect(res.status).toBe(200);
      expect(engine.recorder.getTotals().totalRequests).toBe(0);
    });

    it('should run a cycle on demand', async () => {
      serve(20);
      const res = await app.request('/control/optimize', { method: 'POST' });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        action: 'optimize',
        ok: true,
        cycle: 1,
        actions: [{ type: 'promote', target: 'GET /items/:id' }],
      });
    });

    it('should reject unknown actions', async () => {
      const res = await app.request('/control/explode', { method: 'POST' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Unknown action. Use: enable, disable, reset, optimize' });
    });

    it('should not accept control actions over GET', async () => {
      const res = await app.request('/control/reset');
      expect(res.status).toBe(404);
    });
  });
});

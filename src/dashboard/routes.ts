/**
 * Dashboard Routes - JSON and text endpoints over a running engine.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { AdaptiveEngine } from '../engine.js';
import { createEngineLogger } from '../logging/index.js';
import { routeKey } from '../metrics/types.js';

// Input validation schemas
const routeQuerySchema = z.object({
  method: z.string().min(1).transform(method => method.toUpperCase()),
  path: z.string().min(1),
});

const evolutionQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional().default(20),
});

const controlActionSchema = z.enum(['enable', 'disable', 'reset', 'optimize']);

export type ControlAction = z.infer<typeof controlActionSchema>;

export function setupRoutes<V>(engine: AdaptiveEngine<V>): Hono {
  const app = new Hono();
  const logger = createEngineLogger('info', { component: 'dashboard' });

  /**
   * GET /health - Liveness plus the engine's switch state
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      enabled: engine.isEnabled,
      scheduled: engine.isScheduled,
      cycle: engine.decision.cycle,
    });
  });

  /**
   * GET /report - Full snapshot
   */
  app.get('/report', (c) => {
    try {
      return c.json(engine.snapshot());
    } catch (error) {
      logger.error('Failed to build report', error instanceof Error ? error : { error });
      return c.json({ error: 'Internal server error', timestamp: new Date().toISOString() }, 500);
    }
  });

  /**
   * GET /report/text - Printable report
   */
  app.get('/report/text', (c) => {
    try {
      return c.text(engine.printableReport());
    } catch (error) {
      logger.error('Failed to render report', error instanceof Error ? error : { error });
      return c.text('Internal server error', 500);
    }
  });

  /**
   * GET /routes?method=GET&path=/users/:id - One route's entry
   */
  app.get('/routes', (c) => {
    const query = routeQuerySchema.safeParse({
      method: c.req.query('method'),
      path: c.req.query('path'),
    });
    if (!query.success) {
      return c.json({
        error: 'Query parameters "method" and "path" are required',
        details: query.error.issues,
      }, 400);
    }

    const route = engine.reporter.describeRoute(routeKey(query.data.method, query.data.path));
    if (!route) {
      return c.json({ error: `Unknown route ${query.data.method} ${query.data.path}` }, 404);
    }
    return c.json(route);
  });

  /**
   * GET /evolution - Recent optimizer actions, newest last
   */
  app.get('/evolution', (c) => {
    const query = evolutionQuerySchema.safeParse({ limit: c.req.query('limit') });
    if (!query.success) {
      return c.json({ error: 'limit must be an integer between 1 and 1000', details: query.error.issues }, 400);
    }
    const log = engine.optimizer.getEvolutionLog();
    return c.json({ total: log.length, entries: log.slice(-query.data.limit) });
  });

  /**
   * POST /control/:action - enable | disable | reset | optimize
   */
  app.post('/control/:action', (c) => {
    const action = controlActionSchema.safeParse(c.req.param('action'));
    if (!action.success) {
      return c.json({ error: `Unknown action. Use: ${controlActionSchema.options.join(', ')}` }, 400);
    }

    switch (action.data) {
      case 'enable':
        engine.enable();
        break;
      case 'disable':
        engine.disable();
        break;
      case 'reset':
        engine.reset();
        break;
      case 'optimize': {
        const result = engine.runCycle();
        if (!result) {
          return c.json({ action: action.data, ok: false, error: 'cycle already running' }, 409);
        }
        return c.json({
          action: action.data,
          ok: result.ok,
          cycle: result.cycle,
          actions: result.actions,
          durationMs: result.durationMs,
          ...(result.error && { error: result.error.message }),
        }, result.ok ? 200 : 500);
      }
    }

    logger.info(`Control action: ${action.data}`);
    return c.json({ action: action.data, ok: true, enabled: engine.isEnabled });
  });

  return app;
}

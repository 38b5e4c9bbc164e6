/**
 * Hono integration of the dispatch hook.
 *
 * Mount once, ahead of the routes it should observe:
 *
 *   const engine = createEngine<CachedResponse>();
 *   app.use('*', hotpathMiddleware(engine));
 *
 * Requests are keyed by method plus the matched route pattern
 * (`GET /users/:id`), never by the concrete path.
 */

import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import type { CacheKeyMaterial } from '../cache/fingerprint.js';
import type { RequestContext } from '../dispatch/types.js';
import type { AdaptiveEngine } from '../engine.js';
import {
  CORRELATION_HEADER,
  correlationContext,
  extractOrGenerateCorrelationId,
} from '../logging/index.js';
import { routeKey, type RouteKey } from '../metrics/types.js';

/**
 * A response as stored for a memoized route.
 */
export interface CachedResponse {
  status: number;
  headers: Array<[string, string]>;
  body: ArrayBuffer;
}

export interface HotpathMiddlewareOptions {
  /** Request headers whose value changes the response, e.g. `accept` */
  varyHeaders?: string[];
  /** Response header reporting HIT/MISS on memoized routes; false to omit */
  cacheHeader?: string | false;
  correlationHeader?: string;
  /** Monotonic clock for latency, in ms */
  clock?: () => number;
}

export type HotpathEnv = {
  Variables: {
    hotpath: RequestContext;
  };
};

/** Path recorded for requests no route matched */
export const UNMATCHED_ROUTE = '(unmatched)';

const ALL_METHODS = 'ALL';

const CATCH_ALL_PATHS = new Set(['*', '/*']);

/**
 * Pattern of the handler that will serve this request.
 *
 * Handlers registered with a method win, first match first. `use` middleware
 * and `app.all` handlers both show up as method ALL; among those the last
 * match that is not a catch-all is taken, since handlers are registered
 * after the middleware in front of them.
 */
export function resolveRouteKey(c: Context): RouteKey {
  const matched = c.req.matchedRoutes;
  const withMethod = matched.find(route => route.method !== ALL_METHODS);
  if (withMethod) return routeKey(c.req.method, withMethod.path);

  for (let i = matched.length - 1; i >= 0; i--) {
    const route = matched[i];
    if (route && !CATCH_ALL_PATHS.has(route.path)) {
      return routeKey(c.req.method, route.path);
    }
  }
  return routeKey(c.req.method, UNMATCHED_ROUTE);
}

export function hotpathMiddleware(
  engine: AdaptiveEngine<CachedResponse>,
  options: HotpathMiddlewareOptions = {}
) {
  const varyHeaders = (options.varyHeaders ?? []).map(name => name.toLowerCase());
  const cacheHeader = options.cacheHeader === undefined ? 'x-hotpath-cache' : lowerOrFalse(options.cacheHeader);
  const correlationHeader = (options.correlationHeader ?? CORRELATION_HEADER).toLowerCase();
  const clock = options.clock ?? (() => performance.now());
  const logger = engine.loggerFor('hono');

  const tag = (response: Response, values: Array<[string, string]>): Response => {
    const tagged = withHeaders(response, values);
    if (tagged === null) {
      logger.debug('Response headers are immutable and the response cannot be copied; sent untagged', {
        status: response.status,
      });
      return response;
    }
    return tagged;
  };

  return createMiddleware<HotpathEnv>(async (c, next) => {
    const startedAt = clock();
    const key = resolveRouteKey(c);
    const headers = c.req.header();
    const correlationId = extractOrGenerateCorrelationId(headers, correlationHeader);

    return correlationContext.run(correlationId, async () => {
      const token = engine.onRequestStart(key);
      const material = cacheKeyMaterial(c, varyHeaders);
      let status = 500;
      let responseBytes = 0;

      try {
        const cached = engine.shouldServeFromCache(key, material);
        if (cached) {
          status = cached.status;
          responseBytes = cached.body.byteLength;
          const response = new Response(cached.body, { status: cached.status, headers: cached.headers });
          if (cacheHeader) response.headers.set(cacheHeader, 'HIT');
          response.headers.set(correlationHeader, correlationId);
          return response;
        }

        const context: RequestContext = {
          routeKey: key,
          method: c.req.method,
          path: c.req.path,
          correlationId,
          headers,
          cacheKey: material,
          locals: new Map(),
        };
        c.set('hotpath', context);

        const pipeline = engine.getPipeline();
        if (pipeline) {
          const result = await pipeline.run(context);
          if (result.haltedBy !== null) {
            const halted = context.response ?? c.text(`Request halted by ${result.haltedBy}`, 403);
            status = context.status ?? halted.status;
            responseBytes = contentLength(halted);
            return tag(halted, [[correlationHeader, correlationId]]);
          }
        }

        await next();

        status = c.res.status;
        responseBytes = contentLength(c.res);

        const memoized = engine.isEnabled && engine.optimizer.isMemoized(key);
        const values: Array<[string, string]> = [[correlationHeader, correlationId]];
        if (memoized && cacheHeader) values.push([cacheHeader, 'MISS']);
        const tagged = tag(c.res, values);
        if (tagged !== c.res) c.res = tagged;

        if (memoized) {
          if (c.req.method === 'GET' && status === 200) {
            const body = await c.res.clone().arrayBuffer();
            responseBytes = body.byteLength;
            engine.storeResponse(key, material, {
              status,
              headers: [...c.res.headers.entries()].filter(([name]) => name !== correlationHeader && name !== cacheHeader),
              body,
            });
          }
        }
        return undefined;
      } finally {
        engine.onRequestEnd(token, clock() - startedAt, status, responseBytes);
      }
    });
  });
}

function cacheKeyMaterial(c: Context, varyHeaders: readonly string[]): CacheKeyMaterial {
  const query = new URL(c.req.url).searchParams;
  if (varyHeaders.length === 0) return { query };

  const attributes: Record<string, string | undefined> = {};
  for (const name of varyHeaders) {
    attributes[name] = c.req.header(name);
  }
  return { query, attributes };
}

/**
 * Sets headers on the response, or on a copy when its headers are immutable
 * (`Response.redirect`, a response passed through from `fetch`). Null when
 * neither can be written, as for `Response.error()`.
 */
export function withHeaders(response: Response, values: ReadonlyArray<readonly [string, string]>): Response | null {
  try {
    for (const [name, value] of values) response.headers.set(name, value);
    return response;
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
  }

  let copy: Response;
  try {
    copy = new Response(response.body, response);
  } catch (error) {
    if (error instanceof RangeError || error instanceof TypeError) return null;
    throw error;
  }
  for (const [name, value] of values) copy.headers.set(name, value);
  return copy;
}

function contentLength(response: Response): number {
  const header = response.headers.get('content-length');
  const parsed = header === null ? NaN : Number(header);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : 0;
}

function lowerOrFalse(value: string | false): string | false {
  return value === false ? false : value.toLowerCase();
}

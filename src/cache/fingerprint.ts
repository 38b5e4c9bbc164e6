/**
 * Deterministic cache keys for memoized responses.
 *
 * Two requests share a key exactly when they hit the same route with the same
 * query parameters (parameter order ignored, order of repeated values kept)
 * and the same declared cache-relevant attributes (e.g. Accept, a tenant id).
 */

import { createHash } from 'node:crypto';
import type { RouteId } from '../metrics/types.js';

export type QueryInput =
  | URLSearchParams
  | Record<string, string | readonly string[] | undefined>
  | string;

export interface CacheKeyMaterial {
  query?: QueryInput;
  /** Request attributes that change the response, by name */
  attributes?: Record<string, string | undefined>;
}

export const KEY_SEPARATOR = '|';

function normalizeQuery(query: QueryInput | undefined): Array<[string, string[]]> {
  if (query === undefined) return [];

  const grouped = new Map<string, string[]>();
  const add = (name: string, value: string) => {
    const values = grouped.get(name);
    if (values) {
      values.push(value);
    } else {
      grouped.set(name, [value]);
    }
  };

  if (typeof query === 'string' || query instanceof URLSearchParams) {
    const params = typeof query === 'string' ? new URLSearchParams(query) : query;
    params.forEach((value, name) => add(name, value));
  } else {
    for (const [name, value] of Object.entries(query)) {
      if (value === undefined) continue;
      if (typeof value === 'string') {
        add(name, value);
      } else {
        value.forEach(item => add(name, item));
      }
    }
  }

  return [...grouped.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function normalizeAttributes(attributes: CacheKeyMaterial['attributes']): Array<[string, string]> {
  if (!attributes) return [];
  return Object.entries(attributes)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([name, value]): [string, string] => [name.toLowerCase(), value])
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * `"<route id>|<32 hex chars>"`. The route prefix lets a route's entries be
 * dropped together with `invalidatePrefix(routeCachePrefix(route))`.
 */
export function fingerprint(route: RouteId, material: CacheKeyMaterial = {}): string {
  const canonical = JSON.stringify([
    route,
    normalizeQuery(material.query),
    normalizeAttributes(material.attributes),
  ]);
  const digest = createHash('sha256').update(canonical).digest('hex').slice(0, 32);
  return `${routeCachePrefix(route)}${digest}`;
}

export function routeCachePrefix(route: RouteId): string {
  return `${route}${KEY_SEPARATOR}`;
}

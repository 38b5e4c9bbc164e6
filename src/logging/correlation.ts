/**
 * Correlation ids for tracing a request through the dispatch hook,
 * the handler and the log lines it produces.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

export const CORRELATION_HEADER = 'x-correlation-id';

/**
 * 8 random hex characters, e.g. "a1b2c3d4"
 */
export function generateCorrelationId(): string {
  return randomBytes(4).toString('hex');
}

export function isValidCorrelationId(id: string): boolean {
  return /^[a-f0-9]{8}$/.test(id);
}

class CorrelationContext {
  private readonly storage = new AsyncLocalStorage<string>();

  /**
   * Current correlation id, or undefined outside of `run`.
   */
  getId(): string | undefined {
    return this.storage.getStore();
  }

  /**
   * Runs `fn` (sync or async) with `id` as the active correlation id.
   */
  run<T>(id: string, fn: () => T): T {
    return this.storage.run(id, fn);
  }

  runWithNew<T>(fn: () => T): { result: T; correlationId: string } {
    const correlationId = generateCorrelationId();
    return { result: this.run(correlationId, fn), correlationId };
  }
}

export const correlationContext = new CorrelationContext();

/**
 * Reuses a well-formed id from the request headers, otherwise mints one.
 */
export function extractOrGenerateCorrelationId(
  headers: Record<string, string | undefined> = {},
  headerName = CORRELATION_HEADER
): string {
  const wanted = headerName.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value && isValidCorrelationId(value)) {
      return value;
    }
  }
  return generateCorrelationId();
}

/**
 * Wraps an async function so each call runs under the caller's correlation
 * id, or a fresh one when there is none.
 */
export function withCorrelation<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>
): (...args: T) => Promise<R> {
  return async (...args: T): Promise<R> => {
    const correlationId = correlationContext.getId() ?? generateCorrelationId();
    return correlationContext.run(correlationId, () => fn(...args));
  };
}

import type { ZodError } from 'zod';

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised when engine configuration is rejected. Values are never clamped into
 * range; the caller gets every failing field at once.
 */
export class ConfigValidationError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[], source?: string) {
    const where = source ? ` in ${source}` : '';
    const detail = issues.map(issue => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
    super(`Invalid engine configuration${where}: ${detail}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }

  static fromZod(error: ZodError, source?: string): ConfigValidationError {
    return new ConfigValidationError(
      error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      source
    );
  }
}

/**
 * Shapes an unknown thrown value for `logger.error`.
 */
export function describeError(error: unknown): Error | Record<string, unknown> {
  return error instanceof Error ? error : { error: String(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

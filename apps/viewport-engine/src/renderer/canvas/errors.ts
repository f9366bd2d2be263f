/**
 * Error types for the viewport engine.
 *
 * Only configuration errors are thrown. Build failures, index staleness and
 * degenerate geometry are recovered inside the engine.
 */

export interface ConfigIssue {
  path: (string | number)[];
  message: string;
  code: 'not_finite' | 'not_positive' | 'negative' | 'not_integer' | 'invalid_range';
}

/**
 * Invalid engine configuration (zoom bounds, capacities, budgets).
 */
export class EngineConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[]
  ) {
    super(message);
    this.name = 'EngineConfigError';
  }
}

/**
 * Wraps a non-Error throw from a build operation so it can be logged uniformly.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

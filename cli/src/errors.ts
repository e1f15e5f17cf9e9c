export type FlyoverErrorCode =
  | 'INVALID_IMAGE'
  | 'INVALID_CONFIGURATION'
  | 'SCORING_FAILURE'
  | 'RENDER_FAILURE'
  | 'ENCODING_FAILURE';

/**
 * Every failure in a flyover run is terminal; there is no retry inside the
 * planner or the adapters. The code tells the caller which stage gave up.
 */
export class FlyoverError extends Error {
  constructor(
    message: string,
    public code: FlyoverErrorCode,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FlyoverError';
  }
}

export function isFlyoverError(err: unknown): err is FlyoverError {
  return err instanceof FlyoverError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

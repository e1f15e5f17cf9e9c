import { FlyoverError } from '../src/errors.js';

/**
 * Run fn and return the FlyoverError it throws; fails the test otherwise.
 */
export function catchFlyoverError(fn: () => unknown): FlyoverError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FlyoverError) return err;
    throw err;
  }
  throw new Error('Expected a FlyoverError to be thrown');
}

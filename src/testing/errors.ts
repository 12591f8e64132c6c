import { AccrueError, isAccrueError, type AccrueErrorCode } from '../errors/AccrueError.js';

/** Code of the AccrueError `fn` throws; undefined when it returns normally. */
export function codeOf(fn: () => unknown): AccrueErrorCode | 'not-accrue-error' | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof AccrueError ? err.code : 'not-accrue-error';
  }
  return undefined;
}

/** Awaits `promise` and returns the AccrueError it rejects with. */
export async function rejectionOf(promise: Promise<unknown>): Promise<AccrueError> {
  try {
    await promise;
  } catch (err) {
    if (isAccrueError(err)) return err;
    throw new Error(`expected AccrueError, got ${String(err)}`);
  }
  throw new Error('expected promise to reject');
}

import { AccrueError } from '../errors/AccrueError.js';

export function invariant(condition: unknown, message: string, details?: Record<string, unknown>): asserts condition {
  if (!condition) {
    throw new AccrueError('InvariantViolation', message, details !== undefined ? { details } : undefined);
  }
}

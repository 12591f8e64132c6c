import { AccrueError } from '../errors/AccrueError.js';

type Compensation = { label: string; undo: () => void | Promise<void> };

type UndoFailure = { step: string; error: unknown };

/**
 * Runs a sequence of steps all-or-nothing. Each applied step registers the action that undoes it;
 * on failure those run in reverse order and the original error is rethrown.
 */
export class AtomicOperation {
  private readonly compensations: Compensation[] = [];

  constructor(readonly name: string) {}

  async step<T>(label: string, apply: () => T | Promise<T>, undo: (result: T) => void | Promise<void>): Promise<T> {
    const result = await apply();
    this.compensations.push({ label, undo: () => undo(result) });
    return result;
  }

  /**
   * Runs every registered undo, latest first, even after one of them fails.
   * Failures are reported together as one `RollbackFailed`.
   */
  async rollback(): Promise<void> {
    const failures: UndoFailure[] = [];
    for (const c of this.compensations.splice(0).reverse()) {
      try {
        await c.undo();
      } catch (error) {
        failures.push({ step: c.label, error });
      }
    }

    const first = failures[0];
    if (!first) return;

    const steps = failures.map((f) => f.step);
    const cause =
      failures.length === 1
        ? first.error
        : new AggregateError(
            failures.map((f) => f.error),
            `${this.name}: ${failures.length} undo steps failed`
          );
    throw new AccrueError('RollbackFailed', `${this.name}: undo of ${steps.join(', ')} failed`, {
      cause,
      details: { operation: this.name, steps }
    });
  }

  static async run<T>(name: string, body: (op: AtomicOperation) => Promise<T>): Promise<T> {
    const op = new AtomicOperation(name);
    try {
      return await body(op);
    } catch (err) {
      try {
        await op.rollback();
      } catch (rollbackErr) {
        if (rollbackErr instanceof AccrueError && rollbackErr.details !== undefined) {
          rollbackErr.details['original'] = err;
        }
        throw rollbackErr;
      }
      throw err;
    }
  }
}

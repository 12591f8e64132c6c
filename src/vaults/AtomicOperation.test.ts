import { describe, expect, it } from 'vitest';

import { rejectionOf } from '../testing/errors.js';
import { AtomicOperation } from './AtomicOperation.js';

describe('AtomicOperation', () => {
  it('undoes applied steps in reverse order and rethrows', async () => {
    const log: string[] = [];
    const failure = new Error('boom');

    await expect(
      AtomicOperation.run('test', async (op) => {
        await op.step('a', () => log.push('do a'), () => void log.push('undo a'));
        await op.step('b', () => log.push('do b'), () => void log.push('undo b'));
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(log).toEqual(['do a', 'do b', 'undo b', 'undo a']);
  });

  it('passes each step result to its undo', async () => {
    const undone: number[] = [];
    await expect(
      AtomicOperation.run('test', async (op) => {
        await op.step('a', () => 7, (n) => void undone.push(n));
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(undone).toEqual([7]);
  });

  it('reports a failed undo as RollbackFailed with the original error attached', async () => {
    const undoError = new Error('cannot undo');
    const original = new Error('boom');
    const run = AtomicOperation.run('test', async (op) => {
      await op.step('a', () => 1, () => {
        throw undoError;
      });
      throw original;
    });

    const err = await rejectionOf(run);
    expect(err.code).toBe('RollbackFailed');
    expect(err.cause).toBe(undoError);
    expect(err.details).toEqual({ operation: 'test', steps: ['a'], original });
  });

  it('keeps undoing earlier steps after one undo fails', async () => {
    const log: string[] = [];
    const run = AtomicOperation.run('test', async (op) => {
      await op.step('a', () => undefined, () => void log.push('undo a'));
      await op.step('b', () => undefined, () => {
        throw new Error('b stuck');
      });
      await op.step('c', () => undefined, () => {
        throw new Error('c stuck');
      });
      throw new Error('boom');
    });

    const err = await rejectionOf(run);
    expect(log).toEqual(['undo a']);
    expect(err.details?.['steps']).toEqual(['c', 'b']);
    expect(err.cause).toBeInstanceOf(AggregateError);
    expect(err.message).toBe('test: undo of c, b failed');
  });

  it('returns the body result when nothing fails', async () => {
    const result = await AtomicOperation.run('test', async (op) => op.step('a', () => 42, () => undefined));
    expect(result).toBe(42);
  });
});

import type { Connection } from '@solana/web3.js';
import { AccrueError } from '../errors/AccrueError.js';

/** Source of the current unix timestamp, in seconds. */
export type Clock = () => bigint | Promise<bigint>;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

/** Reads the block time of the cluster's current slot, so simulated accrual matches on-chain time. */
export function clusterClock(connection: Connection): Clock {
  return async () => {
    const slot = await connection.getSlot();
    const blockTime = await connection.getBlockTime(slot);
    if (blockTime === null) {
      throw new AccrueError('InvariantViolation', 'Block time unavailable for current slot', {
        details: { slot }
      });
    }
    return BigInt(blockTime);
  };
}

export function fixedClock(timestamp: bigint): Clock {
  return () => timestamp;
}

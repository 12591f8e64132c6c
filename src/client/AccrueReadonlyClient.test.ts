import { describe, expect, it } from 'vitest';
import type { Idl, Program } from '@coral-xyz/anchor';
import type { Connection, PublicKey } from '@solana/web3.js';

import { PDA } from '../accounts/PDA.js';
import { rejectionOf } from '../testing/errors.js';
import { testKey } from '../testing/keys.js';
import { fixedClock } from '../utils/clock.js';
import { AccrueReadonlyClient } from './AccrueReadonlyClient.js';

const PROGRAM = testKey(50);
const ASSET = testKey(1);
const MARKET = PDA.market(PROGRAM, ASSET).publicKey;

const connection = {
  getAccountInfo: async (pk: PublicKey) => (pk.equals(MARKET) ? { data: Buffer.alloc(0) } : null)
} as unknown as Connection;

const program = {
  account: {
    lendingMarket: {
      fetch: async (pk: PublicKey) => {
        if (!pk.equals(MARKET)) throw new Error('unknown account');
        return {
          underlyingMint: ASSET,
          principalMint: testKey(5),
          accrualTimestamp: 100,
          exchangeRateStored: 1_234_000_000_000_000_000n,
          totalCash: 1_000,
          totalBorrows: 500,
          totalReserves: 10,
          totalSupply: 1_000,
          reserveFactor: 100_000_000_000_000_000n,
          initialExchangeRate: 200_000_000_000_000_000n,
          mintPaused: false
        };
      }
    }
  },
  provider: { connection }
} as unknown as Program<Idl>;

function client(now: bigint): AccrueReadonlyClient {
  return new AccrueReadonlyClient({
    connection,
    programId: PROGRAM,
    program,
    accountNames: { market: 'lendingMarket' },
    rateModel: () => ({ getBorrowRate: async () => 1_000_000_000_000n }),
    clock: fixedClock(now)
  });
}

describe('AccrueReadonlyClient', () => {
  it('replicates the market exchange rate for an asset', async () => {
    const view = await client(101n).exchangeRate(ASSET);
    expect(view.exchangeRate).toBe(1_490_000_000_000_000_000n);
    expect(view.accrual?.totalBorrows).toBe(500n);
  });

  it('returns the stored rate when the market accrued this second', async () => {
    const view = await client(100n).exchangeRate(ASSET);
    expect(view.exchangeRate).toBe(1_234_000_000_000_000_000n);
  });

  it('fails for assets without a market', async () => {
    expect((await rejectionOf(client(101n).exchangeRate(testKey(9)))).code).toBe('MarketUnresolved');
  });

  it('requires a program or an idl', () => {
    expect(
      () =>
        new AccrueReadonlyClient({
          connection,
          programId: PROGRAM,
          rateModel: () => ({ getBorrowRate: async () => 0n })
        })
    ).toThrow('Provide either `program` or `idl` to AccrueReadonlyClient');
  });
});

import { describe, expect, it } from 'vitest';
import { ProgramError } from '@coral-xyz/anchor';
import type { Idl, Program } from '@coral-xyz/anchor';
import type { PublicKey } from '@solana/web3.js';
import BN from 'bn.js';

import { codeOf, rejectionOf } from '../testing/errors.js';
import { testKey } from '../testing/keys.js';
import { WAD } from '../utils/math.js';
import { AnchorMarket, marketStatusFromError } from './AnchorMarket.js';
import { MARKET_OK } from './Market.js';

const MARKET = testKey(2);
const UNDERLYING = testKey(1);
const PRINCIPAL = testKey(5);
const USER = testKey(10);

const rawMarket = {
  underlyingMint: UNDERLYING,
  principalMint: PRINCIPAL,
  accrualTimestamp: new BN(1_700_000_000),
  exchangeRateStored: new BN('200000000000000000'),
  totalCash: new BN(1_000),
  totalBorrows: new BN(500),
  totalReserves: 10n,
  totalSupply: 5_000,
  reserveFactor: new BN('100000000000000000'),
  initialExchangeRate: new BN('200000000000000000')
};

function fakeProgram(opts: { signer?: PublicKey; rpc?: () => Promise<string> } = {}) {
  const calls: Array<{ amount: string; accounts: Record<string, PublicKey> }> = [];
  let fetchCount = 0;
  const method = (amount: BN) => ({
    accountsStrict: (accounts: Record<string, PublicKey>) => {
      calls.push({ amount: amount.toString(), accounts });
      return { rpc: opts.rpc ?? (async () => 'signature') };
    }
  });
  const program = {
    account: {
      market: {
        fetch: async () => {
          fetchCount += 1;
          return rawMarket;
        }
      }
    },
    methods: { mint: method, redeemUnderlying: method },
    provider: {
      publicKey: opts.signer,
      connection: { getAccountInfo: async () => null }
    }
  } as unknown as Program<Idl>;
  return { program, calls, fetches: () => fetchCount };
}

const rateModel = { getBorrowRate: async () => 7n };

describe('AnchorMarket', () => {
  it('decodes the market account into a snapshot', async () => {
    const { program } = fakeProgram();
    const market = new AnchorMarket({ program, marketId: MARKET, rateModel });

    expect(await market.getSnapshot()).toEqual({
      accrualTimestamp: 1_700_000_000n,
      storedExchangeRate: WAD / 5n,
      cash: 1_000n,
      borrowsPrior: 500n,
      reservesPrior: 10n,
      totalPrincipalSupply: 5_000n,
      reserveFactor: WAD / 10n,
      initialExchangeRate: WAD / 5n,
      mintPaused: false
    });
    expect(await market.getBorrowRate(1n, 2n, 3n)).toBe(7n);
  });

  it('rejects malformed accounts', () => {
    expect(codeOf(() => AnchorMarket.defaultMarketDecoder({ ...rawMarket, principalMint: 'x' }, MARKET))).toBe(
      'AccountParseError'
    );
    expect(codeOf(() => AnchorMarket.defaultMarketDecoder({ ...rawMarket, totalCash: 'lots' }, MARKET))).toBe(
      'AccountParseError'
    );
    expect(codeOf(() => AnchorMarket.defaultMarketDecoder(null, MARKET))).toBe('AccountParseError');
  });

  it('fails when the program has no market account type', async () => {
    const { program } = fakeProgram();
    const market = new AnchorMarket({ program, marketId: MARKET, rateModel, accountName: 'pool' });
    expect((await rejectionOf(market.getSnapshot())).code).toBe('ProgramNotConfigured');
  });

  it('reads a missing principal token account as zero', async () => {
    const { program } = fakeProgram();
    const market = new AnchorMarket({ program, marketId: MARKET, rateModel });
    expect(await market.principalBalanceOf(USER)).toBe(0n);
  });

  it('reads snapshot and principal balance from a single account fetch', async () => {
    const { program, fetches } = fakeProgram();
    const market = new AnchorMarket({ program, marketId: MARKET, rateModel });

    const position = await market.getPosition(USER);

    expect(position.principalBalance).toBe(0n);
    expect(position.snapshot.cash).toBe(1_000n);
    expect(position.snapshot.storedExchangeRate).toBe(WAD / 5n);
    expect(fetches()).toBe(1);
  });

  it('sends mint for the provider wallet', async () => {
    const { program, calls } = fakeProgram({ signer: USER });
    const market = new AnchorMarket({ program, marketId: MARKET, rateModel });

    expect(await market.mint(USER, 250n)).toBe(MARKET_OK);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.amount).toBe('250');
    expect(calls[0]?.accounts['market']?.equals(MARKET)).toBe(true);
    expect(calls[0]?.accounts['principalMint']?.equals(PRINCIPAL)).toBe(true);
  });

  it('surfaces program error codes as market status', async () => {
    const { program } = fakeProgram({
      signer: USER,
      rpc: async () => {
        throw new ProgramError(13, 'mint paused');
      }
    });
    const market = new AnchorMarket({ program, marketId: MARKET, rateModel });
    expect(await market.redeemUnderlying(USER, 1n)).toBe(13);
  });

  it('rethrows failures that never reached the program', async () => {
    const { program } = fakeProgram({
      signer: USER,
      rpc: async () => {
        throw new Error('socket hang up');
      }
    });
    const market = new AnchorMarket({ program, marketId: MARKET, rateModel });
    await expect(market.mint(USER, 1n)).rejects.toThrow('socket hang up');
  });

  it('requires the provider wallet to be the market user', async () => {
    const { program } = fakeProgram({ signer: testKey(99) });
    const market = new AnchorMarket({ program, marketId: MARKET, rateModel });
    expect((await rejectionOf(market.mint(USER, 1n))).code).toBe('UnauthorizedAuthority');
  });

  it('maps only program errors to a status', () => {
    expect(marketStatusFromError(new ProgramError(6001, 'custom'))).toBe(6001);
    expect(marketStatusFromError(new Error('other'))).toBeUndefined();
  });
});

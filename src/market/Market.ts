import type { PublicKey } from '@solana/web3.js';
import type { MarketSnapshot } from '../types/MarketSnapshot.js';

/** Status returned by a market entry point; anything other than `MARKET_OK` is a rejection. */
export type MarketStatus = number;

export const MARKET_OK: MarketStatus = 0;

/** Market state and one holder's principal balance, decoded from the same account read. */
export type MarketPosition = {
  snapshot: MarketSnapshot;
  principalBalance: bigint;
};

export interface InterestRateModel {
  /** Borrow rate per second, WAD-scaled. Opaque to the SDK. */
  getBorrowRate(cash: bigint, borrows: bigint, reserves: bigint): Promise<bigint>;
}

/**
 * Capability surface of a money market. The SDK only reads the snapshot and rate model;
 * `mint` and `redeemUnderlying` are the two entry points a vault calls to move underlying.
 */
export interface Market extends InterestRateModel {
  readonly id: PublicKey;

  getSnapshot(): Promise<MarketSnapshot>;
  principalBalanceOf(owner: PublicKey): Promise<bigint>;
  getPosition(holder: PublicKey): Promise<MarketPosition>;

  /** Pulls `assets` of underlying from `minter` (which must have approved the market). */
  mint(minter: PublicKey, assets: bigint): Promise<MarketStatus>;
  /** Burns principal tokens of `redeemer` and sends `assets` of underlying back to it. */
  redeemUnderlying(redeemer: PublicKey, assets: bigint): Promise<MarketStatus>;
}

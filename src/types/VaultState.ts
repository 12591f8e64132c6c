import type { PublicKey } from '@solana/web3.js';

export type VaultState = {
  vault: PublicKey;
  asset: PublicKey;
  market: PublicKey;
  rewardRecipient: PublicKey;

  totalAssets: bigint;
  totalShares: bigint;
  exchangeRate: bigint;

  /** Market cash at read time; bounds withdrawals. */
  liquidity: bigint;
  depositsPaused: boolean;
};

export type VaultReceipt = {
  assets: bigint;
  shares: bigint;

  /** Valuation recomputed after the market call returned. */
  totalAssets: bigint;
};

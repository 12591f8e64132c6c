import type { PublicKey } from '@solana/web3.js';

/** Fungible token the vault custodies; on Solana an SPL mint, elsewhere any ledger with the same moves. */
export interface AssetToken {
  readonly mint: PublicKey;

  balanceOf(owner: PublicKey): Promise<bigint>;
  allowance(owner: PublicKey, spender: PublicKey): Promise<bigint>;

  transfer(from: PublicKey, to: PublicKey, amount: bigint): Promise<void>;
  /** Sets (not increments) the amount `spender` may pull from `owner`. */
  approve(owner: PublicKey, spender: PublicKey, amount: bigint): Promise<void>;
}

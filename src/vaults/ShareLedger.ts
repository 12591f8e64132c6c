import type { PublicKey } from '@solana/web3.js';
import { AccrueError } from '../errors/AccrueError.js';
import { UINT256_MAX, checkedAdd } from '../utils/math.js';

function key(owner: PublicKey): string {
  return owner.toBase58();
}

/**
 * Vault share balances, supply and allowances. Owned by the vault; holds no market state.
 */
export class ShareLedger {
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private supply = 0n;

  get totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(owner: PublicKey): bigint {
    return this.balances.get(key(owner)) ?? 0n;
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.allowances.get(`${key(owner)}:${key(spender)}`) ?? 0n;
  }

  approve(owner: PublicKey, spender: PublicKey, shares: bigint): void {
    if (shares < 0n) throw new AccrueError('InvalidArgument', 'allowance must be non-negative');
    this.allowances.set(`${key(owner)}:${key(spender)}`, shares);
  }

  /** UINT256_MAX is an infinite allowance and is never decremented. */
  spendAllowance(owner: PublicKey, spender: PublicKey, shares: bigint): void {
    const allowed = this.allowance(owner, spender);
    if (allowed === UINT256_MAX) return;
    if (allowed < shares) {
      throw new AccrueError('InsufficientAllowance', 'share allowance too low', {
        details: { owner: key(owner), spender: key(spender), allowed: allowed.toString(), shares: shares.toString() }
      });
    }
    this.approve(owner, spender, allowed - shares);
  }

  mint(to: PublicKey, shares: bigint): void {
    this.supply = checkedAdd(this.supply, shares);
    this.balances.set(key(to), this.balanceOf(to) + shares);
  }

  burn(from: PublicKey, shares: bigint): void {
    this.debit(from, shares);
    this.supply -= shares;
  }

  transfer(from: PublicKey, to: PublicKey, shares: bigint): void {
    this.debit(from, shares);
    this.balances.set(key(to), this.balanceOf(to) + shares);
  }

  private debit(from: PublicKey, shares: bigint): void {
    if (shares < 0n) throw new AccrueError('InvalidArgument', 'shares must be non-negative');
    const balance = this.balanceOf(from);
    if (balance < shares) {
      throw new AccrueError('InsufficientShares', 'share balance too low', {
        details: { owner: key(from), balance: balance.toString(), shares: shares.toString() }
      });
    }
    this.balances.set(key(from), balance - shares);
  }
}

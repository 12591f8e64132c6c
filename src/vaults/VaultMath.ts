import { invariant } from '../utils/invariant.js';
import { UINT256_MAX, divWadDown, minBigInt, mulDivDown, mulDivUp, mulWadDown } from '../utils/math.js';

/** Inputs every share/asset conversion needs, read fresh for each call. */
export type VaultValuation = {
  totalAssets: bigint;
  totalShares: bigint;
};

export class VaultMath {
  static validate(v: VaultValuation): void {
    invariant(v.totalAssets >= 0n, 'totalAssets must be non-negative');
    invariant(v.totalShares >= 0n, 'totalShares must be non-negative');
  }

  /** Underlying value of a principal-token balance at `exchangeRate`. */
  static totalAssets(principalBalance: bigint, exchangeRate: bigint): bigint {
    return mulWadDown(principalBalance, exchangeRate);
  }

  /** Principal tokens the market issues for `assets` at `exchangeRate`, rounded down. */
  static principalFor(assets: bigint, exchangeRate: bigint): bigint {
    return divWadDown(assets, exchangeRate);
  }

  // An empty vault converts 1:1 in both directions.

  static convertToShares(v: VaultValuation, assets: bigint): bigint {
    this.validate(v);
    return v.totalShares === 0n ? assets : mulDivDown(assets, v.totalShares, v.totalAssets);
  }

  static convertToAssets(v: VaultValuation, shares: bigint): bigint {
    this.validate(v);
    return v.totalShares === 0n ? shares : mulDivDown(shares, v.totalAssets, v.totalShares);
  }

  static previewDeposit(v: VaultValuation, assets: bigint): bigint {
    return this.convertToShares(v, assets);
  }

  static previewMint(v: VaultValuation, shares: bigint): bigint {
    this.validate(v);
    return v.totalShares === 0n ? shares : mulDivUp(shares, v.totalAssets, v.totalShares);
  }

  static previewWithdraw(v: VaultValuation, assets: bigint): bigint {
    this.validate(v);
    return v.totalShares === 0n ? assets : mulDivUp(assets, v.totalShares, v.totalAssets);
  }

  static previewRedeem(v: VaultValuation, shares: bigint): bigint {
    return this.convertToAssets(v, shares);
  }

  /** Deposits and mints are closed while the market has minting paused. */
  static maxDeposit(depositsPaused: boolean): bigint {
    return depositsPaused ? 0n : UINT256_MAX;
  }

  static maxMint(depositsPaused: boolean): bigint {
    return depositsPaused ? 0n : UINT256_MAX;
  }

  /** Bounded by both the owner's entitlement and what the market holds liquid. */
  static maxWithdraw(v: VaultValuation, marketCash: bigint, ownerShares: bigint): bigint {
    return minBigInt(marketCash, this.convertToAssets(v, ownerShares));
  }

  static maxRedeem(v: VaultValuation, marketCash: bigint, ownerShares: bigint): bigint {
    return minBigInt(this.convertToShares(v, marketCash), ownerShares);
  }
}

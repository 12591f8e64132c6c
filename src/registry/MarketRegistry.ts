import type { PublicKey } from '@solana/web3.js';
import { AccrueError } from '../errors/AccrueError.js';

export interface MarketRegistry {
  /** Market serving `asset`; fails with `MarketUnresolved` when there is none. */
  resolveMarket(asset: PublicKey): Promise<PublicKey>;
}

export function marketUnresolved(asset: PublicKey): AccrueError {
  return new AccrueError('MarketUnresolved', 'No market registered for asset', {
    details: { asset: asset.toBase58() }
  });
}

/**
 * Asset → market lookup owned by whoever constructs it. Entries are set or overwritten by key,
 * never removed.
 */
export class InMemoryMarketRegistry implements MarketRegistry {
  private readonly markets = new Map<string, PublicKey>();

  constructor(entries: Iterable<readonly [PublicKey, PublicKey]> = []) {
    for (const [asset, market] of entries) this.register(asset, market);
  }

  register(asset: PublicKey, market: PublicKey): void {
    this.markets.set(asset.toBase58(), market);
  }

  async resolveMarket(asset: PublicKey): Promise<PublicKey> {
    const market = this.markets.get(asset.toBase58());
    if (!market) throw marketUnresolved(asset);
    return market;
  }
}

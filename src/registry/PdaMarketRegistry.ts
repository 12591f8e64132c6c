import type { Commitment, Connection, PublicKey } from '@solana/web3.js';
import { PDA } from '../accounts/PDA.js';
import { marketUnresolved, type MarketRegistry } from './MarketRegistry.js';

/**
 * Resolves markets by their program-derived address; an asset has a market once the
 * account at that address exists.
 */
export class PdaMarketRegistry implements MarketRegistry {
  constructor(
    readonly connection: Connection,
    readonly programId: PublicKey,
    readonly commitment?: Commitment
  ) {}

  marketAddress(asset: PublicKey): PublicKey {
    return PDA.market(this.programId, asset).publicKey;
  }

  async resolveMarket(asset: PublicKey): Promise<PublicKey> {
    const market = this.marketAddress(asset);
    const info = await this.connection.getAccountInfo(market, this.commitment);
    if (!info) throw marketUnresolved(asset);
    return market;
  }
}

import type { PublicKey } from '@solana/web3.js';
import { PDA } from '../accounts/PDA.js';
import type { Market } from '../market/Market.js';
import { MarketVault, type MarketVaultConfig } from '../vaults/MarketVault.js';
import type { MarketRegistry } from './MarketRegistry.js';

export type CreateVaultParams = Omit<MarketVaultConfig, 'address' | 'market'>;

export type VaultFactoryConfig = {
  programId: PublicKey;
  registry: MarketRegistry;

  /** Builds the market capability for an address the registry resolved. */
  openMarket: (marketId: PublicKey) => Market | Promise<Market>;
};

export class VaultFactory {
  constructor(readonly config: VaultFactoryConfig) {}

  /** Deterministic: the same asset always maps to the same vault address. */
  computeVaultAddress(asset: PublicKey): PublicKey {
    return PDA.vault(this.config.programId, asset).publicKey;
  }

  async createVault(params: CreateVaultParams): Promise<MarketVault> {
    const marketId = await this.config.registry.resolveMarket(params.asset.mint);
    const market = await this.config.openMarket(marketId);

    return new MarketVault({
      ...params,
      address: this.computeVaultAddress(params.asset.mint),
      market
    });
  }
}

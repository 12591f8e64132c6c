export * from './src/client/AccrueClient.js';
export * from './src/client/AccrueReadonlyClient.js';

export * from './src/market/Market.js';
export * from './src/market/ExchangeRateEngine.js';
export * from './src/market/AnchorMarket.js';

export * from './src/vaults/MarketVault.js';
export * from './src/vaults/VaultMath.js';
export * from './src/vaults/ShareLedger.js';
export * from './src/vaults/AtomicOperation.js';
export * from './src/vaults/AssetToken.js';

export * from './src/registry/MarketRegistry.js';
export * from './src/registry/PdaMarketRegistry.js';
export * from './src/registry/VaultFactory.js';

export * from './src/rewards/RewardsController.js';

export * from './src/accounts/PDA.js';
export * from './src/accounts/Seeds.js';

export * from './src/types/MarketSnapshot.js';
export * from './src/types/VaultState.js';

export * from './src/errors/AccrueError.js';

export * from './src/utils/math.js';
export * from './src/utils/invariant.js';
export * from './src/utils/encoding.js';
export * from './src/utils/clock.js';

import type { Commitment, Connection, PublicKey } from '@solana/web3.js';
import { Keypair } from '@solana/web3.js';
import * as anchor from '@coral-xyz/anchor';
import type { Idl, Program } from '@coral-xyz/anchor';

import { AccrueError } from '../errors/AccrueError.js';
import { AnchorMarket, type MarketAccountDecoder, type MarketInstructionNames } from '../market/AnchorMarket.js';
import { ExchangeRateEngine, type ExchangeRateView } from '../market/ExchangeRateEngine.js';
import type { InterestRateModel } from '../market/Market.js';
import { PdaMarketRegistry } from '../registry/PdaMarketRegistry.js';
import { VaultFactory } from '../registry/VaultFactory.js';
import { clusterClock, type Clock } from '../utils/clock.js';

export type AccrueAccountNames = {
  market: string;
};

export type AccrueReadonlyClientConfig = {
  connection: Connection;
  programId: PublicKey;

  /**
   * Provide either an initialized Anchor `program`, or `idl` to construct it.
   * The SDK does not ship an IDL.
   */
  program?: Program<Idl>;
  idl?: Idl;

  /** Rate model of each market; its internals are outside the SDK. */
  rateModel: (marketId: PublicKey) => InterestRateModel;

  decodeMarket?: MarketAccountDecoder;
  instructionNames?: Partial<MarketInstructionNames>;
  accountNames?: Partial<AccrueAccountNames>;
  commitment?: Commitment;

  /** Defaults to the cluster's block time. */
  clock?: Clock;
};

export class AccrueReadonlyClient {
  readonly connection: Connection;
  readonly programId: PublicKey;
  readonly program: Program<Idl>;

  readonly instructionNames: MarketInstructionNames;
  readonly accountNames: AccrueAccountNames;

  readonly clock: Clock;
  readonly registry: PdaMarketRegistry;
  readonly vaults: VaultFactory;

  constructor(readonly config: AccrueReadonlyClientConfig) {
    this.connection = config.connection;
    this.programId = config.programId;

    this.instructionNames = {
      mint: config.instructionNames?.mint ?? 'mint',
      redeemUnderlying: config.instructionNames?.redeemUnderlying ?? 'redeemUnderlying'
    };

    this.accountNames = {
      market: config.accountNames?.market ?? 'market'
    };

    this.program = config.program ?? this.buildReadonlyProgram(config);
    this.clock = config.clock ?? clusterClock(this.connection);
    this.registry = new PdaMarketRegistry(this.connection, this.programId, config.commitment);
    this.vaults = new VaultFactory({
      programId: this.programId,
      registry: this.registry,
      openMarket: (marketId) => this.marketAt(marketId)
    });
  }

  marketAt(marketId: PublicKey): AnchorMarket {
    return new AnchorMarket({
      program: this.program,
      marketId,
      rateModel: this.config.rateModel(marketId),
      accountName: this.accountNames.market,
      instructionNames: this.instructionNames,
      ...(this.config.decodeMarket ? { decodeMarket: this.config.decodeMarket } : {}),
      ...(this.config.commitment ? { commitment: this.config.commitment } : {})
    });
  }

  async market(asset: PublicKey): Promise<AnchorMarket> {
    return this.marketAt(await this.registry.resolveMarket(asset));
  }

  /** Exchange rate the asset's market would store if it accrued now. */
  async exchangeRate(asset: PublicKey): Promise<ExchangeRateView> {
    return ExchangeRateEngine.viewExchangeRate(await this.market(asset), this.clock);
  }

  private buildReadonlyProgram(cfg: AccrueReadonlyClientConfig): Program<Idl> {
    if (!cfg.idl) {
      throw new AccrueError('ProgramNotConfigured', 'Provide either `program` or `idl` to AccrueReadonlyClient');
    }

    // Anchor requires a wallet in the provider; we supply a non-signing wallet.
    const provider = new anchor.AnchorProvider(
      cfg.connection,
      new anchor.Wallet(Keypair.generate()),
      anchor.AnchorProvider.defaultOptions()
    );

    return new anchor.Program(cfg.idl, provider);
  }
}

import type { Commitment } from '@solana/web3.js';
import { PublicKey, SystemProgram } from '@solana/web3.js';
import {
  ASSOCIATED_TOKEN_PROGRAM_ID,
  TOKEN_PROGRAM_ID,
  TokenAccountNotFoundError,
  getAccount,
  getAssociatedTokenAddressSync
} from '@solana/spl-token';
import { AnchorError, ProgramError } from '@coral-xyz/anchor';
import type { Idl, Program } from '@coral-xyz/anchor';
import BN from 'bn.js';

import { AccrueError } from '../errors/AccrueError.js';
import { toBigIntField } from '../utils/encoding.js';
import type { MarketSnapshot } from '../types/MarketSnapshot.js';
import { MARKET_OK, type InterestRateModel, type Market, type MarketPosition, type MarketStatus } from './Market.js';

export type DecodedMarket = MarketSnapshot & {
  underlyingMint: PublicKey;
  principalMint: PublicKey;
};

export type MarketAccountDecoder = (raw: unknown, marketId: PublicKey) => DecodedMarket;

export type MarketInstructionNames = {
  mint: string;
  redeemUnderlying: string;
};

export type AnchorMarketConfig = {
  program: Program<Idl>;
  marketId: PublicKey;

  /** The SDK does not model rate curves; supply the market's model. */
  rateModel: InterestRateModel;

  accountName?: string;
  instructionNames?: Partial<MarketInstructionNames>;
  decodeMarket?: MarketAccountDecoder;
  commitment?: Commitment;
};

function toBN(value: bigint): BN {
  if (value < 0n) throw new AccrueError('InvalidArgument', 'amount must be non-negative');
  return new BN(value.toString(10));
}

/**
 * Numeric status carried by a failed program call: the Anchor error number, or the raw
 * custom program error code. Undefined for failures that never reached the program.
 */
export function marketStatusFromError(err: unknown): MarketStatus | undefined {
  if (err instanceof AnchorError) return err.error.errorCode.number;
  if (err instanceof ProgramError) return err.code;
  return undefined;
}

export class AnchorMarket implements Market {
  readonly id: PublicKey;
  readonly program: Program<Idl>;
  readonly accountName: string;
  readonly instructionNames: MarketInstructionNames;

  private readonly rateModel: InterestRateModel;
  private readonly decode: MarketAccountDecoder;
  private readonly commitment: Commitment | undefined;

  constructor(cfg: AnchorMarketConfig) {
    this.id = cfg.marketId;
    this.program = cfg.program;
    this.rateModel = cfg.rateModel;
    this.accountName = cfg.accountName ?? 'market';
    this.instructionNames = {
      mint: cfg.instructionNames?.mint ?? 'mint',
      redeemUnderlying: cfg.instructionNames?.redeemUnderlying ?? 'redeemUnderlying'
    };
    this.decode = cfg.decodeMarket ?? AnchorMarket.defaultMarketDecoder;
    this.commitment = cfg.commitment;
  }

  async fetchMarket(): Promise<DecodedMarket> {
    const accountsNs = this.program.account as unknown as Record<
      string,
      { fetch: (pk: PublicKey, commitment?: Commitment) => Promise<unknown> }
    >;
    const marketAccount = accountsNs[this.accountName];
    if (!marketAccount) {
      throw new AccrueError('ProgramNotConfigured', 'Market account type not found on program', {
        details: { accountType: this.accountName }
      });
    }
    const raw = await marketAccount.fetch(this.id, this.commitment);
    return this.decode(raw, this.id);
  }

  async getSnapshot(): Promise<MarketSnapshot> {
    return AnchorMarket.snapshotOf(await this.fetchMarket());
  }

  async getBorrowRate(cash: bigint, borrows: bigint, reserves: bigint): Promise<bigint> {
    return this.rateModel.getBorrowRate(cash, borrows, reserves);
  }

  async principalBalanceOf(owner: PublicKey): Promise<bigint> {
    const { principalMint } = await this.fetchMarket();
    return this.principalBalanceIn(principalMint, owner);
  }

  async getPosition(holder: PublicKey): Promise<MarketPosition> {
    const m = await this.fetchMarket();
    return {
      snapshot: AnchorMarket.snapshotOf(m),
      principalBalance: await this.principalBalanceIn(m.principalMint, holder)
    };
  }

  private async principalBalanceIn(principalMint: PublicKey, owner: PublicKey): Promise<bigint> {
    const ata = getAssociatedTokenAddressSync(principalMint, owner, true);
    try {
      const account = await getAccount(this.program.provider.connection, ata, this.commitment);
      return account.amount;
    } catch (err) {
      if (err instanceof TokenAccountNotFoundError) return 0n;
      throw err;
    }
  }

  async mint(minter: PublicKey, assets: bigint): Promise<MarketStatus> {
    return this.send(this.instructionNames.mint, minter, assets);
  }

  async redeemUnderlying(redeemer: PublicKey, assets: bigint): Promise<MarketStatus> {
    return this.send(this.instructionNames.redeemUnderlying, redeemer, assets);
  }

  private async send(ixName: string, user: PublicKey, assets: bigint): Promise<MarketStatus> {
    const signer = this.program.provider.publicKey;
    if (!signer || !signer.equals(user)) {
      throw new AccrueError('UnauthorizedAuthority', 'Provider wallet must sign for the market user', {
        details: { user: user.toBase58(), signer: signer?.toBase58() ?? null }
      });
    }

    const m = await this.fetchMarket();

    const methods = this.program.methods as unknown as Record<string, unknown>;
    const method = methods[ixName];
    if (!method || typeof method !== 'function') {
      throw new AccrueError('TransactionBuildError', 'Market method not found on program', {
        details: { ixName }
      });
    }

    const builder = (method as (amount: BN) => unknown)(toBN(assets));

    const accounts = {
      market: this.id,
      user,
      underlyingMint: m.underlyingMint,
      principalMint: m.principalMint,
      userAssetAta: getAssociatedTokenAddressSync(m.underlyingMint, user, true),
      userPrincipalAta: getAssociatedTokenAddressSync(m.principalMint, user, true),
      marketAssetAta: getAssociatedTokenAddressSync(m.underlyingMint, this.id, true),
      tokenProgram: TOKEN_PROGRAM_ID,
      associatedTokenProgram: ASSOCIATED_TOKEN_PROGRAM_ID,
      systemProgram: SystemProgram.programId
    } satisfies Record<string, PublicKey>;

    const withAccounts = (builder as { accountsStrict: (a: Record<string, PublicKey>) => unknown }).accountsStrict(
      accounts
    );

    try {
      await (withAccounts as { rpc: () => Promise<string> }).rpc();
      return MARKET_OK;
    } catch (err) {
      const status = marketStatusFromError(err);
      if (status === undefined) throw err;
      return status;
    }
  }

  private static snapshotOf(m: DecodedMarket): MarketSnapshot {
    return {
      accrualTimestamp: m.accrualTimestamp,
      storedExchangeRate: m.storedExchangeRate,
      cash: m.cash,
      borrowsPrior: m.borrowsPrior,
      reservesPrior: m.reservesPrior,
      totalPrincipalSupply: m.totalPrincipalSupply,
      reserveFactor: m.reserveFactor,
      initialExchangeRate: m.initialExchangeRate,
      mintPaused: m.mintPaused
    };
  }

  static defaultMarketDecoder(raw: unknown, marketId: PublicKey): DecodedMarket {
    // Field names follow common Anchor conventions; supply `decodeMarket` for other layouts.
    if (!raw || typeof raw !== 'object') {
      throw new AccrueError('AccountParseError', 'market account missing', {
        details: { market: marketId.toBase58() }
      });
    }
    const obj = raw as Record<string, unknown>;

    const key = (field: string): PublicKey => {
      const v = obj[field];
      if (!(v instanceof PublicKey)) {
        throw new AccrueError('AccountParseError', `market.${field} missing or invalid`);
      }
      return v;
    };
    const num = (field: string): bigint => toBigIntField(obj[field], `market.${field}`);

    const mintPaused = obj['mintPaused'] ?? false;
    if (typeof mintPaused !== 'boolean') {
      throw new AccrueError('AccountParseError', 'market.mintPaused invalid');
    }

    return {
      underlyingMint: key('underlyingMint'),
      principalMint: key('principalMint'),
      accrualTimestamp: num('accrualTimestamp'),
      storedExchangeRate: num('exchangeRateStored'),
      cash: num('totalCash'),
      borrowsPrior: num('totalBorrows'),
      reservesPrior: num('totalReserves'),
      totalPrincipalSupply: num('totalSupply'),
      reserveFactor: num('reserveFactor'),
      initialExchangeRate: num('initialExchangeRate'),
      mintPaused
    };
  }
}

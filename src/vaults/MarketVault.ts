import type { PublicKey } from '@solana/web3.js';

import { AccrueError } from '../errors/AccrueError.js';
import { ExchangeRateEngine } from '../market/ExchangeRateEngine.js';
import { MARKET_OK, type Market } from '../market/Market.js';
import type { RewardsController } from '../rewards/RewardsController.js';
import type { VaultReceipt, VaultState } from '../types/VaultState.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { invariant } from '../utils/invariant.js';
import { toBigIntAmount } from '../utils/math.js';
import type { AssetToken } from './AssetToken.js';
import { AtomicOperation } from './AtomicOperation.js';
import { ShareLedger } from './ShareLedger.js';
import { VaultMath, type VaultValuation } from './VaultMath.js';

export type VaultLogger = Pick<Console, 'debug' | 'warn'>;

export const silentLogger: VaultLogger = {
  debug: () => undefined,
  warn: () => undefined
};

export type MarketVaultConfig = {
  /** Address the vault holds tokens under. */
  address: PublicKey;
  asset: AssetToken;
  market: Market;
  rewardRecipient: PublicKey;

  rewards?: RewardsController;
  ledger?: ShareLedger;
  clock?: Clock;
  logger?: VaultLogger;
};

type Amount = bigint | number | string;

export type DepositParams = { caller: PublicKey; assets: Amount; receiver?: PublicKey };
export type MintParams = { caller: PublicKey; shares: Amount; receiver?: PublicKey };
export type WithdrawParams = { caller: PublicKey; assets: Amount; receiver?: PublicKey; owner?: PublicKey };
export type RedeemParams = { caller: PublicKey; shares: Amount; receiver?: PublicKey; owner?: PublicKey };

/** Shares booked in the ledger for a market call that has not returned yet. */
type UnsettledShares = { holder: PublicKey; shares: bigint };

type MarketRead = {
  valuation: VaultValuation;
  exchangeRate: bigint;
  cash: bigint;
  depositsPaused: boolean;
};

/**
 * Share-based vault over a single money-market position. Every valuation is read fresh from
 * the market; the only local state is the share ledger.
 */
export class MarketVault {
  readonly address: PublicKey;
  readonly asset: AssetToken;
  readonly market: Market;
  readonly rewardRecipient: PublicKey;
  readonly shares: ShareLedger;

  private readonly rewards: RewardsController | undefined;
  private readonly clock: Clock;
  private readonly logger: VaultLogger;
  private entered = false;
  private unsettled: UnsettledShares | undefined;

  constructor(cfg: MarketVaultConfig) {
    if (cfg.rewards) {
      invariant(!cfg.rewards.rewardToken.mint.equals(cfg.asset.mint), 'reward token must differ from the vault asset');
    }
    this.address = cfg.address;
    this.asset = cfg.asset;
    this.market = cfg.market;
    this.rewardRecipient = cfg.rewardRecipient;
    this.shares = cfg.ledger ?? new ShareLedger();
    this.rewards = cfg.rewards;
    this.clock = cfg.clock ?? systemClock;
    this.logger = cfg.logger ?? silentLogger;
  }

  async exchangeRate(): Promise<bigint> {
    const view = await ExchangeRateEngine.viewExchangeRate(this.market, this.clock);
    return view.exchangeRate;
  }

  async totalAssets(): Promise<bigint> {
    return (await this.read()).valuation.totalAssets;
  }

  // Views leave out shares whose market call is still in flight, so a nested reader
  // sees supply and balances that match the assets the market holds.

  totalSupply(): bigint {
    return this.shares.totalSupply - (this.unsettled?.shares ?? 0n);
  }

  balanceOf(owner: PublicKey): bigint {
    const balance = this.shares.balanceOf(owner);
    const pending = this.unsettled;
    return pending && pending.holder.equals(owner) ? balance - pending.shares : balance;
  }

  async getState(): Promise<VaultState> {
    const r = await this.read();
    return {
      vault: this.address,
      asset: this.asset.mint,
      market: this.market.id,
      rewardRecipient: this.rewardRecipient,
      totalAssets: r.valuation.totalAssets,
      totalShares: r.valuation.totalShares,
      exchangeRate: r.exchangeRate,
      liquidity: r.cash,
      depositsPaused: r.depositsPaused
    };
  }

  async convertToShares(assets: Amount): Promise<bigint> {
    return VaultMath.convertToShares((await this.read()).valuation, toBigIntAmount(assets));
  }

  async convertToAssets(shares: Amount): Promise<bigint> {
    return VaultMath.convertToAssets((await this.read()).valuation, toBigIntAmount(shares));
  }

  async previewDeposit(assets: Amount): Promise<bigint> {
    return VaultMath.previewDeposit((await this.read()).valuation, toBigIntAmount(assets));
  }

  async previewMint(shares: Amount): Promise<bigint> {
    return VaultMath.previewMint((await this.read()).valuation, toBigIntAmount(shares));
  }

  async previewWithdraw(assets: Amount): Promise<bigint> {
    return VaultMath.previewWithdraw((await this.read()).valuation, toBigIntAmount(assets));
  }

  async previewRedeem(shares: Amount): Promise<bigint> {
    return VaultMath.previewRedeem((await this.read()).valuation, toBigIntAmount(shares));
  }

  // Deposit capacity is the same for every receiver; only the market's pause flag matters.

  async maxDeposit(_receiver?: PublicKey): Promise<bigint> {
    return VaultMath.maxDeposit((await this.read()).depositsPaused);
  }

  async maxMint(_receiver?: PublicKey): Promise<bigint> {
    return VaultMath.maxMint((await this.read()).depositsPaused);
  }

  async maxWithdraw(owner: PublicKey): Promise<bigint> {
    const r = await this.read();
    return VaultMath.maxWithdraw(r.valuation, r.cash, this.balanceOf(owner));
  }

  async maxRedeem(owner: PublicKey): Promise<bigint> {
    const r = await this.read();
    return VaultMath.maxRedeem(r.valuation, r.cash, this.balanceOf(owner));
  }

  async deposit(params: DepositParams): Promise<VaultReceipt> {
    const assets = toBigIntAmount(params.assets);
    const receiver = params.receiver ?? params.caller;

    return this.nonReentrant('deposit', async () => {
      const r = await this.read();
      const max = VaultMath.maxDeposit(r.depositsPaused);
      if (assets > max) {
        throw new AccrueError('ExceedsMaxDeposit', 'deposit exceeds maximum', {
          details: { assets: assets.toString(), max: max.toString() }
        });
      }

      const shares = VaultMath.previewDeposit(r.valuation, assets);
      if (shares === 0n) {
        throw new AccrueError('ZeroShares', 'deposit results in zero shares', { details: { assets: assets.toString() } });
      }

      return this.supply('deposit', params.caller, receiver, assets, shares, r.exchangeRate);
    });
  }

  async mint(params: MintParams): Promise<VaultReceipt> {
    const shares = toBigIntAmount(params.shares);
    const receiver = params.receiver ?? params.caller;

    return this.nonReentrant('mint', async () => {
      const r = await this.read();
      const max = VaultMath.maxMint(r.depositsPaused);
      if (shares > max) {
        throw new AccrueError('ExceedsMaxMint', 'mint exceeds maximum', {
          details: { shares: shares.toString(), max: max.toString() }
        });
      }

      const assets = VaultMath.previewMint(r.valuation, shares);
      return this.supply('mint', params.caller, receiver, assets, shares, r.exchangeRate);
    });
  }

  async withdraw(params: WithdrawParams): Promise<VaultReceipt> {
    const assets = toBigIntAmount(params.assets);
    const receiver = params.receiver ?? params.caller;
    const owner = params.owner ?? params.caller;

    return this.nonReentrant('withdraw', async () => {
      const r = await this.read();
      const max = VaultMath.maxWithdraw(r.valuation, r.cash, this.balanceOf(owner));
      if (assets > max) {
        throw new AccrueError('ExceedsMaxWithdraw', 'withdraw exceeds maximum', {
          details: { assets: assets.toString(), max: max.toString() }
        });
      }

      const shares = VaultMath.previewWithdraw(r.valuation, assets);
      return this.exit('withdraw', params.caller, receiver, owner, assets, shares);
    });
  }

  async redeem(params: RedeemParams): Promise<VaultReceipt> {
    const shares = toBigIntAmount(params.shares);
    const receiver = params.receiver ?? params.caller;
    const owner = params.owner ?? params.caller;

    return this.nonReentrant('redeem', async () => {
      const r = await this.read();
      const max = VaultMath.maxRedeem(r.valuation, r.cash, this.balanceOf(owner));
      if (shares > max) {
        throw new AccrueError('ExceedsMaxRedeem', 'redeem exceeds maximum', {
          details: { shares: shares.toString(), max: max.toString() }
        });
      }

      const assets = VaultMath.previewRedeem(r.valuation, shares);
      if (assets === 0n) {
        throw new AccrueError('ZeroAssets', 'redeem results in zero assets', { details: { shares: shares.toString() } });
      }

      return this.exit('redeem', params.caller, receiver, owner, assets, shares);
    });
  }

  approve(owner: PublicKey, spender: PublicKey, shares: Amount): void {
    this.assertNotEntered('approve');
    this.shares.approve(owner, spender, toBigIntAmount(shares));
  }

  transfer(from: PublicKey, to: PublicKey, shares: Amount): void {
    this.assertNotEntered('transfer');
    this.shares.transfer(from, to, toBigIntAmount(shares));
  }

  /**
   * Claims market incentives for the vault and forwards the whole reward balance to
   * `rewardRecipient`. Returns the amount forwarded.
   */
  async claimRewards(): Promise<bigint> {
    const rewards = this.rewards;
    if (!rewards) {
      throw new AccrueError('ProgramNotConfigured', 'Vault has no rewards controller');
    }

    return this.nonReentrant('claimRewards', async () => {
      await rewards.claim(this.address);
      const amount = await rewards.rewardToken.balanceOf(this.address);
      if (amount > 0n) {
        await rewards.rewardToken.transfer(this.address, this.rewardRecipient, amount);
      }
      this.logger.debug(`claimRewards: forwarded ${amount} to ${this.rewardRecipient.toBase58()}`);
      return amount;
    });
  }

  private async read(): Promise<MarketRead> {
    const [position, now] = await Promise.all([this.market.getPosition(this.address), this.clock()]);
    const view = await ExchangeRateEngine.viewSnapshot(position.snapshot, now, this.market);
    return {
      valuation: {
        totalAssets: VaultMath.totalAssets(position.principalBalance, view.exchangeRate),
        totalShares: this.totalSupply()
      },
      exchangeRate: view.exchangeRate,
      cash: view.snapshot.cash,
      depositsPaused: view.snapshot.mintPaused
    };
  }

  /** Pulls `assets` from `caller`, issues `shares` to `receiver`, then supplies the assets to the market. */
  private async supply(
    name: string,
    caller: PublicKey,
    receiver: PublicKey,
    assets: bigint,
    shares: bigint,
    exchangeRate: bigint
  ): Promise<VaultReceipt> {
    // Assets worth less than one principal token would back the new shares with nothing.
    if (VaultMath.principalFor(assets, exchangeRate) === 0n) {
      throw new AccrueError('ZeroShares', 'deposit is below one principal token', {
        details: { assets: assets.toString(), exchangeRate: exchangeRate.toString() }
      });
    }

    await this.atomically(name, async (op) => {
      await op.step(
        'transfer assets in',
        () => this.asset.transfer(caller, this.address, assets),
        () => this.asset.transfer(this.address, caller, assets)
      );

      // Shares are booked before control passes to the market.
      await op.step(
        'mint shares',
        () => this.shares.mint(receiver, shares),
        () => this.shares.burn(receiver, shares)
      );

      const prior = await this.asset.allowance(this.address, this.market.id);
      await op.step(
        'approve market',
        () => this.asset.approve(this.address, this.market.id, assets),
        () => this.asset.approve(this.address, this.market.id, prior)
      );

      const code = await this.settling(receiver, shares, () => this.market.mint(this.address, assets));
      if (code !== MARKET_OK) throw AccrueError.marketOperationFailed('mint', code);
    });

    const totalAssets = await this.totalAssets();
    this.logger.debug(`${name}: ${assets} assets for ${shares} shares, totalAssets=${totalAssets}`);
    return { assets, shares, totalAssets };
  }

  /** Burns `shares` of `owner`, redeems `assets` from the market and sends them to `receiver`. */
  private async exit(
    name: string,
    caller: PublicKey,
    receiver: PublicKey,
    owner: PublicKey,
    assets: bigint,
    shares: bigint
  ): Promise<VaultReceipt> {
    await this.atomically(name, async (op) => {
      if (!caller.equals(owner)) {
        const prior = this.shares.allowance(owner, caller);
        await op.step(
          'spend allowance',
          () => this.shares.spendAllowance(owner, caller, shares),
          () => this.shares.approve(owner, caller, prior)
        );
      }

      await op.step(
        'burn shares',
        () => this.shares.burn(owner, shares),
        () => this.shares.mint(owner, shares)
      );

      await op.step(
        'redeem underlying',
        async () => {
          const code = await this.settling(owner, -shares, () =>
            this.market.redeemUnderlying(this.address, assets)
          );
          if (code !== MARKET_OK) throw AccrueError.marketOperationFailed('redeemUnderlying', code);
        },
        async () => {
          await this.asset.approve(this.address, this.market.id, assets);
          const code = await this.market.mint(this.address, assets);
          if (code !== MARKET_OK) throw AccrueError.marketOperationFailed('mint', code);
        }
      );

      await this.asset.transfer(this.address, receiver, assets);
    });

    const totalAssets = await this.totalAssets();
    this.logger.debug(`${name}: ${shares} shares for ${assets} assets, totalAssets=${totalAssets}`);
    return { assets, shares, totalAssets };
  }

  private async atomically(name: string, body: (op: AtomicOperation) => Promise<void>): Promise<void> {
    try {
      await AtomicOperation.run(name, body);
    } catch (err) {
      this.logger.warn(`${name}: rolled back`, err);
      throw err;
    }
  }

  private async settling<T>(holder: PublicKey, shares: bigint, call: () => Promise<T>): Promise<T> {
    this.unsettled = { holder, shares };
    try {
      return await call();
    } finally {
      this.unsettled = undefined;
    }
  }

  private assertNotEntered(name: string): void {
    if (this.entered) {
      throw new AccrueError('ReentrantCall', `${name} called while another vault operation is in flight`);
    }
  }

  private async nonReentrant<T>(name: string, body: () => Promise<T>): Promise<T> {
    this.assertNotEntered(name);
    this.entered = true;
    try {
      return await body();
    } finally {
      this.entered = false;
    }
  }
}

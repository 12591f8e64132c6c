import { AccrueError } from '../errors/AccrueError.js';
import type { Clock } from '../utils/clock.js';
import { invariant } from '../utils/invariant.js';
import { checkedAdd, checkedMul, checkedSub, divWadDown, mulWadDown } from '../utils/math.js';
import type { AccrualResult, BorrowRateFn, MarketSnapshot } from '../types/MarketSnapshot.js';
import type { InterestRateModel, Market } from './Market.js';

/** 0.0005e16: the market's own ceiling on the per-second borrow rate. */
export const MAX_BORROW_RATE = 5_000_000_000_000n;

export type ExchangeRateView = {
  exchangeRate: bigint;
  snapshot: MarketSnapshot;
  currentTimestamp: bigint;

  /** Absent when the snapshot was already current and no accrual was simulated. */
  accrual?: AccrualResult;
};

function elapsedSince(snapshot: MarketSnapshot, currentTimestamp: bigint): bigint {
  invariant(currentTimestamp >= snapshot.accrualTimestamp, 'current timestamp precedes last accrual', {
    currentTimestamp: currentTimestamp.toString(),
    accrualTimestamp: snapshot.accrualTimestamp.toString()
  });
  return currentTimestamp - snapshot.accrualTimestamp;
}

export class ExchangeRateEngine {
  static assertBorrowRate(borrowRate: bigint): void {
    if (borrowRate > MAX_BORROW_RATE) {
      throw new AccrueError('RateTooHigh', 'borrow rate exceeds market maximum', {
        details: { borrowRate: borrowRate.toString(), max: MAX_BORROW_RATE.toString() }
      });
    }
    if (borrowRate < 0n) {
      throw new AccrueError('InvalidArgument', 'borrow rate must be non-negative');
    }
  }

  /**
   * Replays one accrual step of the market against `snapshot` without touching it.
   */
  static simulateAccrual(snapshot: MarketSnapshot, borrowRate: bigint, currentTimestamp: bigint): AccrualResult {
    const elapsed = elapsedSince(snapshot, currentTimestamp);
    this.assertBorrowRate(borrowRate);

    const interestAccrued = mulWadDown(checkedMul(borrowRate, elapsed), snapshot.borrowsPrior);
    const totalReserves = checkedAdd(mulWadDown(snapshot.reserveFactor, interestAccrued), snapshot.reservesPrior);
    const totalBorrows = checkedAdd(interestAccrued, snapshot.borrowsPrior);

    let exchangeRate: bigint;
    if (snapshot.totalPrincipalSupply === 0n) {
      exchangeRate = snapshot.initialExchangeRate;
    } else {
      // Underflow here means the market's own books are inconsistent.
      const underlying = checkedSub(checkedAdd(snapshot.cash, totalBorrows), totalReserves);
      exchangeRate = divWadDown(underlying, snapshot.totalPrincipalSupply);
    }

    return { elapsed, borrowRate, interestAccrued, totalBorrows, totalReserves, exchangeRate };
  }

  /** Whether the market already accrued at `currentTimestamp`; its stored rate is then exact. */
  static isCurrent(snapshot: MarketSnapshot, currentTimestamp: bigint): boolean {
    return currentTimestamp === snapshot.accrualTimestamp;
  }

  /** `borrowRate` is only consulted when the snapshot is stale. */
  static viewAt(snapshot: MarketSnapshot, currentTimestamp: bigint, borrowRate: () => bigint): ExchangeRateView {
    if (this.isCurrent(snapshot, currentTimestamp)) {
      return { exchangeRate: snapshot.storedExchangeRate, snapshot, currentTimestamp };
    }
    const accrual = this.simulateAccrual(snapshot, borrowRate(), currentTimestamp);
    return { exchangeRate: accrual.exchangeRate, snapshot, currentTimestamp, accrual };
  }

  static computeExchangeRate(snapshot: MarketSnapshot, currentTimestamp: bigint, rateModel: BorrowRateFn): bigint {
    return this.viewAt(snapshot, currentTimestamp, () =>
      rateModel(snapshot.cash, snapshot.borrowsPrior, snapshot.reservesPrior)
    ).exchangeRate;
  }

  /** Like `viewAt`, asking an async rate model only when an accrual must be simulated. */
  static async viewSnapshot(
    snapshot: MarketSnapshot,
    currentTimestamp: bigint,
    rateModel: InterestRateModel
  ): Promise<ExchangeRateView> {
    const borrowRate = this.isCurrent(snapshot, currentTimestamp)
      ? 0n
      : await rateModel.getBorrowRate(snapshot.cash, snapshot.borrowsPrior, snapshot.reservesPrior);
    return this.viewAt(snapshot, currentTimestamp, () => borrowRate);
  }

  /** Reads the market and returns the rate it would store if it accrued at `clock()`. */
  static async viewExchangeRate(market: Market, clock: Clock): Promise<ExchangeRateView> {
    const [snapshot, currentTimestamp] = await Promise.all([market.getSnapshot(), clock()]);
    return this.viewSnapshot(snapshot, currentTimestamp, market);
  }
}

/**
 * Accrual state of a money market as last written by the market itself.
 * Observed by the SDK, never mutated by it.
 */
export type MarketSnapshot = {
  /** Unix seconds of the market's last accrual. */
  accrualTimestamp: bigint;
  storedExchangeRate: bigint;

  /** Underlying held liquid by the market. */
  cash: bigint;
  borrowsPrior: bigint;
  reservesPrior: bigint;
  totalPrincipalSupply: bigint;

  /** WAD fraction of accrued interest routed to reserves. */
  reserveFactor: bigint;
  /** Rate used while no principal tokens exist. */
  initialExchangeRate: bigint;

  mintPaused: boolean;
};

/** Borrow rate per second (WAD) as a function of `(cash, borrows, reserves)`. */
export type BorrowRateFn = (cash: bigint, borrows: bigint, reserves: bigint) => bigint;

export type AccrualResult = {
  elapsed: bigint;
  borrowRate: bigint;
  interestAccrued: bigint;
  totalBorrows: bigint;
  totalReserves: bigint;
  exchangeRate: bigint;
};

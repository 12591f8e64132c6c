export type AccrueErrorCode =
  | 'RateTooHigh'
  | 'ArithmeticOverflow'
  | 'ArithmeticUnderflow'
  | 'DivisionByZero'
  | 'MarketOperationFailed'
  | 'MarketUnresolved'
  | 'InvariantViolation'
  | 'InvalidArgument'
  | 'AccountParseError'
  | 'ProgramNotConfigured'
  | 'UnauthorizedAuthority'
  | 'TransactionBuildError'
  | 'ExceedsMaxDeposit'
  | 'ExceedsMaxMint'
  | 'ExceedsMaxWithdraw'
  | 'ExceedsMaxRedeem'
  | 'ZeroShares'
  | 'ZeroAssets'
  | 'InsufficientShares'
  | 'InsufficientAllowance'
  | 'ReentrantCall'
  | 'RollbackFailed';

export class AccrueError extends Error {
  readonly code: AccrueErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: AccrueErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AccrueError';
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }

  /**
   * Status code reported by the market for a rejected mint/redeem, surfaced unchanged.
   * Undefined for every other error code.
   */
  get marketCode(): number | undefined {
    if (this.code !== 'MarketOperationFailed') return undefined;
    const code = this.details?.['code'];
    return typeof code === 'number' ? code : undefined;
  }

  static marketOperationFailed(operation: 'mint' | 'redeemUnderlying', code: number): AccrueError {
    return new AccrueError('MarketOperationFailed', `market ${operation} failed with status ${code}`, {
      details: { operation, code }
    });
  }
}

export function isAccrueError(value: unknown, code?: AccrueErrorCode): value is AccrueError {
  return value instanceof AccrueError && (code === undefined || value.code === code);
}

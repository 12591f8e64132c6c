import { AccrueError } from '../errors/AccrueError.js';

export type RoundingMode = 'down' | 'up';

/** 1.0 in 18-decimal fixed point. */
export const WAD = 10n ** 18n;

/** Largest value representable by the market's unsigned 256-bit words. */
export const UINT256_MAX = (1n << 256n) - 1n;

function requireNonNegative(value: bigint, name: string): void {
  if (value < 0n) {
    throw new AccrueError('InvalidArgument', `${name} must be non-negative`, {
      details: { [name]: value.toString() }
    });
  }
}

function requireInWidth(value: bigint, op: string): bigint {
  if (value > UINT256_MAX) {
    throw new AccrueError('ArithmeticOverflow', `${op} overflows uint256`);
  }
  return value;
}

export function toBigIntAmount(value: bigint | number | string): bigint {
  if (typeof value === 'bigint') {
    requireNonNegative(value, 'amount');
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || !Number.isInteger(value) || value < 0) {
      throw new AccrueError('InvalidArgument', 'Amount must be a non-negative integer');
    }
    return BigInt(value);
  }
  if (!/^[0-9]+$/.test(value)) {
    throw new AccrueError('InvalidArgument', 'Amount string must be base-10 integer');
  }
  return BigInt(value);
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return requireInWidth(a + b, 'addition');
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new AccrueError('ArithmeticUnderflow', 'subtraction underflows zero', {
      details: { a: a.toString(), b: b.toString() }
    });
  }
  return a - b;
}

export function checkedMul(a: bigint, b: bigint): bigint {
  requireNonNegative(a, 'a');
  requireNonNegative(b, 'b');
  return requireInWidth(a * b, 'multiplication');
}

export function mulDiv(a: bigint, b: bigint, denom: bigint, rounding: RoundingMode = 'down'): bigint {
  if (denom === 0n) throw new AccrueError('DivisionByZero', 'Division by zero');
  requireNonNegative(denom, 'denom');
  const product = checkedMul(a, b);
  const q = product / denom;
  if (rounding === 'down') return q;
  return product % denom === 0n ? q : q + 1n;
}

export function mulDivDown(a: bigint, b: bigint, denom: bigint): bigint {
  return mulDiv(a, b, denom, 'down');
}

export function mulDivUp(a: bigint, b: bigint, denom: bigint): bigint {
  return mulDiv(a, b, denom, 'up');
}

/** ⌊a·b / WAD⌋ */
export function mulWadDown(a: bigint, b: bigint): bigint {
  return mulDivDown(a, b, WAD);
}

/** ⌊a·WAD / b⌋ */
export function divWadDown(a: bigint, b: bigint): bigint {
  return mulDivDown(a, WAD, b);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

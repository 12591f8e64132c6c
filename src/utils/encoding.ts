import { AccrueError } from '../errors/AccrueError.js';

export function utf8Bytes(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}

/** Parses an integer-like account field (bigint, safe number, BN or u64 wrapper) into a non-negative bigint. */
export function toBigIntField(value: unknown, field: string): bigint {
  if (typeof value === 'bigint' && value >= 0n) return value;
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  if (value && typeof value === 'object' && 'toString' in value) {
    const s = String((value as { toString: () => string }).toString());
    if (/^[0-9]+$/.test(s)) return BigInt(s);
  }
  throw new AccrueError('AccountParseError', `${field} missing or invalid`);
}

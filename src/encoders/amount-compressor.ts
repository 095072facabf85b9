/**
 * Amount Compression
 *
 * Most ledger amounts are round numbers of base units, so trailing decimal
 * zeros are folded into an exponent and the last non-zero digit (always
 * 1-9) is stored in base 9:
 *
 *     0                     -> 0
 *     e < 9, n = 10*q + d   -> 1 + 10*(9*q + d - 1) + e
 *     e = 9                 -> 10 + 10*(n - 1)
 *
 * where e is the number of stripped zeros (capped at 9) and n the
 * remaining value.
 *
 * The arithmetic is done on bigint so every 64-bit amount round trips,
 * including values whose compressed form does not fit in 64 bits.
 */

import { deserializeError } from '../errors/index.ts';

export const MAX_AMOUNT = (1n << 64n) - 1n;

/** Widest compressed form, reached by amounts close to MAX_AMOUNT */
export const COMPRESSED_AMOUNT_BITS = 68;

export function compressAmount(amount: bigint): bigint {
  if (amount === 0n) return 0n;

  let n = amount;
  let exponent = 0n;
  while (n % 10n === 0n && exponent < 9n) {
    n /= 10n;
    exponent++;
  }

  if (exponent < 9n) {
    const lastDigit = n % 10n;
    n /= 10n;
    return 1n + 10n * (9n * n + lastDigit - 1n) + exponent;
  }

  return 10n + 10n * (n - 1n);
}

/**
 * Inverse of `compressAmount`. Values that expand past MAX_AMOUNT cannot
 * have been produced by the compressor.
 */
export function decompressAmount(compressed: bigint, bytesRead = 0): bigint {
  if (compressed === 0n) return 0n;

  let x = compressed - 1n;
  const exponent = x % 10n;
  x /= 10n;

  let n: bigint;
  if (exponent < 9n) {
    const lastDigit = (x % 9n) + 1n;
    x /= 9n;
    n = x * 10n + lastDigit;
  } else {
    n = x + 1n;
  }

  for (let i = 0n; i < exponent; i++) {
    n *= 10n;
  }

  if (n > MAX_AMOUNT) {
    throw deserializeError(`compressed amount ${compressed} exceeds the 64-bit range`, bytesRead);
  }
  return n;
}

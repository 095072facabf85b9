/**
 * Fixed-width hash helpers
 *
 * Hashes are opaque 32-byte buffers in natural (internal) byte order. The
 * conventional display form is the hex of the reversed bytes.
 */

import { Buffer } from 'node:buffer';

export const HASH_SIZE = 32;

export type Hash = Buffer;

export function isHash(value: unknown): value is Hash {
  return Buffer.isBuffer(value) && value.length === HASH_SIZE;
}

export function hashFromString(display: string): Hash {
  if (display.length !== HASH_SIZE * 2 || !/^[0-9a-fA-F]*$/.test(display)) {
    throw new TypeError(`invalid hash string: ${display}`);
  }
  return Buffer.from(display, 'hex').reverse();
}

export function hashToString(hash: Hash): string {
  return Buffer.from(hash).reverse().toString('hex');
}

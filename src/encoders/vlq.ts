/**
 * Variable-Length Quantity Integer Codec
 *
 * MSB-first base-128 encoding. Every byte but the last has its high bit
 * set, and each continuation adds one before shifting, so the ranges
 * covered by each encoded length never overlap:
 *
 *     0         -> [0x00]
 *     127       -> [0x7f]
 *     128       -> [0x80 0x00]
 *     16511     -> [0xff 0x7f]
 *     16512     -> [0x80 0x80 0x00]
 *     2^64 - 1  -> [0x80 0xfe 0xfe 0xfe 0xfe 0xfe 0xfe 0xfe 0xfe 0x7f]
 */

import { Buffer } from 'node:buffer';

import { assertionError, deserializeError } from '../errors/index.ts';

export const DEFAULT_VLQ_BITS = 64;

export interface VLQDecodeResult {
  value: bigint;
  bytesRead: number;
}

function toUnsigned(n: bigint | number): bigint {
  const value = typeof n === 'bigint' ? n : BigInt(n);
  if (value < 0n) {
    throw assertionError(`cannot encode negative value ${value} as VLQ`);
  }
  return value;
}

export function serializeSizeVLQ(n: bigint | number): number {
  let value = toUnsigned(n);
  let size = 1;
  for (; value > 0x7fn; value = (value >> 7n) - 1n) {
    size++;
  }
  return size;
}

/**
 * Write `n` into `target` at `offset`, returning the number of bytes written.
 * The caller sizes `target` with `serializeSizeVLQ`.
 */
export function putVLQ(target: Buffer, offset: number, n: bigint | number): number {
  let value = toUnsigned(n);
  const size = serializeSizeVLQ(value);
  if (offset + size > target.length) {
    throw assertionError(
      `VLQ needs ${size} bytes at offset ${offset} but target holds ${target.length}`,
    );
  }

  // Fill from the least significant group backwards.
  for (let i = size - 1; i >= 0; i--) {
    const highBit = i === size - 1 ? 0x00 : 0x80;
    target[offset + i] = Number(value & 0x7fn) | highBit;
    value = (value >> 7n) - 1n;
  }
  return size;
}

export function serializeVLQ(n: bigint | number): Buffer {
  const target = Buffer.alloc(serializeSizeVLQ(n));
  putVLQ(target, 0, n);
  return target;
}

export function deserializeVLQ(
  serialized: Buffer,
  offset = 0,
  maxBits: number = DEFAULT_VLQ_BITS,
): VLQDecodeResult {
  const limit = (1n << BigInt(maxBits)) - 1n;
  let value = 0n;
  let bytesRead = 0;

  for (let i = offset; i < serialized.length; i++) {
    const byte = serialized[i];
    bytesRead++;

    value = (value << 7n) | BigInt(byte & 0x7f);
    if (value > limit) {
      throw assertionError(`VLQ value exceeds ${maxBits} bits`, bytesRead);
    }
    if ((byte & 0x80) === 0) {
      return { value, bytesRead };
    }

    value++;
    if (value > limit) {
      throw assertionError(`VLQ value exceeds ${maxBits} bits`, bytesRead);
    }
  }

  throw deserializeError('unexpected end of data within VLQ', bytesRead);
}

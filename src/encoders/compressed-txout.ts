/**
 * Compressed Transaction Output
 *
 * The amount/script pair shared by ledger entries and spend journal
 * records: VLQ(compressAmount(amount)) followed by the compressed script.
 * Also home to the header code that packs a creation height with the
 * coinbase flag.
 */

import { Buffer } from 'node:buffer';

import { assertionError, deserializeError, rethrowNested } from '../errors/index.ts';
import {
  COMPRESSED_AMOUNT_BITS,
  compressAmount,
  decompressAmount,
  MAX_AMOUNT,
} from './amount-compressor.ts';
import {
  compressedScriptSize,
  decodeCompressedScriptSize,
  decompressScript,
  putCompressedScript,
} from './script-compressor.ts';
import { deserializeVLQ, putVLQ, serializeSizeVLQ } from './vlq.ts';

export interface DecodedTxOut {
  amount: bigint;
  script: Buffer;
  bytesRead: number;
}

export interface HeaderCodeFields {
  height: number;
  isCoinbase: boolean;
}

export function encodeHeaderCode(height: number, isCoinbase: boolean): bigint {
  if (!Number.isSafeInteger(height) || height < 0) {
    throw assertionError(`invalid block height ${height}`);
  }
  return (BigInt(height) << 1n) | (isCoinbase ? 1n : 0n);
}

export function decodeHeaderCode(code: bigint, bytesRead: number): HeaderCodeFields {
  const height = code >> 1n;
  if (height > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw deserializeError(`block height ${height} is out of range`, bytesRead);
  }
  return { height: Number(height), isCoinbase: (code & 1n) === 1n };
}

function checkAmount(amount: bigint): bigint {
  if (amount < 0n || amount > MAX_AMOUNT) {
    throw assertionError(`amount ${amount} is outside the unsigned 64-bit range`);
  }
  return compressAmount(amount);
}

export function compressedTxOutSize(amount: bigint, script: Buffer): number {
  return serializeSizeVLQ(checkAmount(amount)) + compressedScriptSize(script);
}

export function putCompressedTxOut(
  target: Buffer,
  offset: number,
  amount: bigint,
  script: Buffer,
): number {
  const amountSize = putVLQ(target, offset, checkAmount(amount));
  return amountSize + putCompressedScript(target, offset + amountSize, script);
}

/**
 * Decode the compressed output starting at `offset`. On failure the
 * reported byte count is relative to `offset`.
 */
export function decodeCompressedTxOut(serialized: Buffer, offset = 0): DecodedTxOut {
  const { value: compressedAmount, bytesRead: amountSize } = deserializeVLQ(
    serialized,
    offset,
    COMPRESSED_AMOUNT_BITS,
  );

  const scriptOffset = offset + amountSize;
  if (scriptOffset >= serialized.length) {
    throw deserializeError('unexpected end of data after compressed amount', amountSize);
  }

  let scriptSize: number;
  try {
    scriptSize = decodeCompressedScriptSize(serialized, scriptOffset);
  } catch (error) {
    rethrowNested(error, 'invalid compressed script header', amountSize);
  }
  if (serialized.length - scriptOffset < scriptSize) {
    throw deserializeError('unexpected end of data after script size', amountSize);
  }

  const amount = decompressAmount(compressedAmount, amountSize);
  let script: Buffer;
  try {
    script = decompressScript(serialized.subarray(scriptOffset, scriptOffset + scriptSize));
  } catch (error) {
    rethrowNested(error, 'invalid compressed script', amountSize);
  }

  return { amount, script, bytesRead: amountSize + scriptSize };
}

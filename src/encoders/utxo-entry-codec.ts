/**
 * Unspent Output Entry Codec
 *
 *   <header code><compressed txout>
 *
 *   header code      VLQ(blockHeight << 1 | coinbase)
 *   compressed txout VLQ(compressed amount) followed by the compressed script
 *
 * Example, a 0.01 unit P2PKH output created at height 100001:
 *
 *   8b9942 07 00 ee8bd501094a7d5ca318da2506de35e1cb025ddc
 *
 *   8b9942  header code, height 100001, not coinbase
 *   07      compressed amount 1000000
 *   00      P2PKH tag, followed by the 20-byte hash160
 */

import { Buffer } from 'node:buffer';

import { UtxoEntry } from '../core/utxo-entry.ts';
import { deserializeError, rethrowNested } from '../errors/index.ts';
import {
  compressedTxOutSize,
  decodeCompressedTxOut,
  decodeHeaderCode,
  encodeHeaderCode,
  putCompressedTxOut,
} from './compressed-txout.ts';
import { deserializeVLQ, putVLQ, serializeSizeVLQ } from './vlq.ts';

export function utxoEntrySerializeSize(entry: UtxoEntry): number {
  const headerCode = encodeHeaderCode(entry.blockHeight, entry.isCoinbase());
  return serializeSizeVLQ(headerCode) + compressedTxOutSize(entry.amount, entry.script);
}

/**
 * Serialize a live entry. Spent entries have no stored form and yield null;
 * the caller removes their key instead.
 */
export function serializeUtxoEntry(entry: UtxoEntry): Buffer | null {
  if (entry.isSpent()) return null;

  const headerCode = encodeHeaderCode(entry.blockHeight, entry.isCoinbase());
  const serialized = Buffer.alloc(utxoEntrySerializeSize(entry));
  const offset = putVLQ(serialized, 0, headerCode);
  putCompressedTxOut(serialized, offset, entry.amount, entry.script);
  return serialized;
}

export function deserializeUtxoEntry(serialized: Buffer): UtxoEntry {
  const { value: headerCode, bytesRead: offset } = deserializeVLQ(serialized);
  if (offset >= serialized.length) {
    throw deserializeError('unexpected end of data after header', offset);
  }

  const { height, isCoinbase } = decodeHeaderCode(headerCode, offset);

  try {
    const { amount, script } = decodeCompressedTxOut(serialized, offset);
    return new UtxoEntry({ amount, script, blockHeight: height, isCoinbase });
  } catch (error) {
    rethrowNested(error, 'unable to decode utxo', offset);
  }
}

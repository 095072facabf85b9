/**
 * Spend Journal Codec
 *
 * A block's spend journal holds one record per input of every
 * non-coinbase transaction in the block, so the outputs those inputs
 * consumed can be put back when the block is disconnected.
 *
 * Records are written last transaction first, last input first: the
 * reverse of the order a disconnect restores them in. Each record is
 *
 *   <header code>[<reserved>]<compressed txout>
 *
 *   header code  VLQ(height << 1 | coinbase), or 0 (see below)
 *   reserved     VLQ(0), present only when the header is non-zero and
 *                height > 0; kept for compatibility and ignored on read
 *
 * Within one transaction, a record whose header code matches the one last
 * written for that transaction is stored with header code 0 and no
 * reserved field. Decoding therefore needs the block's transactions to
 * know where each transaction's run of records starts. A real entry with
 * height 0 that is not a coinbase would also encode to 0; such entries
 * never reach the journal and the encoder refuses them.
 *
 * Example, two single-input transactions at height 100024 (the second
 * transaction's record comes first):
 *
 *   8b9970 00 86c647 00 b2fb57eadf61e106a100a7445a8c3f67898841ec
 *   8b9970 00 91f20f 00 6edbc6c4d31bae9f1ccc38538a114bf42de65e86
 */

import { Buffer } from 'node:buffer';

import { assertionError, deserializeError, rethrowNested } from '../errors/index.ts';
import type { BlockTransaction, SpentOutput } from '../interfaces/index.ts';
import {
  compressedTxOutSize,
  decodeCompressedTxOut,
  decodeHeaderCode,
  encodeHeaderCode,
  putCompressedTxOut,
} from './compressed-txout.ts';
import { deserializeVLQ, putVLQ, serializeSizeVLQ } from './vlq.ts';

export interface DecodedSpentOutput {
  output: SpentOutput;
  /** Header code as found on the wire, 0 when deduplicated */
  headerCode: bigint;
  bytesRead: number;
}

/** Header code that marks a record sharing its transaction's header */
const DEDUPLICATED_HEADER = 0n;

function totalInputs(txns: readonly BlockTransaction[]): number {
  return txns.reduce((sum, tx) => sum + tx.inputs.length, 0);
}

function hasReserved(headerCode: bigint, height: number): boolean {
  return headerCode !== DEDUPLICATED_HEADER && height > 0;
}

function recordSize(stxo: SpentOutput, headerCode: bigint): number {
  let size = serializeSizeVLQ(headerCode);
  if (hasReserved(headerCode, stxo.height)) {
    size += serializeSizeVLQ(0);
  }
  return size + compressedTxOutSize(stxo.amount, stxo.script);
}

function putRecord(target: Buffer, offset: number, stxo: SpentOutput, headerCode: bigint): number {
  let written = putVLQ(target, offset, headerCode);
  if (hasReserved(headerCode, stxo.height)) {
    written += putVLQ(target, offset + written, 0);
  }
  return written + putCompressedTxOut(target, offset + written, stxo.amount, stxo.script);
}

/** Size of a standalone record carrying its true header code */
export function spentOutputSerializeSize(stxo: SpentOutput): number {
  return recordSize(stxo, encodeHeaderCode(stxo.height, stxo.isCoinbase));
}

/** Write a standalone record carrying its true header code */
export function putSpentOutput(target: Buffer, offset: number, stxo: SpentOutput): number {
  return putRecord(target, offset, stxo, encodeHeaderCode(stxo.height, stxo.isCoinbase));
}

/**
 * Decode one record at `offset`. Read on its own, a zero header code means
 * height 0 and not a coinbase; the journal decoder substitutes the
 * transaction's header instead.
 */
export function decodeSpentOutput(serialized: Buffer, offset = 0): DecodedSpentOutput {
  if (offset >= serialized.length) {
    throw deserializeError('no serialized bytes', 0);
  }

  const { value: headerCode, bytesRead: headerSize } = deserializeVLQ(serialized, offset);
  let read = headerSize;
  if (offset + read >= serialized.length) {
    throw deserializeError('unexpected end of data after header code', read);
  }

  const { height, isCoinbase } = decodeHeaderCode(headerCode, read);
  if (hasReserved(headerCode, height)) {
    try {
      read += deserializeVLQ(serialized, offset + read).bytesRead;
    } catch (error) {
      rethrowNested(error, 'invalid reserved field', read);
    }
    if (offset + read >= serialized.length) {
      throw deserializeError('unexpected end of data after reserved', read);
    }
  }

  try {
    const { amount, script, bytesRead } = decodeCompressedTxOut(serialized, offset + read);
    return {
      output: { amount, script, height, isCoinbase },
      headerCode,
      bytesRead: read + bytesRead,
    };
  } catch (error) {
    rethrowNested(error, 'unable to decode txout', read);
  }
}

/**
 * Header code each record is written with, indexed like `stxos`, after
 * per-transaction deduplication in serialization order.
 */
function wireHeaderCodes(
  stxos: readonly SpentOutput[],
  txns: readonly BlockTransaction[],
): bigint[] {
  const expected = totalInputs(txns);
  if (stxos.length !== expected) {
    throw assertionError(
      `mismatched spend journal - ${stxos.length} spent outputs for ${expected} inputs`,
    );
  }

  const codes = new Array<bigint>(stxos.length);
  let stxoIdx = stxos.length - 1;
  for (let txIdx = txns.length - 1; txIdx >= 0; txIdx--) {
    let txHeader: bigint | null = null;

    for (let inIdx = txns[txIdx].inputs.length - 1; inIdx >= 0; inIdx--) {
      const stxo = stxos[stxoIdx];
      const headerCode = encodeHeaderCode(stxo.height, stxo.isCoinbase);

      if (txHeader !== null && headerCode === txHeader) {
        codes[stxoIdx] = DEDUPLICATED_HEADER;
      } else {
        if (headerCode === DEDUPLICATED_HEADER) {
          throw assertionError(
            `spent output ${stxoIdx} has height 0 and is not a coinbase; its header code is reserved`,
          );
        }
        codes[stxoIdx] = headerCode;
        txHeader = headerCode;
      }
      stxoIdx--;
    }
  }
  return codes;
}

export function spendJournalSerializeSize(
  stxos: readonly SpentOutput[],
  txns: readonly BlockTransaction[],
): number {
  const codes = wireHeaderCodes(stxos, txns);
  return stxos.reduce((size, stxo, i) => size + recordSize(stxo, codes[i]), 0);
}

/**
 * Serialize the spent outputs of a block. `stxos` is in block order (by
 * transaction, then input) and `txns` are the block's transactions without
 * the coinbase.
 */
export function serializeSpendJournalEntry(
  stxos: readonly SpentOutput[],
  txns: readonly BlockTransaction[],
): Buffer {
  const codes = wireHeaderCodes(stxos, txns);
  if (stxos.length === 0) return Buffer.alloc(0);

  const size = stxos.reduce((total, stxo, i) => total + recordSize(stxo, codes[i]), 0);
  const serialized = Buffer.alloc(size);

  let offset = 0;
  for (let i = stxos.length - 1; i >= 0; i--) {
    offset += putRecord(serialized, offset, stxos[i], codes[i]);
  }
  return serialized;
}

export function deserializeSpendJournalEntry(
  serialized: Buffer,
  txns: readonly BlockTransaction[],
): SpentOutput[] {
  const numStxos = totalInputs(txns);

  if (serialized.length === 0) {
    if (numStxos !== 0) {
      throw assertionError(
        `mismatched spend journal serialization - no serialization for expected ${numStxos} stxos`,
      );
    }
    return [];
  }
  if (numStxos === 0) {
    throw assertionError(
      `mismatched spend journal serialization - ${serialized.length} bytes for a block with no spends`,
    );
  }

  const stxos = new Array<SpentOutput>(numStxos);
  let stxoIdx = numStxos - 1;
  let offset = 0;

  for (let txIdx = txns.length - 1; txIdx >= 0; txIdx--) {
    let txHeader: { height: number; isCoinbase: boolean } | null = null;

    for (let inIdx = txns[txIdx].inputs.length - 1; inIdx >= 0; inIdx--) {
      let decoded: DecodedSpentOutput;
      try {
        decoded = decodeSpentOutput(serialized, offset);
      } catch (error) {
        rethrowNested(error, `unable to decode stxo ${stxoIdx}`, offset);
      }

      const { output, headerCode } = decoded;
      if (headerCode === DEDUPLICATED_HEADER) {
        if (txHeader === null) {
          throw deserializeError(
            `stxo ${stxoIdx} shares a header code with no preceding record in its transaction`,
            offset,
          );
        }
        output.height = txHeader.height;
        output.isCoinbase = txHeader.isCoinbase;
      } else {
        txHeader = { height: output.height, isCoinbase: output.isCoinbase };
      }

      stxos[stxoIdx] = output;
      stxoIdx--;
      offset += decoded.bytesRead;
    }
  }

  if (offset !== serialized.length) {
    throw assertionError(
      `mismatched spend journal serialization - ${serialized.length - offset} bytes left after ${numStxos} stxos`,
      offset,
    );
  }

  return stxos;
}

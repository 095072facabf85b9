/**
 * @module Encoders
 * @description Byte-exact codecs for persisted chain state.
 *
 * - **VLQ**: base-128 variable-length unsigned integers with no redundant encodings
 * - **Amount / script compression**: compact forms of output amounts and standard scripts
 * - **UTXO entries**: one record per unspent output
 * - **Spend journal**: per-block undo records, header codes shared within a transaction
 * - **DAG tips**: the fixed textual form of the tip set
 *
 * @example Round-trip a ledger entry
 * ```typescript
 * import { deserializeUtxoEntry, serializeUtxoEntry } from 'dag-chainstate-codec/encoders';
 *
 * const bytes = serializeUtxoEntry(entry);
 * const restored = bytes && deserializeUtxoEntry(bytes);
 * ```
 */

export {
  DEFAULT_VLQ_BITS,
  deserializeVLQ,
  putVLQ,
  serializeSizeVLQ,
  serializeVLQ,
  type VLQDecodeResult,
} from './vlq.ts';

export {
  COMPRESSED_AMOUNT_BITS,
  compressAmount,
  decompressAmount,
  MAX_AMOUNT,
} from './amount-compressor.ts';

export {
  classifyScript,
  compressedScriptSize,
  CompressedScriptType,
  compressScript,
  decodeCompressedScriptSize,
  decompressScript,
  NUM_SPECIAL_SCRIPTS,
  putCompressedScript,
  type ScriptTemplate,
} from './script-compressor.ts';

export {
  compressedTxOutSize,
  decodeCompressedTxOut,
  type DecodedTxOut,
  decodeHeaderCode,
  encodeHeaderCode,
  type HeaderCodeFields,
  putCompressedTxOut,
} from './compressed-txout.ts';

export {
  deserializeUtxoEntry,
  serializeUtxoEntry,
  utxoEntrySerializeSize,
} from './utxo-entry-codec.ts';

export {
  type DecodedSpentOutput,
  decodeSpentOutput,
  deserializeSpendJournalEntry,
  putSpentOutput,
  serializeSpendJournalEntry,
  spendJournalSerializeSize,
  spentOutputSerializeSize,
} from './spend-journal-codec.ts';

export { deserializeDagTipHashes, serializeDagTipHashes } from './dag-tips-codec.ts';

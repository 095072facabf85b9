/**
 * Chain-State Store
 *
 * Persists ledger entries, spend journals and the DAG tip set in an
 * external key-value store through the codecs. Data that fails to decode
 * after having been written is reported as store corruption rather than
 * bad input.
 */

import { Buffer } from 'node:buffer';

import type { ChainStateConfig } from '../config/chainstate-config.ts';
import { DEFAULT_CHAINSTATE_CONFIG } from '../config/chainstate-config.ts';
import type { UtxoEntry } from '../core/utxo-entry.ts';
import { deserializeDagTipHashes, serializeDagTipHashes } from '../encoders/dag-tips-codec.ts';
import {
  deserializeSpendJournalEntry,
  serializeSpendJournalEntry,
} from '../encoders/spend-journal-codec.ts';
import { deserializeUtxoEntry, serializeUtxoEntry } from '../encoders/utxo-entry-codec.ts';
import { putVLQ, serializeSizeVLQ, serializeVLQ } from '../encoders/vlq.ts';
import { corruptionError, isDeserializeError, notInDagError } from '../errors/index.ts';
import type {
  BlockTransaction,
  KeyValueStore,
  OutPoint,
  SpentOutput,
} from '../interfaces/index.ts';
import { type Hash, hashToString } from '../primitives/hash.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';

export interface ChainStateStoreOptions {
  config?: ChainStateConfig;
  logger?: Logger;
}

/**
 * Key of an unspent output: the transaction hash followed by the VLQ of the
 * output index, so outputs of one transaction sort together.
 */
export function outpointKey(outpoint: OutPoint): Buffer {
  const key = Buffer.alloc(outpoint.hash.length + serializeSizeVLQ(outpoint.index));
  outpoint.hash.copy(key, 0);
  putVLQ(key, outpoint.hash.length, outpoint.index);
  return key;
}

function formatOutPoint(outpoint: OutPoint): string {
  return `${hashToString(outpoint.hash)}:${outpoint.index}`;
}

export class ChainStateStore {
  private readonly config: ChainStateConfig;
  private readonly logger: Logger;

  constructor(private readonly store: KeyValueStore, options: ChainStateStoreOptions = {}) {
    this.config = options.config ?? { ...DEFAULT_CHAINSTATE_CONFIG };
    this.logger = options.logger ?? new ConsoleLogger(this.config.logLevel);
  }

  /**
   * Write a ledger entry. A spent entry removes the output from the set.
   */
  async putUtxoEntry(outpoint: OutPoint, entry: UtxoEntry): Promise<void> {
    const key = this.bucketKey(this.config.utxoBucket, outpointKey(outpoint));
    const serialized = serializeUtxoEntry(entry);
    if (serialized === null) {
      this.logger.debug?.('Removing spent utxo', { outpoint: formatOutPoint(outpoint) });
      await this.store.delete(key);
      return;
    }

    this.logger.debug?.('Storing utxo', {
      outpoint: formatOutPoint(outpoint),
      size: serialized.length,
    });
    await this.store.put(key, serialized);
  }

  /**
   * Resolve to the unspent entry for an outpoint, or null when the outpoint
   * is spent or unknown.
   */
  async fetchUtxoEntry(outpoint: OutPoint): Promise<UtxoEntry | null> {
    const key = this.bucketKey(this.config.utxoBucket, outpointKey(outpoint));
    const serialized = await this.store.get(key);
    if (serialized === undefined) return null;

    try {
      return deserializeUtxoEntry(serialized);
    } catch (error) {
      throw this.corruption(error, `corrupt utxo entry for ${formatOutPoint(outpoint)}`);
    }
  }

  async putSpendJournalEntry(
    blockHash: Hash,
    stxos: readonly SpentOutput[],
    txns: readonly BlockTransaction[],
  ): Promise<void> {
    const serialized = serializeSpendJournalEntry(stxos, txns);
    this.logger.debug?.('Storing spend journal', {
      block: hashToString(blockHash),
      stxos: stxos.length,
      size: serialized.length,
    });
    await this.store.put(this.bucketKey(this.config.spendJournalBucket, blockHash), serialized);
  }

  /**
   * Load the outputs a block spent, in block order. `txns` are the block's
   * transactions without the coinbase.
   */
  async fetchSpendJournalEntry(
    blockHash: Hash,
    txns: readonly BlockTransaction[],
  ): Promise<SpentOutput[]> {
    const serialized = await this.store.get(
      this.bucketKey(this.config.spendJournalBucket, blockHash),
    );

    if (serialized === undefined) {
      if (txns.every((tx) => tx.inputs.length === 0)) return [];
      throw notInDagError(`no spend journal for block ${hashToString(blockHash)}`);
    }

    try {
      return deserializeSpendJournalEntry(serialized, txns);
    } catch (error) {
      throw this.corruption(error, `corrupt spend information for ${hashToString(blockHash)}`);
    }
  }

  async removeSpendJournalEntry(blockHash: Hash): Promise<void> {
    this.logger.debug?.('Removing spend journal', { block: hashToString(blockHash) });
    await this.store.delete(this.bucketKey(this.config.spendJournalBucket, blockHash));
  }

  async putDagTipHashes(tipHashes: readonly Hash[]): Promise<void> {
    this.logger.debug?.('Storing DAG tips', { tips: tipHashes.length });
    await this.store.put(this.tipHashesKey(), serializeDagTipHashes(tipHashes));
  }

  /**
   * Resolve to the stored tip set, or null when none has been written yet.
   */
  async fetchDagTipHashes(): Promise<Hash[] | null> {
    const serialized = await this.store.get(this.tipHashesKey());
    if (serialized === undefined) return null;

    try {
      return deserializeDagTipHashes(serialized);
    } catch (error) {
      this.logger.error('DAG tip hashes failed to decode', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private tipHashesKey(): Buffer {
    return this.bucketKey(this.config.dagStateBucket, Buffer.from(this.config.tipHashesKey, 'utf8'));
  }

  /** VLQ(name length) || name || key */
  private bucketKey(bucket: string, key: Buffer): Buffer {
    const name = Buffer.from(bucket, 'utf8');
    return Buffer.concat([serializeVLQ(name.length), name, key]);
  }

  /** Malformed stored bytes become corruption; anything else propagates as is */
  private corruption(error: unknown, description: string): unknown {
    if (!isDeserializeError(error)) return error;

    this.logger.error(description, {
      reason: error.message,
      bytesRead: error.detail.bytesRead,
    });
    return corruptionError(`${description}: ${error.message}`, error.detail.bytesRead);
  }
}

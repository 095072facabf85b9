/**
 * Ledger Entry Type Definitions
 */

import type { Buffer } from 'node:buffer';

/**
 * Fields shared by live unspent outputs and their undo records
 */
export interface OutputRecord {
  /** Amount in base units, unsigned 64-bit */
  amount: bigint;
  /** Locking script */
  script: Buffer;
  /** Whether the creating transaction is a coinbase */
  isCoinbase: boolean;
}

/**
 * A previously unspent output consumed by one input of a connected block.
 * Converted back into a live entry when the block is disconnected.
 */
export interface SpentOutput extends OutputRecord {
  /** Height of the block that created the output */
  height: number;
}

/**
 * Construction parameters for a live unspent-output entry
 */
export interface UtxoEntryParams extends OutputRecord {
  /** Height of the block that created the output */
  blockHeight: number;
}

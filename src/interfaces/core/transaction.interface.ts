/**
 * Parsed Transaction Model
 *
 * Only the shape the undo codec relies on: input counts and order per
 * transaction, and the outputs a transaction creates.
 */

import type { Buffer } from 'node:buffer';

/**
 * Reference to a previous transaction output
 */
export interface OutPoint {
  /** Transaction hash, natural byte order */
  hash: Buffer;
  /** Output index */
  index: number;
}

export interface TransactionInput {
  previousOutPoint: OutPoint;
}

export interface TransactionOutput {
  amount: bigint;
  script: Buffer;
}

export interface BlockTransaction {
  inputs: TransactionInput[];
  outputs: TransactionOutput[];
}

/**
 * Unspent Output Entry
 *
 * A live ledger entry. Amount, script, height and the coinbase flag are
 * fixed at creation; the only transition is to spent.
 */

import { Buffer } from 'node:buffer';

import { assertionError } from '../errors/index.ts';
import { MAX_AMOUNT } from '../encoders/amount-compressor.ts';
import type { SpentOutput, UtxoEntryParams } from '../interfaces/index.ts';

export const TxoFlags = {
  /** Created by a coinbase transaction */
  CoinBase: 1 << 0,
  /** Consumed by a connected block */
  Spent: 1 << 1,
  /** Changed since it was loaded and needs writing back */
  Modified: 1 << 2,
} as const;

export class UtxoEntry {
  readonly amount: bigint;
  readonly script: Buffer;
  readonly blockHeight: number;
  private packedFlags: number;

  constructor(params: UtxoEntryParams, packedFlags = 0) {
    if (params.amount < 0n || params.amount > MAX_AMOUNT) {
      throw assertionError(`amount ${params.amount} is outside the unsigned 64-bit range`);
    }
    if (!Number.isSafeInteger(params.blockHeight) || params.blockHeight < 0) {
      throw assertionError(`invalid block height ${params.blockHeight}`);
    }

    this.amount = params.amount;
    this.script = params.script;
    this.blockHeight = params.blockHeight;
    this.packedFlags = packedFlags & ~TxoFlags.CoinBase;
    if (params.isCoinbase) {
      this.packedFlags |= TxoFlags.CoinBase;
    }
  }

  static fromSpentOutput(stxo: SpentOutput): UtxoEntry {
    return new UtxoEntry(
      {
        amount: stxo.amount,
        script: Buffer.from(stxo.script),
        blockHeight: stxo.height,
        isCoinbase: stxo.isCoinbase,
      },
      TxoFlags.Modified,
    );
  }

  isCoinbase(): boolean {
    return (this.packedFlags & TxoFlags.CoinBase) !== 0;
  }

  isSpent(): boolean {
    return (this.packedFlags & TxoFlags.Spent) !== 0;
  }

  isModified(): boolean {
    return (this.packedFlags & TxoFlags.Modified) !== 0;
  }

  /** Mark the output spent. Spending twice is a no-op. */
  spend(): void {
    if (this.isSpent()) return;
    this.packedFlags |= TxoFlags.Spent | TxoFlags.Modified;
  }

  /** Undo record for this entry, as stored when a block consumes it */
  toSpentOutput(): SpentOutput {
    return {
      amount: this.amount,
      script: Buffer.from(this.script),
      height: this.blockHeight,
      isCoinbase: this.isCoinbase(),
    };
  }

  clone(): UtxoEntry {
    return new UtxoEntry(
      {
        amount: this.amount,
        script: Buffer.from(this.script),
        blockHeight: this.blockHeight,
        isCoinbase: this.isCoinbase(),
      },
      this.packedFlags,
    );
  }
}

/** Live entry restored from an undo record when its block is disconnected */
export function spentOutputToUtxoEntry(stxo: SpentOutput): UtxoEntry {
  return UtxoEntry.fromSpentOutput(stxo);
}

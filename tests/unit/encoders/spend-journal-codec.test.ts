/**
 * Spend Journal Codec Tests
 */

import { describe, expect, it } from 'vitest';
import { Buffer } from 'node:buffer';

import {
  decodeSpentOutput,
  deserializeSpendJournalEntry,
  putSpentOutput,
  serializeSpendJournalEntry,
  spendJournalSerializeSize,
  spentOutputSerializeSize,
} from '../../../src/encoders/spend-journal-codec.ts';
import { isAssertionError, isDeserializeError } from '../../../src/errors/index.ts';
import type { SpentOutput } from '../../../src/interfaces/index.ts';
import {
  captureError,
  dedupBlock,
  hex,
  scripts,
  spentOutputVectors,
  transaction,
} from '../../fixtures/chainstate-fixtures.ts';

describe('Spend journal codec', () => {
  describe('single records', () => {
    it.each(spentOutputVectors)('should serialize $name', ({ stxo, serialized }) => {
      const size = spentOutputSerializeSize(stxo);
      const target = Buffer.alloc(size);

      expect(size).toBe(serialized.length);
      expect(putSpentOutput(target, 0, stxo)).toBe(size);
      expect(target.toString('hex')).toBe(serialized.toString('hex'));
    });

    it.each(spentOutputVectors)('should decode $name', ({ stxo, serialized }) => {
      const decoded = decodeSpentOutput(serialized);

      expect(decoded.output).toEqual(stxo);
      expect(decoded.bytesRead).toBe(serialized.length);
    });

    it('should expose the header code as written', () => {
      expect(decodeSpentOutput(spentOutputVectors[0].serialized).headerCode).toBe(19n);
      expect(decodeSpentOutput(spentOutputVectors[2].serialized).headerCode).toBe(0n);
    });

    it('should decode a record at an offset', () => {
      const { serialized } = spentOutputVectors[1];
      const padded = Buffer.concat([hex('ffff'), serialized]);

      expect(decodeSpentOutput(padded, 2).bytesRead).toBe(serialized.length);
    });

    const truncated: Array<[string, number, string]> = [
      ['', 0, 'no serialized bytes'],
      ['00', 1, 'unexpected end of data after header code'],
      ['13', 1, 'unexpected end of data after header code'],
      ['1300', 2, 'unexpected end of data after reserved'],
      ['1332', 2, 'unexpected end of data after reserved'],
      ['130032', 3, 'unable to decode txout: unexpected end of data after compressed amount'],
    ];

    it.each(truncated)('should reject truncated record "%s"', (input, bytesRead, message) => {
      const error = captureError(() => decodeSpentOutput(hex(input)));

      expect(isDeserializeError(error)).toBe(true);
      if (isDeserializeError(error)) {
        expect(error.detail.bytesRead).toBe(bytesRead);
        expect(error.message).toBe(message);
      }
    });
  });

  describe('journal entries', () => {
    const twoTransactions = {
      txns: [transaction(1, 0x01), transaction(1, 0x02)],
      stxos: [
        {
          amount: 34405000000n,
          script: scripts.p2pkhHeight100024b,
          height: 100024,
          isCoinbase: false,
        },
        {
          amount: 13761000000n,
          script: scripts.p2pkhHeight100024a,
          height: 100024,
          isCoinbase: false,
        },
      ] satisfies SpentOutput[],
      serialized: hex(
        '8b99700086c64700b2fb57eadf61e106a100a7445a8c3f67898841ec' +
          '8b99700091f20f006edbc6c4d31bae9f1ccc38538a114bf42de65e86',
      ),
    };

    it('should serialize to nothing when no outputs were spent', () => {
      expect(serializeSpendJournalEntry([], []).length).toBe(0);
      expect(serializeSpendJournalEntry([], [transaction(0)]).length).toBe(0);
      expect(deserializeSpendJournalEntry(Buffer.alloc(0), [])).toEqual([]);
    });

    it('should write transactions and inputs in reverse order', () => {
      const serialized = serializeSpendJournalEntry(twoTransactions.stxos, twoTransactions.txns);

      expect(serialized.toString('hex')).toBe(twoTransactions.serialized.toString('hex'));
      expect(spendJournalSerializeSize(twoTransactions.stxos, twoTransactions.txns)).toBe(
        serialized.length,
      );
    });

    it('should not share header codes across transactions', () => {
      const decoded = deserializeSpendJournalEntry(twoTransactions.serialized, twoTransactions.txns);
      expect(decoded).toEqual(twoTransactions.stxos);
    });

    it('should write a repeated header within a transaction as zero', () => {
      const serialized = serializeSpendJournalEntry(dedupBlock.stxos, dedupBlock.txns);

      expect(serialized.toString('hex')).toBe(dedupBlock.serialized.toString('hex'));
      expect(spendJournalSerializeSize(dedupBlock.stxos, dedupBlock.txns)).toBe(85);
    });

    it('should restore shared header codes when decoding', () => {
      const decoded = deserializeSpendJournalEntry(dedupBlock.serialized, dedupBlock.txns);
      expect(decoded).toEqual(dedupBlock.stxos);
    });

    it('should write every header when inputs of one transaction differ', () => {
      const txns = [transaction(2)];
      const stxos: SpentOutput[] = [
        { amount: 1000n, script: scripts.p2pkh, height: 5, isCoinbase: false },
        { amount: 1000n, script: scripts.p2pkh, height: 6, isCoinbase: false },
      ];
      const serialized = serializeSpendJournalEntry(stxos, txns);

      expect(serialized.toString('hex')).toBe(
        `0c000400${'11'.repeat(20)}0a000400${'11'.repeat(20)}`,
      );
      expect(deserializeSpendJournalEntry(serialized, txns)).toEqual(stxos);
    });

    it('should share a header only with the most recent distinct one', () => {
      const txns = [transaction(3)];
      const stxos: SpentOutput[] = [
        { amount: 1000n, script: scripts.p2pkh, height: 5, isCoinbase: false },
        { amount: 1000n, script: scripts.p2pkh, height: 6, isCoinbase: false },
        { amount: 1000n, script: scripts.p2pkh, height: 5, isCoinbase: false },
      ];
      const serialized = serializeSpendJournalEntry(stxos, txns);

      expect(serialized.toString('hex')).toBe(
        `0a000400${'11'.repeat(20)}0c000400${'11'.repeat(20)}0a000400${'11'.repeat(20)}`,
      );
      expect(deserializeSpendJournalEntry(serialized, txns)).toEqual(stxos);
    });

    it('should deduplicate coinbase outputs created at height 0', () => {
      const txns = [transaction(2)];
      const stxos: SpentOutput[] = [
        { amount: 1000n, script: scripts.p2pkh, height: 0, isCoinbase: true },
        { amount: 1000n, script: scripts.p2pkh, height: 0, isCoinbase: true },
      ];
      const serialized = serializeSpendJournalEntry(stxos, txns);

      expect(serialized.toString('hex')).toBe(
        `010400${'11'.repeat(20)}000400${'11'.repeat(20)}`,
      );
      expect(deserializeSpendJournalEntry(serialized, txns)).toEqual(stxos);
    });
  });

  describe('contract violations', () => {
    it('should refuse a spent output count that does not match the inputs', () => {
      const error = captureError(() =>
        serializeSpendJournalEntry(dedupBlock.stxos.slice(1), dedupBlock.txns)
      );

      expect(isAssertionError(error)).toBe(true);
      if (isAssertionError(error)) {
        expect(error.message).toBe('mismatched spend journal - 2 spent outputs for 3 inputs');
      }
    });

    it('should refuse a non-coinbase output created at height 0', () => {
      const stxos: SpentOutput[] = [
        { amount: 1000n, script: scripts.p2pkh, height: 0, isCoinbase: false },
      ];
      expect(isAssertionError(captureError(() => serializeSpendJournalEntry(stxos, [transaction(1)]))))
        .toBe(true);
    });

    it('should treat a missing journal for a block with inputs as an invariant violation', () => {
      const error = captureError(() => deserializeSpendJournalEntry(Buffer.alloc(0), [transaction(1)]));

      expect(isAssertionError(error)).toBe(true);
      expect(isDeserializeError(error)).toBe(false);
    });

    it('should treat bytes for a block without inputs as an invariant violation', () => {
      const error = captureError(() => deserializeSpendJournalEntry(hex('00'), [transaction(0)]));
      expect(isAssertionError(error)).toBe(true);
    });

    it('should treat bytes left after the last record as an invariant violation', () => {
      const serialized = Buffer.concat([dedupBlock.serialized, hex('00')]);
      const error = captureError(() => deserializeSpendJournalEntry(serialized, dedupBlock.txns));

      expect(isAssertionError(error)).toBe(true);
      if (isAssertionError(error)) {
        expect(error.detail.bytesRead).toBe(85);
      }
    });
  });

  describe('malformed journals', () => {
    it('should report a truncated record with the bytes read so far', () => {
      const serialized = hex(
        '1301320511db93e1dcdb8a016b49840f8c53bc1eb68a382e97b1482ecad7b148a6909a',
      );
      const error = captureError(() => deserializeSpendJournalEntry(serialized, [transaction(1)]));

      expect(isDeserializeError(error)).toBe(true);
      if (isDeserializeError(error)) {
        expect(error.detail.bytesRead).toBe(3);
        expect(error.message).toBe(
          'unable to decode stxo 0: unable to decode txout: unexpected end of data after script size',
        );
      }
    });

    it('should offset errors in later records by the bytes already consumed', () => {
      // Second record (stxo 0) cut short after its header code
      const serialized = Buffer.concat([spentOutputVectors[1].serialized, hex('8b9970')]);
      const error = captureError(() =>
        deserializeSpendJournalEntry(serialized, [transaction(1), transaction(1)])
      );

      expect(isDeserializeError(error)).toBe(true);
      if (isDeserializeError(error)) {
        expect(error.detail.bytesRead).toBe(31);
        expect(error.message).toBe(
          'unable to decode stxo 0: unexpected end of data after header code',
        );
      }
    });

    it('should reject every non-empty truncation of a journal as malformed', () => {
      const { serialized, txns } = dedupBlock;

      for (let length = 1; length < serialized.length; length++) {
        const error = captureError(() =>
          deserializeSpendJournalEntry(serialized.subarray(0, length), txns)
        );
        expect(isDeserializeError(error), `prefix of ${length} bytes`).toBe(true);
      }
    });

    it.each(spentOutputVectors)('should reject every truncation of $name', ({ serialized }) => {
      for (let length = 0; length < serialized.length; length++) {
        const error = captureError(() => decodeSpentOutput(serialized.subarray(0, length)));
        expect(isDeserializeError(error), `prefix of ${length} bytes`).toBe(true);
      }
    });

    it('should reject a shared header with no earlier record in its transaction', () => {
      const serialized = hex(`0009 00${'11'.repeat(20)}`.replace(' ', ''));
      const error = captureError(() => deserializeSpendJournalEntry(serialized, [transaction(1)]));

      expect(isDeserializeError(error)).toBe(true);
      if (isDeserializeError(error)) {
        expect(error.detail.bytesRead).toBe(0);
      }
    });

    it('should not carry a shared header into the next transaction', () => {
      // tx 1 writes a full header; tx 0 then starts with a shared one
      const serialized = hex(`0a000400${'11'.repeat(20)}000400${'11'.repeat(20)}`);
      const error = captureError(() =>
        deserializeSpendJournalEntry(serialized, [transaction(1), transaction(1)])
      );

      expect(isDeserializeError(error)).toBe(true);
      if (isDeserializeError(error)) {
        expect(error.detail.bytesRead).toBe(24);
      }
    });
  });
});

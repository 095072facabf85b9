/**
 * Error Taxonomy Tests
 */

import { describe, expect, it } from 'vitest';

import {
  assertionError,
  ChainStateError,
  ConfigurationError,
  corruptionError,
  deserializeError,
  isAssertionError,
  isChainStateError,
  isCorruptionError,
  isDeserializeError,
  isNotInDagError,
  notInDagError,
  rethrowNested,
} from '../../../src/errors/index.ts';
import { captureError } from '../../fixtures/chainstate-fixtures.ts';

describe('Chain-state errors', () => {
  it('should carry the failure kind and its detail', () => {
    const malformed = deserializeError('short', 4);
    expect(malformed).toBeInstanceOf(ChainStateError);
    expect(malformed).toBeInstanceOf(Error);
    expect(malformed.name).toBe('ChainStateError');
    expect(malformed.kind).toBe('malformed-input');
    expect(malformed.detail).toEqual({ kind: 'malformed-input', bytesRead: 4 });

    expect(corruptionError('bad').detail).toEqual({
      kind: 'storage-corruption',
      code: 'ErrCorruption',
    });
    expect(corruptionError('bad', 5).detail).toEqual({
      kind: 'storage-corruption',
      code: 'ErrCorruption',
      bytesRead: 5,
    });
    expect(assertionError('oops').detail).toEqual({ kind: 'internal-invariant' });
    expect(assertionError('oops', 7).detail).toEqual({ kind: 'internal-invariant', bytesRead: 7 });
    expect(notInDagError('missing').kind).toBe('not-in-dag');
  });

  it('should tell the kinds apart', () => {
    const errors = [
      deserializeError('a', 0),
      corruptionError('b'),
      assertionError('c'),
      notInDagError('d'),
    ];

    expect(errors.map(isDeserializeError)).toEqual([true, false, false, false]);
    expect(errors.map(isCorruptionError)).toEqual([false, true, false, false]);
    expect(errors.map(isAssertionError)).toEqual([false, false, true, false]);
    expect(errors.map(isNotInDagError)).toEqual([false, false, false, true]);
    expect(errors.every((error) => isChainStateError(error))).toBe(true);
  });

  it('should not claim foreign errors', () => {
    expect(isChainStateError(new Error('plain'))).toBe(false);
    expect(isChainStateError('malformed-input', 'malformed-input')).toBe(false);
    expect(isDeserializeError(undefined)).toBe(false);
  });

  describe('rethrowNested', () => {
    it('should prefix the context and shift the byte count', () => {
      const error = captureError(() =>
        rethrowNested(deserializeError('unexpected end of data', 2), 'unable to decode txout', 3)
      );

      expect(isDeserializeError(error)).toBe(true);
      if (isDeserializeError(error)) {
        expect(error.message).toBe('unable to decode txout: unexpected end of data');
        expect(error.detail.bytesRead).toBe(5);
      }
    });

    it('should pass other errors through untouched', () => {
      const invariant = assertionError('too wide', 9);
      const plain = new RangeError('out of range');

      expect(captureError(() => rethrowNested(invariant, 'ctx', 3))).toBe(invariant);
      expect(captureError(() => rethrowNested(plain, 'ctx', 3))).toBe(plain);
    });
  });

  describe('ConfigurationError', () => {
    it('should list every validation failure', () => {
      const error = new ConfigurationError(['first problem', 'second problem']);

      expect(error.name).toBe('ConfigurationError');
      expect(error.errors).toEqual(['first problem', 'second problem']);
      expect(error.message).toBe('Configuration validation failed: first problem, second problem');
    });
  });
});

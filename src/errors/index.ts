/**
 * Chain-State Error Taxonomy
 *
 * Every failure raised by the codecs and the store facade is a
 * `ChainStateError`. Callers branch on `error.kind` (or the guards below)
 * rather than on class names or message text.
 */

export type StorageErrorCode = 'ErrCorruption';

export type ChainStateErrorDetail =
  | {
    /** Truncated, out-of-range or structurally invalid buffer */
    kind: 'malformed-input';
    /** Bytes consumed before the failure was detected */
    bytesRead: number;
  }
  | {
    /** Previously trusted persisted state failed to decode */
    kind: 'storage-corruption';
    code: StorageErrorCode;
    /** Bytes of the stored value consumed before the damage was found */
    bytesRead?: number;
  }
  | {
    /** Caller contract or decoding-logic violation */
    kind: 'internal-invariant';
    bytesRead?: number;
  }
  | {
    kind: 'not-in-dag';
  };

export type ChainStateErrorKind = ChainStateErrorDetail['kind'];

export type ChainStateErrorOf<K extends ChainStateErrorKind> = ChainStateError<
  Extract<ChainStateErrorDetail, { kind: K }>
>;

export class ChainStateError<
  TDetail extends ChainStateErrorDetail = ChainStateErrorDetail,
> extends Error {
  public readonly detail: TDetail;

  constructor(message: string, detail: TDetail) {
    super(message);
    this.name = 'ChainStateError';
    this.detail = detail;
  }

  get kind(): ChainStateErrorKind {
    return this.detail.kind;
  }
}

export class ConfigurationError extends Error {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed: ${errors.join(', ')}`);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

export function deserializeError(
  message: string,
  bytesRead: number,
): ChainStateErrorOf<'malformed-input'> {
  return new ChainStateError(message, { kind: 'malformed-input', bytesRead });
}

export function corruptionError(
  message: string,
  bytesRead?: number,
): ChainStateErrorOf<'storage-corruption'> {
  return new ChainStateError(
    message,
    bytesRead === undefined
      ? { kind: 'storage-corruption', code: 'ErrCorruption' }
      : { kind: 'storage-corruption', code: 'ErrCorruption', bytesRead },
  );
}

export function assertionError(
  message: string,
  bytesRead?: number,
): ChainStateErrorOf<'internal-invariant'> {
  return new ChainStateError(
    message,
    bytesRead === undefined ? { kind: 'internal-invariant' } : { kind: 'internal-invariant', bytesRead },
  );
}

export function notInDagError(message: string): ChainStateErrorOf<'not-in-dag'> {
  return new ChainStateError(message, { kind: 'not-in-dag' });
}

export function isChainStateError(error: unknown): error is ChainStateError;
export function isChainStateError<K extends ChainStateErrorKind>(
  error: unknown,
  kind: K,
): error is ChainStateErrorOf<K>;
export function isChainStateError(
  error: unknown,
  kind?: ChainStateErrorKind,
): boolean {
  if (!(error instanceof ChainStateError)) return false;
  return kind === undefined || error.detail.kind === kind;
}

export function isDeserializeError(error: unknown): error is ChainStateErrorOf<'malformed-input'> {
  return isChainStateError(error, 'malformed-input');
}

export function isCorruptionError(
  error: unknown,
): error is ChainStateErrorOf<'storage-corruption'> {
  return isChainStateError(error, 'storage-corruption');
}

export function isAssertionError(
  error: unknown,
): error is ChainStateErrorOf<'internal-invariant'> {
  return isChainStateError(error, 'internal-invariant');
}

export function isNotInDagError(error: unknown): error is ChainStateErrorOf<'not-in-dag'> {
  return isChainStateError(error, 'not-in-dag');
}

/**
 * Re-raise a malformed-input error from a nested decoder with its byte
 * count shifted by what the outer decoder had already consumed. Any other
 * error propagates unchanged.
 */
export function rethrowNested(error: unknown, context: string, offset: number): never {
  if (isDeserializeError(error)) {
    throw deserializeError(`${context}: ${error.message}`, offset + error.detail.bytesRead);
  }
  throw error;
}

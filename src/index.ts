/**
 * @module dag-chainstate-codec
 *
 * Persisted chain state for a blockDAG node: unspent-output entries,
 * per-block spend journals and the DAG tip set, encoded byte-exactly for
 * an external key-value store.
 *
 * @example Store and reload a ledger entry
 * ```typescript
 * import { ChainStateStore, UtxoEntry } from 'dag-chainstate-codec';
 *
 * const chainState = new ChainStateStore(kvStore);
 * await chainState.putUtxoEntry(outpoint, new UtxoEntry({
 *   amount: 5000000000n,
 *   script,
 *   blockHeight: 9,
 *   isCoinbase: true,
 * }));
 * const entry = await chainState.fetchUtxoEntry(outpoint);
 * ```
 */

export * from './encoders/index.ts';
export * from './errors/index.ts';
export * from './config/index.ts';
export type * from './interfaces/index.ts';

export { spentOutputToUtxoEntry, TxoFlags, UtxoEntry } from './core/utxo-entry.ts';
export { type Hash, HASH_SIZE, hashFromString, hashToString, isHash } from './primitives/hash.ts';
export { ChainStateStore, type ChainStateStoreOptions, outpointKey } from './store/chain-state-store.ts';
export { ConsoleLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel } from './utils/logger.ts';

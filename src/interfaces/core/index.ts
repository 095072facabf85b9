/**
 * Core domain types
 */

export type * from './transaction.interface.ts';
export type * from './utxo.interface.ts';

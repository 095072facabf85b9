/**
 * Interfaces consumed and produced by the chain-state codecs
 */

export type * from './core/index.ts';
export type * from './store.interface.ts';

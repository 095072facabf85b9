/**
 * External Key-Value Store
 *
 * The transactional store the chain state is persisted in. Implementations
 * own durability and write serialization; this package only shapes the
 * bytes that go in and out.
 */

import type { Buffer } from 'node:buffer';

export interface KeyValueStore {
  /** Resolve to the stored value, or undefined when the key is absent */
  get(key: Buffer): Promise<Buffer | undefined>;
  put(key: Buffer, value: Buffer): Promise<void>;
  delete(key: Buffer): Promise<void>;
}

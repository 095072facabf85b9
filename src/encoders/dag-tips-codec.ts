/**
 * DAG Tip Hashes Codec
 *
 * The tip set is stored as text: an outer array with one inner array per
 * hash, each inner array listing the hash bytes in natural order as plain
 * decimals. No whitespace, signs, leading zeros or exponents.
 *
 *   [[111,226,140,...,0],[72,96,235,...,0]]
 */

import { Buffer } from 'node:buffer';

import { assertionError, corruptionError } from '../errors/index.ts';
import { type Hash, HASH_SIZE } from '../primitives/hash.ts';

const OPEN = 0x5b; // [
const CLOSE = 0x5d; // ]
const COMMA = 0x2c; // ,
const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;

export function serializeDagTipHashes(tipHashes: readonly Hash[]): Buffer {
  const inner = tipHashes.map((hash, i) => {
    if (hash.length !== HASH_SIZE) {
      throw assertionError(`tip hash ${i} is ${hash.length} bytes, expected ${HASH_SIZE}`);
    }
    return `[${Array.from(hash).join(',')}]`;
  });
  return Buffer.from(`[${inner.join(',')}]`, 'utf8');
}

class TipHashesParser {
  private pos = 0;

  constructor(private readonly text: Buffer) {}

  parse(): Hash[] {
    const hashes: Hash[] = [];
    this.expect(OPEN);
    if (this.peek() === CLOSE) {
      this.pos++;
    } else {
      for (;;) {
        hashes.push(this.parseHash());
        if (this.peek() === COMMA) {
          this.pos++;
          continue;
        }
        this.expect(CLOSE);
        break;
      }
    }
    if (this.pos !== this.text.length) {
      this.fail('trailing data');
    }
    return hashes;
  }

  private parseHash(): Hash {
    const bytes: number[] = [];
    this.expect(OPEN);
    for (;;) {
      bytes.push(this.parseByte());
      if (this.peek() === COMMA) {
        this.pos++;
        continue;
      }
      this.expect(CLOSE);
      break;
    }
    if (bytes.length !== HASH_SIZE) {
      this.fail(`hash has ${bytes.length} bytes, expected ${HASH_SIZE}`);
    }
    return Buffer.from(bytes);
  }

  private parseByte(): number {
    const start = this.pos;
    let value = 0;
    while (this.isDigit(this.peek())) {
      value = value * 10 + (this.text[this.pos] - DIGIT_0);
      this.pos++;
      if (this.pos - start > 3) break;
    }

    const length = this.pos - start;
    if (length === 0) this.fail('expected a byte value');
    if (length > 1 && this.text[start] === DIGIT_0) this.fail('leading zero in byte value');
    if (length > 3 || value > 0xff) this.fail('byte value out of range');
    return value;
  }

  private isDigit(c: number | undefined): boolean {
    return c !== undefined && c >= DIGIT_0 && c <= DIGIT_9;
  }

  private peek(): number | undefined {
    return this.pos < this.text.length ? this.text[this.pos] : undefined;
  }

  private expect(c: number): void {
    if (this.peek() !== c) {
      this.fail(`expected '${String.fromCharCode(c)}'`);
    }
    this.pos++;
  }

  private fail(reason: string): never {
    throw corruptionError(`corrupt DAG tip hashes: ${reason} at offset ${this.pos}`, this.pos);
  }
}

/**
 * Parse a stored tip set. Any deviation from the exact text form means the
 * stored state is damaged and is reported as corruption.
 */
export function deserializeDagTipHashes(serialized: Buffer): Hash[] {
  return new TipHashesParser(serialized).parse();
}

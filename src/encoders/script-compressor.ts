/**
 * Locking Script Compression
 *
 * Standard script templates collapse to a one-byte tag plus their payload:
 *
 *   tag 0      P2PKH                     20-byte hash160
 *   tag 1      P2SH                      20-byte hash160
 *   tag 2, 3   P2PK, compressed key      32-byte x (tag is the key prefix)
 *   tag 4, 5   P2PK, uncompressed key    32-byte x (tag 4 for even y, 5 for odd)
 *   tag >= 6   anything else             VLQ(length + 6) followed by the script
 *
 * The tag is itself a VLQ, so raw scripts shorter than 122 bytes take a
 * one-byte header.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';
import * as ecc from 'tiny-secp256k1';

import { assertionError, deserializeError } from '../errors/index.ts';
import { deserializeVLQ, putVLQ, serializeSizeVLQ } from './vlq.ts';

export const CompressedScriptType = {
  PayToPubKeyHash: 0,
  PayToScriptHash: 1,
  PayToPubKeyComp2: 2,
  PayToPubKeyComp3: 3,
  PayToPubKeyUncomp4: 4,
  PayToPubKeyUncomp5: 5,
} as const;

/** Number of tags reserved for templates; raw lengths are offset by this */
export const NUM_SPECIAL_SCRIPTS = 6;

const OPS = bitcoin.opcodes;
const OP_DATA_20 = 0x14;
const OP_DATA_33 = 0x21;
const OP_DATA_65 = 0x41;

const HASH160_SIZE = 20;
const COORDINATE_SIZE = 32;

export type ScriptTemplate =
  | { type: 'p2pkh'; hash: Buffer }
  | { type: 'p2sh'; hash: Buffer }
  | { type: 'p2pk'; pubkey: Buffer }
  | { type: 'raw' };

function isPubKeyHash(script: Buffer): boolean {
  return script.length === 25 &&
    script[0] === OPS.OP_DUP &&
    script[1] === OPS.OP_HASH160 &&
    script[2] === OP_DATA_20 &&
    script[23] === OPS.OP_EQUALVERIFY &&
    script[24] === OPS.OP_CHECKSIG;
}

function isScriptHash(script: Buffer): boolean {
  return script.length === 23 &&
    script[0] === OPS.OP_HASH160 &&
    script[1] === OP_DATA_20 &&
    script[22] === OPS.OP_EQUAL;
}

function extractPubKey(script: Buffer): Buffer | null {
  if (
    script.length === 35 &&
    script[0] === OP_DATA_33 &&
    script[34] === OPS.OP_CHECKSIG &&
    (script[1] === 0x02 || script[1] === 0x03)
  ) {
    const pubkey = script.subarray(1, 34);
    return ecc.isPoint(pubkey) ? pubkey : null;
  }

  // Only the 0x04 prefix is accepted: hybrid (0x06/0x07) keys would come
  // back as 0x04 after decompression.
  if (
    script.length === 67 &&
    script[0] === OP_DATA_65 &&
    script[66] === OPS.OP_CHECKSIG &&
    script[1] === 0x04
  ) {
    const pubkey = script.subarray(1, 66);
    return ecc.isPoint(pubkey) ? pubkey : null;
  }

  return null;
}

export function classifyScript(script: Buffer): ScriptTemplate {
  if (isPubKeyHash(script)) {
    return { type: 'p2pkh', hash: script.subarray(3, 23) };
  }
  if (isScriptHash(script)) {
    return { type: 'p2sh', hash: script.subarray(2, 22) };
  }
  const pubkey = extractPubKey(script);
  if (pubkey) {
    return { type: 'p2pk', pubkey };
  }
  return { type: 'raw' };
}

export function compressedScriptSize(script: Buffer): number {
  switch (classifyScript(script).type) {
    case 'p2pkh':
    case 'p2sh':
      return 1 + HASH160_SIZE;
    case 'p2pk':
      return 1 + COORDINATE_SIZE;
    case 'raw':
      return serializeSizeVLQ(script.length + NUM_SPECIAL_SCRIPTS) + script.length;
  }
}

export function putCompressedScript(target: Buffer, offset: number, script: Buffer): number {
  const template = classifyScript(script);
  switch (template.type) {
    case 'p2pkh':
      target[offset] = CompressedScriptType.PayToPubKeyHash;
      template.hash.copy(target, offset + 1);
      return 1 + HASH160_SIZE;

    case 'p2sh':
      target[offset] = CompressedScriptType.PayToScriptHash;
      template.hash.copy(target, offset + 1);
      return 1 + HASH160_SIZE;

    case 'p2pk': {
      const { pubkey } = template;
      if (pubkey.length === 33) {
        target[offset] = pubkey[0] === 0x02
          ? CompressedScriptType.PayToPubKeyComp2
          : CompressedScriptType.PayToPubKeyComp3;
      } else {
        const yIsOdd = (pubkey[64] & 0x01) === 1;
        target[offset] = yIsOdd
          ? CompressedScriptType.PayToPubKeyUncomp5
          : CompressedScriptType.PayToPubKeyUncomp4;
      }
      pubkey.copy(target, offset + 1, 1, 1 + COORDINATE_SIZE);
      return 1 + COORDINATE_SIZE;
    }

    case 'raw': {
      const headerSize = putVLQ(target, offset, script.length + NUM_SPECIAL_SCRIPTS);
      script.copy(target, offset + headerSize);
      return headerSize + script.length;
    }
  }
}

export function compressScript(script: Buffer): Buffer {
  const target = Buffer.alloc(compressedScriptSize(script));
  putCompressedScript(target, 0, script);
  return target;
}

/**
 * Total size of the compressed script starting at `offset`, tag included.
 * The caller checks the result against the bytes actually available.
 */
export function decodeCompressedScriptSize(serialized: Buffer, offset = 0): number {
  if (offset >= serialized.length) return 0;

  const { value: tag, bytesRead } = deserializeVLQ(serialized, offset);
  switch (tag) {
    case 0n:
    case 1n:
      return 1 + HASH160_SIZE;
    case 2n:
    case 3n:
    case 4n:
    case 5n:
      return 1 + COORDINATE_SIZE;
  }

  return Number(tag - BigInt(NUM_SPECIAL_SCRIPTS)) + bytesRead;
}

function buildScript(payment: bitcoin.Payment, kind: string): Buffer {
  if (!payment.output) {
    throw assertionError(`failed to build ${kind} script`);
  }
  return payment.output;
}

/**
 * Reverse `putCompressedScript`. `compressed` holds one compressed script;
 * bytes past its size are ignored and a short payload is malformed.
 */
export function decompressScript(compressed: Buffer): Buffer {
  if (compressed.length === 0) return Buffer.alloc(0);

  const { value: tag, bytesRead } = deserializeVLQ(compressed);
  if (compressed.length < decodeCompressedScriptSize(compressed)) {
    throw deserializeError('unexpected end of data in compressed script', bytesRead);
  }
  const payload = compressed.subarray(bytesRead);

  switch (tag) {
    case 0n:
      return buildScript(bitcoin.payments.p2pkh({ hash: Buffer.from(payload.subarray(0, 20)) }), 'P2PKH');

    case 1n:
      return buildScript(bitcoin.payments.p2sh({ hash: Buffer.from(payload.subarray(0, 20)) }), 'P2SH');

    case 2n:
    case 3n: {
      const pubkey = Buffer.concat([Buffer.from([Number(tag)]), payload.subarray(0, COORDINATE_SIZE)]);
      return bitcoin.script.compile([pubkey, OPS.OP_CHECKSIG]);
    }

    case 4n:
    case 5n: {
      const compressedKey = Buffer.concat([
        Buffer.from([Number(tag) - 2]),
        payload.subarray(0, COORDINATE_SIZE),
      ]);
      if (!ecc.isPoint(compressedKey)) {
        throw deserializeError('compressed public key is not on the curve', 0);
      }
      const pubkey = Buffer.from(ecc.pointCompress(compressedKey, false));
      return bitcoin.script.compile([pubkey, OPS.OP_CHECKSIG]);
    }
  }

  const scriptLength = Number(tag) - NUM_SPECIAL_SCRIPTS;
  return Buffer.from(payload.subarray(0, scriptLength));
}

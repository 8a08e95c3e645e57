/**
 * Integer and Byte Serialization
 *
 * Little-endian integer encoding for keys, scalars and coordinates, plus
 * the hex and concatenation helpers from @noble/hashes.
 */

import { bytesToHex, concatBytes, hexToBytes as nobleHexToBytes } from '@noble/hashes/utils';
import type { Endianness } from '../types.js';
import { invalidArgumentError } from '../errors.js';

export { bytesToHex, concatBytes };

/**
 * Decode an unsigned integer from bytes
 *
 * @param endian - Byte order, little-endian unless stated
 */
export function bytesToNumber(bytes: Uint8Array, endian: Endianness = 'le'): bigint {
  let value = 0n;

  if (endian === 'le') {
    for (let i = bytes.length - 1; i >= 0; i--) {
      value = (value << 8n) | BigInt(bytes[i]!);
    }
  } else {
    for (let i = 0; i < bytes.length; i++) {
      value = (value << 8n) | BigInt(bytes[i]!);
    }
  }

  return value;
}

/**
 * Decode a little-endian unsigned integer
 */
export function bytesToNumberLE(bytes: Uint8Array): bigint {
  return bytesToNumber(bytes, 'le');
}

/**
 * Encode a non-negative integer into exactly `length` bytes
 *
 * Shorter values are zero-padded.
 *
 * @throws Ed25519Error if the value is negative or needs more than `length` bytes
 */
export function numberToBytes(value: bigint, length: number, endian: Endianness = 'le'): Uint8Array {
  if (value < 0n || value >= 1n << BigInt(8 * length)) {
    throw invalidArgumentError('value', value, [`0 <= value < 2^${8 * length}`]);
  }

  const bytes = new Uint8Array(length);
  let v = value;
  if (endian === 'le') {
    for (let i = 0; i < length; i++) {
      bytes[i] = Number(v & 0xffn);
      v >>= 8n;
    }
  } else {
    for (let i = length - 1; i >= 0; i--) {
      bytes[i] = Number(v & 0xffn);
      v >>= 8n;
    }
  }

  return bytes;
}

/**
 * Encode a non-negative integer as `length` little-endian bytes
 */
export function numberToBytesLE(value: bigint, length: number): Uint8Array {
  return numberToBytes(value, length, 'le');
}

/**
 * Parse a hex string (with or without '0x' prefix)
 *
 * @throws Ed25519Error on odd length or non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (cleanHex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(cleanHex)) {
    throw invalidArgumentError('hex', hex);
  }
  return nobleHexToBytes(cleanHex);
}

/**
 * Byte-wise equality
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Signer
 *
 * Key derivation, key-pair generation and deterministic signing. The hash
 * collaborator is passed in by the caller; see `createEd25519` in api.ts
 * for the bound form.
 */

import type { HashFunction, Key, KeyPair, Signature } from './types.js';
import type { Ed25519Config } from './config.js';
import { invalidKeyFormatError } from './errors.js';
import { createDebugLogger } from './debug.js';
import { L, KEY_LENGTH, TWO_POW_254 } from './field/config.js';
import { mod } from './field/operations.js';
import { bytesToNumberLE, concatBytes, numberToBytesLE } from './field/serialization.js';
import { ED25519_CURVE } from './curve/config.js';
import { scalarMult } from './curve/operations.js';
import { encodePoint } from './curve/compression.js';
import { hashInt } from './hash.js';

const debugLog = createDebugLogger('signer');

/** Bits 3..253 of the hash prefix survive clamping */
const CLAMP_MASK = TWO_POW_254 - 8n;

/**
 * Derive the secret scalar a from a hash of the secret seed
 *
 * Reads the first 32 bytes little-endian, clears bits 0-2, 254 and 255,
 * then sets bit 254.
 */
export function clampScalar(digest: Uint8Array): bigint {
  return TWO_POW_254 + (bytesToNumberLE(digest.subarray(0, KEY_LENGTH)) & CLAMP_MASK);
}

/**
 * Derive the public key for a secret seed
 *
 * The result is the compressed encoding of a·B.
 */
export function derivePublicKey(hash: HashFunction, secret: Key): Key {
  const a = clampScalar(hash(secret));
  return encodePoint(scalarMult(a, ED25519_CURVE.base));
}

/**
 * Sign a message
 *
 * When the public key is omitted it is derived from the secret, which
 * costs one extra scalar multiplication.
 *
 *   r = H(h[32..64] || M)        (not reduced before use)
 *   R = r·B
 *   k = H(R || A || M)
 *   S = (r + k·a) mod l
 *
 * @returns 64 bytes, R followed by S little-endian
 */
export function signature(
  hash: HashFunction,
  message: Uint8Array,
  secret: Key,
  publicKey?: Key
): Signature {
  const pk = publicKey ?? derivePublicKey(hash, secret);

  const h = hash(secret);
  const a = clampScalar(h);
  const r = hashInt(hash, h.subarray(KEY_LENGTH, 2 * KEY_LENGTH), message);
  const bigR = encodePoint(scalarMult(r, ED25519_CURVE.base));
  const s = mod(r + hashInt(hash, bigR, pk, message) * a, L);

  return concatBytes(bigR, numberToBytesLE(s, KEY_LENGTH));
}

/**
 * Generate a key pair
 *
 * Draws a 32-byte seed from the configured random source unless one is
 * supplied.
 *
 * @throws Ed25519Error with INVALID_KEY_FORMAT if the seed is not 32 bytes
 */
export function generateKeyPair(config: Ed25519Config, secret?: Key): KeyPair {
  const secretKey = secret ?? config.randomBytes(KEY_LENGTH);
  if (secretKey.length !== KEY_LENGTH) {
    throw invalidKeyFormatError('secret key', KEY_LENGTH, secretKey.length);
  }

  debugLog('Generating key pair', { suppliedSecret: secret !== undefined });

  return {
    secretKey,
    publicKey: derivePublicKey(config.hash, secretKey),
  };
}

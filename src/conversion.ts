/**
 * Curve Conversion
 *
 * Maps Ed25519 keys to their Curve25519 (Montgomery form) counterparts so a
 * signing key pair can also be used for X25519 key exchange, and provides
 * the X25519 function itself.
 */

import type { HashFunction, Key } from './types.js';
import { invalidArgumentError, invalidKeyFormatError } from './errors.js';
import { createDebugLogger } from './debug.js';
import { P, KEY_LENGTH, MASK_255, TWO_POW_254 } from './field/config.js';
import { mod, inv } from './field/operations.js';
import { bytesToNumberLE, numberToBytesLE } from './field/serialization.js';
import { decodePoint } from './curve/compression.js';

const debugLog = createDebugLogger('conversion');

/** (A - 2) / 4 for Curve25519, A = 486662 */
const A24 = 121665n;

/** u coordinate of the Curve25519 base point */
export const X25519_BASE_U = 9n;

/**
 * X25519 scalar clamping: clear bits 0-2 and 255, set bit 254
 */
export function clampX25519(scalar: bigint): bigint {
  return (scalar & ~7n & MASK_255) | TWO_POW_254;
}

/**
 * Convert an Ed25519 key to the matching Curve25519 key
 *
 * - `'public'`: decodes the Edwards point and returns u = (1 + y) / (1 - y).
 *   The identity (y = 1) maps to u = 0.
 * - `'secret'`: hashes the seed and returns the clamped first 32 bytes.
 *
 * The tag is checked at run time.
 *
 * @throws Ed25519Error with INVALID_KEY_FORMAT or INVALID_POINT for a bad public key
 * @throws Ed25519Error with INVALID_ARGUMENT for any other `which`
 */
export function toCurve25519(hash: HashFunction, key: Key, which: string): Key {
  switch (which) {
    case 'public': {
      const { y } = decodePoint(key);
      const u = mod((1n + y) * inv(mod(1n - y, P)), P);
      debugLog('Converted public key');
      return numberToBytesLE(u, KEY_LENGTH);
    }
    case 'secret': {
      const digest = hash(key);
      const scalar = clampX25519(bytesToNumberLE(digest.subarray(0, KEY_LENGTH)));
      debugLog('Converted secret key');
      return numberToBytesLE(scalar, KEY_LENGTH);
    }
    default:
      throw invalidArgumentError('which', which, ['secret', 'public']);
  }
}

/**
 * Montgomery ladder computing the u coordinate of k·(u, ·)
 */
function montgomeryLadder(k: bigint, u: bigint): bigint {
  const x1 = u;
  let x2 = 1n;
  let z2 = 0n;
  let x3 = u;
  let z3 = 1n;
  let swap = 0n;

  for (let t = 254n; t >= 0n; t--) {
    const kt = (k >> t) & 1n;
    swap ^= kt;
    if (swap === 1n) {
      [x2, x3] = [x3, x2];
      [z2, z3] = [z3, z2];
    }
    swap = kt;

    const a = mod(x2 + z2, P);
    const aa = mod(a * a, P);
    const b = mod(x2 - z2, P);
    const bb = mod(b * b, P);
    const e = mod(aa - bb, P);
    const c = mod(x3 + z3, P);
    const d = mod(x3 - z3, P);
    const da = mod(d * a, P);
    const cb = mod(c * b, P);

    x3 = mod((da + cb) * (da + cb), P);
    z3 = mod(x1 * mod((da - cb) * (da - cb), P), P);
    x2 = mod(aa * bb, P);
    z2 = mod(e * (aa + A24 * e), P);
  }

  if (swap === 1n) {
    [x2, x3] = [x3, x2];
    [z2, z3] = [z3, z2];
  }

  return mod(x2 * inv(z2), P);
}

/**
 * X25519 function
 *
 * Clamps the scalar and masks bit 255 of the u coordinate before running
 * the ladder.
 *
 * @param scalar - 32-byte secret scalar
 * @param u - 32-byte u coordinate
 * @throws Ed25519Error with INVALID_KEY_FORMAT if either input is not 32 bytes
 */
export function x25519(scalar: Key, u: Key): Key {
  if (scalar.length !== KEY_LENGTH) {
    throw invalidKeyFormatError('scalar', KEY_LENGTH, scalar.length);
  }
  if (u.length !== KEY_LENGTH) {
    throw invalidKeyFormatError('u coordinate', KEY_LENGTH, u.length);
  }

  const k = clampX25519(bytesToNumberLE(scalar));
  const uValue = mod(bytesToNumberLE(u) & MASK_255, P);

  return numberToBytesLE(montgomeryLadder(k, uValue), KEY_LENGTH);
}

/**
 * X25519 with the base point u = 9: the public key for a secret scalar
 */
export function x25519Base(scalar: Key): Key {
  return x25519(scalar, numberToBytesLE(X25519_BASE_U, KEY_LENGTH));
}

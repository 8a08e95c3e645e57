/**
 * Point Compression and Decompression
 *
 * A compressed edwards25519 point is 32 little-endian bytes: y in the low
 * 255 bits and the parity of x in bit 255. Decompression recovers x from
 * the curve equation and picks the root whose parity matches.
 */

import type { DecodeResult, EdwardsPoint, Key } from '../types.js';
import { invalidKeyFormatError, invalidPointError } from '../errors.js';
import { P, D, SQRT_M1, MASK_255, KEY_LENGTH } from '../field/config.js';
import { mod, expmod, inv } from '../field/operations.js';
import { bytesToNumberLE, numberToBytesLE } from '../field/serialization.js';
import { createPoint } from './point.js';
import { isPointOnCurve } from './operations.js';

/**
 * Recover the even x coordinate for a given y
 *
 * Computes a square root of (y² - 1) / (d·y² + 1) with the exponent
 * (p+3)/8, fixing it up by √-1 when the first candidate squares to the
 * negation. When no root exists the returned value is simply wrong, and
 * the caller's curve check rejects it.
 */
export function xRecover(y: bigint): bigint {
  const y2 = y * y;
  const xx = mod((y2 - 1n) * inv(D * y2 + 1n), P);
  let x = expmod(xx, (P + 3n) / 8n, P);

  if (mod(x * x - xx, P) !== 0n) {
    x = mod(x * SQRT_M1, P);
  }

  return x % 2n !== 0n ? P - x : x;
}

/**
 * Compress a curve point to 32 bytes
 */
export function encodePoint(point: EdwardsPoint): Uint8Array {
  const encoded = (point.y & MASK_255) | ((point.x & 1n) << 255n);
  return numberToBytesLE(encoded, KEY_LENGTH);
}

/**
 * Decompress a curve point without throwing
 *
 * Fails with INVALID_KEY_FORMAT when the input is not 32 bytes and with
 * INVALID_POINT when the recovered point is off the curve.
 */
export function decodePointResult(bytes: Uint8Array): DecodeResult {
  if (bytes.length !== KEY_LENGTH) {
    return { ok: false, error: invalidKeyFormatError('point', KEY_LENGTH, bytes.length) };
  }

  const decoded = bytesToNumberLE(bytes);
  const xc = decoded >> 255n;
  const y = decoded & MASK_255;
  const x = xRecover(y);

  const point = (x & 1n) === xc ? createPoint(x, y) : createPoint(P - x, y);
  if (!isPointOnCurve(point)) {
    return { ok: false, error: invalidPointError(y) };
  }

  return { ok: true, point };
}

/**
 * Decompress a curve point
 *
 * @throws Ed25519Error with INVALID_KEY_FORMAT or INVALID_POINT
 */
export function decodePoint(bytes: Uint8Array): EdwardsPoint {
  const result = decodePointResult(bytes);
  if (!result.ok) {
    throw result.error;
  }
  return result.point;
}

/**
 * Check whether a key decodes to a point on the curve
 *
 * Any decode failure, including a wrong length, yields false.
 */
export function isOnCurve(key: Key): boolean {
  return decodePointResult(key).ok;
}

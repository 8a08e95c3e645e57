/**
 * Curve point helpers for tests
 */

import * as fc from 'fast-check';
import type { EdwardsPoint } from '../types.js';
import { P, D, KEY_LENGTH } from '../field/config.js';
import { mod, expmod, inv } from '../field/operations.js';
import { numberToBytesLE } from '../field/serialization.js';
import { ED25519_CURVE } from '../curve/config.js';
import { scalarMult } from '../curve/operations.js';
import { arbitrarySmallScalar } from './property-test-config.js';

/**
 * Generate a valid curve point by scalar multiplication of the base point
 */
export function arbitraryCurvePoint(): fc.Arbitrary<EdwardsPoint> {
  return arbitrarySmallScalar().map((scalar) => scalarMult(scalar, ED25519_CURVE.base));
}

/**
 * Whether (y² - 1) / (d·y² + 1) is a square, i.e. whether some x puts (x, y) on the curve
 */
export function hasCurvePoint(y: bigint): boolean {
  const u = mod((y * y - 1n) * inv(D * y * y + 1n), P);
  return u === 0n || expmod(u, (P - 1n) / 2n, P) === 1n;
}

/**
 * The smallest y with no curve point, as a 32-byte compressed encoding
 */
export function findOffCurveEncoding(): Uint8Array {
  let y = 2n;
  while (hasCurvePoint(y)) {
    y++;
  }
  return numberToBytesLE(y, KEY_LENGTH);
}

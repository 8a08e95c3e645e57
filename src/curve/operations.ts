/**
 * Elliptic Curve Operations
 *
 * Affine twisted Edwards addition, scalar multiplication and the curve
 * equation check. Addition is complete on edwards25519, so doubling and
 * the identity need no special cases.
 */

import type { EdwardsPoint, Scalar } from '../types.js';
import { invalidArgumentError } from '../errors.js';
import { P, D } from '../field/config.js';
import { mod, inv } from '../field/operations.js';
import { createIdentity } from './point.js';

/**
 * Check if a point satisfies -x² + y² = 1 + d·x²·y²
 */
export function isPointOnCurve(point: EdwardsPoint): boolean {
  const { x, y } = point;
  const x2 = x * x;
  const y2 = y * y;
  return mod(-x2 + y2 - 1n - D * x2 * y2, P) === 0n;
}

/**
 * Twisted Edwards point addition
 *
 *   x3 = (x1·y2 + x2·y1) / (1 + d·x1·x2·y1·y2)
 *   y3 = (y1·y2 + x1·x2) / (1 - d·x1·x2·y1·y2)
 */
export function edwards(p1: EdwardsPoint, p2: EdwardsPoint): EdwardsPoint {
  const { x: x1, y: y1 } = p1;
  const { x: x2, y: y2 } = p2;

  const t = mod(D * x1 * x2 * y1 * y2, P);
  const x = (x1 * y2 + x2 * y1) * inv(mod(1n + t, P));
  const y = (y1 * y2 + x1 * x2) * inv(mod(1n - t, P));

  return { x: mod(x, P), y: mod(y, P) };
}

/**
 * Point doubling, 2P
 */
export function pointDouble(point: EdwardsPoint): EdwardsPoint {
  return edwards(point, point);
}

/**
 * Point negation, (x, y) → (-x, y)
 */
export function pointNegate(point: EdwardsPoint): EdwardsPoint {
  return { x: mod(-point.x, P), y: point.y };
}

/**
 * Scalar multiplication using double-and-add
 *
 * Walks the bits of the scalar from the most significant down, doubling
 * the accumulator at each bit and adding the point on set bits. The scalar
 * need not be reduced modulo the group order.
 *
 * @param scalar - Non-negative multiplier of any size
 * @throws Ed25519Error if scalar is negative
 */
export function scalarMult(scalar: Scalar, point: EdwardsPoint): EdwardsPoint {
  if (scalar < 0n) {
    throw invalidArgumentError('scalar', scalar);
  }

  let result = createIdentity();
  if (scalar === 0n) {
    return result;
  }

  for (let bit = BigInt(scalar.toString(2).length - 1); bit >= 0n; bit--) {
    result = edwards(result, result);
    if ((scalar >> bit) & 1n) {
      result = edwards(result, point);
    }
  }

  return result;
}

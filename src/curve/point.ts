/**
 * Point Representation
 *
 * Affine edwards25519 points with canonical coordinates.
 */

import type { EdwardsPoint } from '../types.js';
import { P } from '../field/config.js';
import { mod } from '../field/operations.js';

/**
 * Create a point, reducing both coordinates into [0, p)
 *
 * No curve check is made; see {@link isPointOnCurve}.
 */
export function createPoint(x: bigint, y: bigint): EdwardsPoint {
  return { x: mod(x, P), y: mod(y, P) };
}

/**
 * The identity element (0, 1)
 */
export function createIdentity(): EdwardsPoint {
  return { x: 0n, y: 1n };
}

export function isIdentity(point: EdwardsPoint): boolean {
  return point.x === 0n && point.y === 1n;
}

/**
 * Check if two points are equal
 */
export function pointsEqual(a: EdwardsPoint, b: EdwardsPoint): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Curve Configuration for edwards25519
 *
 * The twisted Edwards curve -x² + y² = 1 + d·x²·y² over GF(2^255 - 19),
 * birationally equivalent to Curve25519.
 */

import type { CurveConfig, EdwardsPoint } from '../types.js';
import { P, L, D, SQRT_M1 } from '../field/config.js';
import { mod, inv } from '../field/operations.js';
import { isPointOnCurve } from './operations.js';

/**
 * edwards25519 curve configuration
 *
 * The base point B has y = 4/5 and an even x coordinate.
 */
export const ED25519_CURVE: CurveConfig = (() => {
  const base: EdwardsPoint = {
    x: 15112221349535400772501151409588531511454012693041857206046113283949847762202n,
    y: 46316835694926478169428394003475163141307993866256225615783033603165251855960n,
  };

  return {
    p: P,
    l: L,
    d: D,
    i: SQRT_M1,
    base,
    identity: { x: 0n, y: 1n },
  };
})();

/**
 * Validate that the curve configuration is internally consistent
 * Checks that the base point is on the curve and has y = 4/5
 */
export function validateCurveConfig(config: CurveConfig = ED25519_CURVE): boolean {
  if (!isPointOnCurve(config.base)) {
    return false;
  }
  if (config.base.y !== mod(4n * inv(5n), config.p)) {
    return false;
  }
  return config.base.x % 2n === 0n;
}

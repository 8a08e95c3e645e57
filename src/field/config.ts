/**
 * Field and Group Constants for edwards25519
 *
 * The constants are written out rather than derived at load time so that
 * the field operations can depend on them without an import cycle.
 * `validateFieldConstants` recomputes the derived ones.
 */

import { mod, expmod, inv } from './operations.js';

/**
 * Field prime p = 2^255 - 19
 */
export const P = 57896044618658097711785492504343953926634992332820282019728792003956564819949n;

/**
 * Order of the base-point subgroup, l = 2^252 + 27742317777372353535851937790883648493
 */
export const L = 7237005577332262213973186563042994240857116359379907606001950938285454250989n;

/**
 * Curve constant d = -121665/121666 mod p
 */
export const D = 37095705934669439343138083508754565189542113879843219016388785533085940283555n;

/**
 * Square root of -1, i = 2^((p-1)/4) mod p
 */
export const SQRT_M1 = 19681161376707505956807079304988542015446066515923890162744021073123829784752n;

/**
 * 2^254, the bit forced on by scalar clamping
 */
export const TWO_POW_254 = 1n << 254n;

/** Mask of the low 255 bits (the y coordinate of a compressed point) */
export const MASK_255 = (1n << 255n) - 1n;

/** Byte length of keys, compressed points and encoded scalars */
export const KEY_LENGTH = 32;

/** Byte length of a signature */
export const SIGNATURE_LENGTH = 64;

/**
 * Check that the written-out constants agree with their definitions
 */
export function validateFieldConstants(): boolean {
  if (P !== (1n << 255n) - 19n) {
    return false;
  }
  if (L !== (1n << 252n) + 27742317777372353535851937790883648493n) {
    return false;
  }
  if (D !== mod(-121665n * inv(121666n), P)) {
    return false;
  }
  return SQRT_M1 === expmod(2n, (P - 1n) / 4n, P);
}

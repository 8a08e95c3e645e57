/**
 * Field Arithmetic Operations
 *
 * Modular reduction, exponentiation and inversion over GF(2^255 - 19).
 * Values are plain bigints; every result is returned in canonical form
 * [0, modulus).
 */

import { invalidArgumentError } from '../errors.js';

const FIELD_PRIME = (1n << 255n) - 19n;

/**
 * Canonical non-negative representative of x modulo m
 *
 * @param m - Positive modulus
 */
export function mod(x: bigint, m: bigint): bigint {
  if (x === 0n) {
    return 0n;
  }
  const r = x % m;
  return r < 0n ? r + m : r;
}

/**
 * Modular exponentiation: base^exponent mod modulus
 *
 * A negative base is raised by its magnitude and the sign restored
 * afterwards: for an odd exponent and a non-zero result, the answer is
 * modulus - raw.
 *
 * Uses left-to-right square-and-multiply over the bits of the exponent.
 *
 * @param exponent - Non-negative exponent
 * @throws Ed25519Error if exponent is negative
 */
export function expmod(base: bigint, exponent: bigint, modulus: bigint): bigint {
  if (exponent < 0n) {
    throw invalidArgumentError('exponent', exponent);
  }
  if (exponent === 0n) {
    return 1n;
  }

  const negative = base < 0n;
  const b = mod(negative ? -base : base, modulus);

  let result = 1n;
  for (let bit = BigInt(exponent.toString(2).length - 1); bit >= 0n; bit--) {
    result = (result * result) % modulus;
    if ((exponent >> bit) & 1n) {
      result = (result * b) % modulus;
    }
  }

  if (!negative || (exponent & 1n) === 0n || result === 0n) {
    return result;
  }
  return modulus - result;
}

/**
 * Field inversion via Fermat's little theorem: x^(p-2) mod p
 *
 * Precondition (unchecked): x is not congruent to 0 mod p. For zero the
 * result is 0, which is not an inverse; no caller reaches that case on a
 * valid curve point.
 */
export function inv(x: bigint): bigint {
  return expmod(x, FIELD_PRIME - 2n, FIELD_PRIME);
}

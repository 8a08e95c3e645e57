/**
 * Property-based testing configuration and utilities
 *
 * This module provides configuration and helpers for property-based testing
 * using fast-check. Curve properties run fewer iterations than field
 * properties because every full-size scalar multiplication costs hundreds
 * of field inversions.
 */

import * as fc from 'fast-check';
import { P, L } from '../field/config.js';

/**
 * Standard configuration for property-based tests on field arithmetic
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for properties built on small-scalar point arithmetic
 */
export const CURVE_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 20,
  verbose: true,
  seed: Date.now(),
};

/**
 * Configuration for properties that sign, verify or multiply by full-size scalars
 */
export const SLOW_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 5,
  verbose: true,
  seed: Date.now(),
};

/** Timeout for tests using SLOW_PROPERTY_TEST_CONFIG */
export const SLOW_TEST_TIMEOUT = 180000;

/**
 * Arbitrary generator for field values in [0, p)
 */
export function arbitraryFieldValue(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 0n, max: P - 1n });
}

/**
 * Arbitrary generator for non-zero field values in [1, p)
 */
export function arbitraryNonZeroFieldValue(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: P - 1n });
}

/**
 * Arbitrary generator for scalars in [0, l)
 */
export function arbitraryScalarValue(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 0n, max: L - 1n });
}

/**
 * Arbitrary generator for small scalar values (for testing scalar multiplication)
 */
export function arbitrarySmallScalar(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: 1000n });
}

/**
 * Arbitrary generator for byte arrays (messages)
 */
export function arbitraryBytes(minLength: number = 0, maxLength: number = 64): fc.Arbitrary<Uint8Array> {
  return fc.uint8Array({ minLength, maxLength });
}

/**
 * Arbitrary generator for 32-byte arrays (seeds and keys)
 */
export function arbitrary32Bytes(): fc.Arbitrary<Uint8Array> {
  return fc.uint8Array({ minLength: 32, maxLength: 32 });
}

/**
 * Arbitrary generator for byte lengths other than the given one
 */
export function arbitraryWrongLength(length: number, max: number = 96): fc.Arbitrary<number> {
  return fc.integer({ min: 0, max }).filter((n) => n !== length);
}

/**
 * Return a copy of the bytes with one bit flipped
 */
export function flipBit(bytes: Uint8Array, bitIndex: number): Uint8Array {
  const copy = new Uint8Array(bytes);
  const byteIndex = Math.floor(bitIndex / 8);
  copy[byteIndex] = (copy[byteIndex] ?? 0) ^ (1 << (bitIndex % 8));
  return copy;
}

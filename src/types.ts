/**
 * Core type definitions for node-ed25519
 *
 * This module defines the value types shared by the field, curve and
 * protocol layers. Every value is immutable: operations return new values
 * and never mutate their inputs.
 *
 * @module types
 */

import type { Ed25519Error } from './errors.js';

/**
 * Integer in the canonical range [0, p) of the field GF(2^255 - 19)
 */
export type FieldElement = bigint;

/**
 * Non-negative integer used as a multiplier or exponent
 *
 * Scalars are reduced modulo the group order only where the protocol
 * requires it. Scalar multiplication accepts unreduced values.
 */
export type Scalar = bigint;

/**
 * Affine point on the twisted Edwards curve -x² + y² = 1 + d·x²·y²
 *
 * The identity element is (0, 1).
 *
 * @example
 * ```typescript
 * import { ED25519_CURVE, scalarMult } from 'node-ed25519';
 *
 * const doubled: EdwardsPoint = scalarMult(2n, ED25519_CURVE.base);
 * ```
 */
export interface EdwardsPoint {
  readonly x: FieldElement;
  readonly y: FieldElement;
}

/**
 * Curve parameters for edwards25519
 */
export interface CurveConfig {
  /** Field prime p = 2^255 - 19 */
  readonly p: bigint;
  /** Order l of the base-point subgroup */
  readonly l: bigint;
  /** Curve constant d = -121665/121666 mod p */
  readonly d: FieldElement;
  /** Square root of -1 in the field, 2^((p-1)/4) mod p */
  readonly i: FieldElement;
  /** Designated base point B */
  readonly base: EdwardsPoint;
  /** Identity element (0, 1) */
  readonly identity: EdwardsPoint;
}

/**
 * 32-byte key: either a secret seed or a compressed public point
 */
export type Key = Uint8Array;

/**
 * 64-byte signature: compressed R followed by little-endian S
 */
export type Signature = Uint8Array;

/**
 * Secret seed together with the public key derived from it
 */
export interface KeyPair {
  readonly secretKey: Key;
  readonly publicKey: Key;
}

/**
 * Which half of a key pair {@link toCurve25519} converts
 */
export type KeyKind = 'secret' | 'public';

/**
 * Hash collaborator: any function from bytes to a digest
 *
 * Signing needs at least 64 bytes of digest; SHA-512 is the default.
 */
export type HashFunction = (message: Uint8Array) => Uint8Array;

/**
 * Source of cryptographically secure random bytes
 */
export type RandomBytesFunction = (length: number) => Uint8Array;

/**
 * Outcome of decoding a compressed point
 */
export type DecodeResult =
  | { readonly ok: true; readonly point: EdwardsPoint }
  | { readonly ok: false; readonly error: Ed25519Error };

/**
 * Byte order for integer serialization
 */
export type Endianness = 'be' | 'le';

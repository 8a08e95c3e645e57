/**
 * node-ed25519
 *
 * Ed25519 key generation, deterministic signing and verification over
 * bigint arithmetic, with conversion of Ed25519 keys to X25519 keys.
 *
 * @example
 * ```typescript
 * import { generateKeyPair, signature, isValidSignature } from 'node-ed25519';
 *
 * const { secretKey, publicKey } = generateKeyPair();
 * const message = new TextEncoder().encode('hello');
 * const sig = signature(message, secretKey, publicKey);
 * isValidSignature(sig, message, publicKey); // true
 * ```
 *
 * @module node-ed25519
 */

// Types
export type {
  FieldElement,
  Scalar,
  EdwardsPoint,
  CurveConfig,
  Key,
  Signature,
  KeyPair,
  KeyKind,
  HashFunction,
  RandomBytesFunction,
  DecodeResult,
  Endianness,
} from './types.js';

// Errors
export {
  ErrorCode,
  Ed25519Error,
  isEd25519Error,
  invalidKeyFormatError,
  invalidPointError,
  invalidArgumentError,
  invalidConfigError,
} from './errors.js';

// Configuration
export {
  HASH_FUNCTIONS,
  DEFAULT_ED25519_CONFIG,
  resolveHashFunction,
  resolveConfig,
  resolveConfigFromEnv,
  type HashName,
  type HashOption,
  type Ed25519Config,
  type Ed25519Options,
} from './config.js';

// Field arithmetic and serialization
export * from './field/index.js';

// Curve points, operations and compression (isOnCurve is the bound API version)
export {
  ED25519_CURVE,
  validateCurveConfig,
  createPoint,
  createIdentity,
  isIdentity,
  pointsEqual,
  isPointOnCurve,
  edwards,
  pointDouble,
  pointNegate,
  scalarMult,
  xRecover,
  encodePoint,
  decodePoint,
  decodePointResult,
} from './curve/index.js';

// Protocol helpers that take no hash
export { clampScalar } from './signer.js';
export { clampX25519, x25519, x25519Base, X25519_BASE_U } from './conversion.js';

// Main API
export {
  createEd25519,
  createEd25519FromEnv,
  getDefaultEd25519,
  generateKeyPair,
  derivePublicKey,
  signature,
  isValidSignature,
  isOnCurve,
  toCurve25519,
  type Ed25519,
} from './api.js';

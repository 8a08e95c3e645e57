/**
 * Public API for node-ed25519
 *
 * `createEd25519` resolves the configuration once and returns an object
 * whose operations all use that hash and random source. The functions
 * exported at the bottom are bound to a default instance built from the
 * environment when this module loads.
 *
 * @module api
 */

import type { Key, KeyKind, KeyPair, Signature } from './types.js';
import { resolveConfig, resolveConfigFromEnv, type Ed25519Config, type Ed25519Options } from './config.js';
import * as signer from './signer.js';
import { isValidSignature as verify } from './verifier.js';
import { toCurve25519 as convert } from './conversion.js';
import { isOnCurve as decodesToCurvePoint } from './curve/compression.js';

/**
 * Ed25519 operations bound to one configuration
 */
export interface Ed25519 {
  /** The resolved configuration */
  readonly config: Ed25519Config;
  /** Generate a key pair from random bytes, or from the given 32-byte seed */
  generateKeyPair(secret?: Key): KeyPair;
  derivePublicKey(secret: Key): Key;
  /** Sign a message; the public key is derived when omitted */
  signature(message: Uint8Array, secret: Key, publicKey?: Key): Signature;
  isValidSignature(sig: Signature, message: Uint8Array, publicKey: Key): boolean;
  isOnCurve(key: Key): boolean;
  toCurve25519(key: Key, which: KeyKind): Key;
}

function bind(config: Ed25519Config): Ed25519 {
  const { hash } = config;
  return {
    config,
    generateKeyPair: (secret) => signer.generateKeyPair(config, secret),
    derivePublicKey: (secret) => signer.derivePublicKey(hash, secret),
    signature: (message, secret, publicKey) => signer.signature(hash, message, secret, publicKey),
    isValidSignature: (sig, message, publicKey) => verify(hash, sig, message, publicKey),
    isOnCurve: (key) => decodesToCurvePoint(key),
    toCurve25519: (key, which) => convert(hash, key, which),
  };
}

/**
 * Create an Ed25519 instance
 *
 * @example
 * ```typescript
 * import { createEd25519 } from 'node-ed25519';
 *
 * const ed = createEd25519({ hash: 'sha512' });
 * const { secretKey, publicKey } = ed.generateKeyPair();
 * const sig = ed.signature(message, secretKey, publicKey);
 * ed.isValidSignature(sig, message, publicKey); // true
 * ```
 */
export function createEd25519(options: Ed25519Options = {}): Ed25519 {
  return bind(resolveConfig(options));
}

/**
 * Create an Ed25519 instance from environment variables (ED25519_HASH)
 */
export function createEd25519FromEnv(env: NodeJS.ProcessEnv = process.env): Ed25519 {
  return bind(resolveConfigFromEnv(env));
}

const defaultInstance = createEd25519FromEnv();

/**
 * Get the default instance used by the module-level functions
 */
export function getDefaultEd25519(): Ed25519 {
  return defaultInstance;
}

export function generateKeyPair(secret?: Key): KeyPair {
  return defaultInstance.generateKeyPair(secret);
}

export function derivePublicKey(secret: Key): Key {
  return defaultInstance.derivePublicKey(secret);
}

export function signature(message: Uint8Array, secret: Key, publicKey?: Key): Signature {
  return defaultInstance.signature(message, secret, publicKey);
}

export function isValidSignature(sig: Signature, message: Uint8Array, publicKey: Key): boolean {
  return defaultInstance.isValidSignature(sig, message, publicKey);
}

export function isOnCurve(key: Key): boolean {
  return defaultInstance.isOnCurve(key);
}

export function toCurve25519(key: Key, which: KeyKind): Key {
  return defaultInstance.toCurve25519(key, which);
}

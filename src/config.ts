/**
 * Ed25519 Configuration
 *
 * The hash collaborator and random source are resolved once and then
 * passed explicitly into the signing, verification and conversion code.
 * Nothing here is mutated after resolution.
 */

import { sha512 } from '@noble/hashes/sha512';
import { randomBytes } from '@noble/hashes/utils';
import type { HashFunction, RandomBytesFunction } from './types.js';
import { invalidConfigError } from './errors.js';
import { createDebugLogger } from './debug.js';

const debugLog = createDebugLogger('config');

/**
 * Hash functions selectable by name
 */
export const HASH_FUNCTIONS = {
  sha512: (message: Uint8Array): Uint8Array => sha512(message),
} as const satisfies Record<string, HashFunction>;

export type HashName = keyof typeof HASH_FUNCTIONS;

/**
 * A named hash or any function from bytes to a digest
 */
export type HashOption = HashName | HashFunction;

/**
 * Resolved configuration
 */
export interface Ed25519Config {
  /** Hash used for key derivation, nonces and challenges */
  readonly hash: HashFunction;
  /** Random source for key generation */
  readonly randomBytes: RandomBytesFunction;
}

/**
 * Options accepted by {@link resolveConfig}
 */
export interface Ed25519Options {
  /** A hash name from HASH_FUNCTIONS or a function; names are checked at resolution */
  hash?: HashOption | string;
  randomBytes?: RandomBytesFunction;
}

/**
 * Default configuration: SHA-512 and the platform CSPRNG
 */
export const DEFAULT_ED25519_CONFIG: Ed25519Config = {
  hash: HASH_FUNCTIONS.sha512,
  randomBytes: (length: number): Uint8Array => randomBytes(length),
};

function isHashName(name: string): name is HashName {
  return Object.prototype.hasOwnProperty.call(HASH_FUNCTIONS, name);
}

/**
 * Resolve a hash option to a function
 *
 * @throws Ed25519Error with INVALID_CONFIG for an unknown name
 */
export function resolveHashFunction(option: HashOption | string): HashFunction {
  if (typeof option === 'function') {
    return option;
  }
  if (isHashName(option)) {
    return HASH_FUNCTIONS[option];
  }
  throw invalidConfigError('hash', option, Object.keys(HASH_FUNCTIONS));
}

/**
 * Merge options over the defaults
 */
export function resolveConfig(options: Ed25519Options = {}): Ed25519Config {
  const config: Ed25519Config = {
    hash: options.hash === undefined ? DEFAULT_ED25519_CONFIG.hash : resolveHashFunction(options.hash),
    randomBytes: options.randomBytes ?? DEFAULT_ED25519_CONFIG.randomBytes,
  };

  debugLog('Resolved configuration', {
    hash: typeof options.hash === 'string' ? options.hash : options.hash ? 'custom' : 'sha512',
    randomBytes: options.randomBytes ? 'custom' : 'default',
  });

  return config;
}

/**
 * Resolve configuration from environment variables
 *
 * ED25519_HASH selects a hash by name; unset means SHA-512.
 */
export function resolveConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Ed25519Config {
  const hashName = env['ED25519_HASH'];
  if (hashName === undefined || hashName === '') {
    return resolveConfig();
  }
  return resolveConfig({ hash: resolveHashFunction(hashName) });
}

/**
 * Hash helpers shared by signing, verification and conversion
 */

import type { HashFunction } from './types.js';
import { bytesToNumberLE, concatBytes } from './field/serialization.js';

/**
 * Hash the concatenation of the parts and read the digest as a
 * little-endian integer
 */
export function hashInt(hash: HashFunction, ...parts: Uint8Array[]): bigint {
  return bytesToNumberLE(hash(concatBytes(...parts)));
}

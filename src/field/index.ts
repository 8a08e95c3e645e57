/**
 * Finite Field Arithmetic Module
 *
 * Arithmetic over GF(2^255 - 19) on plain bigints, the edwards25519
 * constants, and little-endian byte serialization.
 */

export * from './config.js';
export * from './operations.js';
export * from './serialization.js';

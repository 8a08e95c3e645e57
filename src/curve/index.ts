/**
 * Elliptic Curve Operations Module
 *
 * edwards25519 points, addition and scalar multiplication, and the 32-byte
 * compressed point encoding.
 */

// Curve configuration
export * from './config.js';

// Point representation
export * from './point.js';

// Curve operations (addition, scalar multiplication, curve check)
export * from './operations.js';

// Point compression and decompression
export * from './compression.js';

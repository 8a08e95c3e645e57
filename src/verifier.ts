/**
 * Verifier
 *
 * Signature validation. Wrong-length signatures or keys are rejected with
 * false. A right-length R or public key that does not decode to a curve
 * point is a different matter: the decode error propagates to the caller
 * instead of being folded into false.
 */

import type { HashFunction, Key, Signature } from './types.js';
import { createDebugLogger } from './debug.js';
import { KEY_LENGTH, SIGNATURE_LENGTH } from './field/config.js';
import { bytesToNumberLE } from './field/serialization.js';
import { ED25519_CURVE } from './curve/config.js';
import { edwards, scalarMult } from './curve/operations.js';
import { pointsEqual } from './curve/point.js';
import { decodePoint } from './curve/compression.js';
import { hashInt } from './hash.js';

const debugLog = createDebugLogger('verifier');

/**
 * Validate a signature
 *
 * Accepts iff S·B = R + k·A with k = H(R || A || M).
 *
 * @throws Ed25519Error with INVALID_POINT if R or the public key is off the curve
 */
export function isValidSignature(
  hash: HashFunction,
  sig: Signature,
  message: Uint8Array,
  publicKey: Key
): boolean {
  if (sig.length !== SIGNATURE_LENGTH || publicKey.length !== KEY_LENGTH) {
    debugLog('Rejected signature with wrong shape', {
      signatureLength: sig.length,
      publicKeyLength: publicKey.length,
    });
    return false;
  }

  const rBytes = sig.subarray(0, KEY_LENGTH);
  const r = decodePoint(rBytes);
  const a = decodePoint(publicKey);
  const s = bytesToNumberLE(sig.subarray(KEY_LENGTH));
  const k = hashInt(hash, rBytes, publicKey, message);

  return pointsEqual(scalarMult(s, ED25519_CURVE.base), edwards(r, scalarMult(k, a)));
}

/**
 * Tests for the public API and the default instance
 */

import { describe, it, expect } from 'vitest';
import { utf8ToBytes } from '@noble/hashes/utils';
import { SLOW_TEST_TIMEOUT } from './test-utils/property-test-config.js';
import { CONVERSION_VECTOR, SIGN_VECTORS } from './test-utils/vectors.js';
import { expectErrorCode } from './test-utils/assertions.js';
import { findOffCurveEncoding } from './test-utils/points.js';
import {
  createEd25519,
  createEd25519FromEnv,
  derivePublicKey,
  generateKeyPair,
  getDefaultEd25519,
  isOnCurve,
  isValidSignature,
  signature,
  toCurve25519,
} from './index.js';
import { HASH_FUNCTIONS } from './config.js';
import { bytesToHex, hexToBytes } from './field/serialization.js';
import { ErrorCode } from './errors.js';

describe('Public API', () => {
  const vector = SIGN_VECTORS[2];
  const sk = hexToBytes(vector?.secretKey ?? '');
  const pk = hexToBytes(vector?.publicKey ?? '');
  const message = hexToBytes(vector?.message ?? '');

  describe('module-level functions', () => {
    it(
      'should generate a key pair whose public key re-derives',
      () => {
        const { secretKey, publicKey } = generateKeyPair();
        expect(secretKey.length).toBe(32);
        expect(publicKey.length).toBe(32);
        expect(bytesToHex(derivePublicKey(secretKey))).toBe(bytesToHex(publicKey));
      },
      SLOW_TEST_TIMEOUT
    );

    it(
      'should reproduce the known vector',
      () => {
        expect(bytesToHex(derivePublicKey(sk))).toBe(vector?.publicKey);
        expect(bytesToHex(signature(message, sk, pk))).toBe(vector?.signature);
        expect(isValidSignature(hexToBytes(vector?.signature ?? ''), message, pk)).toBe(true);
      },
      SLOW_TEST_TIMEOUT
    );

    it(
      'should sign and verify a text message without a supplied public key',
      () => {
        const text = utf8ToBytes('hello');
        const sig = signature(text, sk);
        expect(isValidSignature(sig, text, pk)).toBe(true);
        expect(isValidSignature(sig, utf8ToBytes('hellO'), pk)).toBe(false);
      },
      SLOW_TEST_TIMEOUT
    );

    it('should return false for malformed shapes', () => {
      expect(isValidSignature(new Uint8Array(0), utf8ToBytes('msg'), new Uint8Array([1, 2, 3]))).toBe(false);
    });

    it('should check curve membership', () => {
      expect(isOnCurve(pk)).toBe(true);
      expect(isOnCurve(new Uint8Array(0))).toBe(false);
      expect(isOnCurve(findOffCurveEncoding())).toBe(false);
    });

    it('should convert keys to Curve25519', () => {
      expect(bytesToHex(toCurve25519(hexToBytes(CONVERSION_VECTOR.secretKey), 'secret'))).toBe(
        CONVERSION_VECTOR.curveSecretKey
      );
      expect(bytesToHex(toCurve25519(hexToBytes(CONVERSION_VECTOR.publicKey), 'public'))).toBe(
        CONVERSION_VECTOR.curvePublicKey
      );
    });

    it('should propagate conversion errors', () => {
      expectErrorCode(() => toCurve25519(new Uint8Array(0), 'public'), ErrorCode.INVALID_KEY_FORMAT);
    });
  });

  describe('createEd25519', () => {
    it(
      'should bind the random source',
      () => {
        const ed = createEd25519({ randomBytes: () => hexToBytes(vector?.secretKey ?? '') });
        expect(bytesToHex(ed.generateKeyPair().publicKey)).toBe(vector?.publicKey);
      },
      SLOW_TEST_TIMEOUT
    );

    it(
      'should bind the hash for every operation',
      () => {
        const calls: number[] = [];
        const ed = createEd25519({
          hash: (input) => {
            calls.push(input.length);
            return HASH_FUNCTIONS.sha512(input);
          },
        });

        const sig = ed.signature(message, sk, pk);
        expect(bytesToHex(sig)).toBe(vector?.signature);
        // H(seed), H(prefix || M), H(R || A || M)
        expect(calls).toEqual([32, 32 + message.length, 64 + message.length]);

        calls.length = 0;
        expect(ed.isValidSignature(sig, message, pk)).toBe(true);
        expect(calls).toEqual([64 + message.length]);

        calls.length = 0;
        ed.toCurve25519(sk, 'secret');
        expect(calls).toEqual([32]);
      },
      SLOW_TEST_TIMEOUT
    );

    it('should expose the resolved configuration', () => {
      expect(createEd25519({ hash: 'sha512' }).config.hash).toBe(HASH_FUNCTIONS.sha512);
    });

    it('should reject an unknown hash name', () => {
      expectErrorCode(() => createEd25519({ hash: 'whirlpool' }), ErrorCode.INVALID_CONFIG);
    });
  });

  describe('createEd25519FromEnv', () => {
    it('should read ED25519_HASH', () => {
      expect(createEd25519FromEnv({ ED25519_HASH: 'sha512' }).config.hash).toBe(HASH_FUNCTIONS.sha512);
      expectErrorCode(() => createEd25519FromEnv({ ED25519_HASH: 'blake2b' }), ErrorCode.INVALID_CONFIG);
    });

    it('should back the module-level functions with a single default instance', () => {
      expect(getDefaultEd25519()).toBe(getDefaultEd25519());
    });
  });
});

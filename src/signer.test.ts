/**
 * Tests for key derivation, key-pair generation and signing
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { sha256 } from '@noble/hashes/sha256';
import { sha512 } from '@noble/hashes/sha512';
import { utf8ToBytes } from '@noble/hashes/utils';
import {
  PROPERTY_TEST_CONFIG,
  SLOW_TEST_TIMEOUT,
  arbitraryBytes,
} from './test-utils/property-test-config.js';
import { SIGN_VECTORS } from './test-utils/vectors.js';
import { expectErrorCode } from './test-utils/assertions.js';
import { clampScalar, derivePublicKey, generateKeyPair, signature } from './signer.js';
import { isValidSignature } from './verifier.js';
import { HASH_FUNCTIONS, resolveConfig } from './config.js';
import { bytesToHex, bytesToNumberLE, concatBytes, hexToBytes } from './field/serialization.js';
import { L } from './field/config.js';
import { ErrorCode } from './errors.js';

const hash = HASH_FUNCTIONS.sha512;

describe('Signer', () => {
  describe('known vectors', () => {
    it.each(SIGN_VECTORS)(
      'should derive, sign and verify for public key $publicKey',
      (vector) => {
        const sk = hexToBytes(vector.secretKey);
        const pk = hexToBytes(vector.publicKey);
        const message = hexToBytes(vector.message);

        expect(bytesToHex(derivePublicKey(hash, sk))).toBe(vector.publicKey);
        expect(bytesToHex(signature(hash, message, sk, pk))).toBe(vector.signature);
        expect(isValidSignature(hash, hexToBytes(vector.signature), message, pk)).toBe(true);
      },
      SLOW_TEST_TIMEOUT
    );
  });

  describe('clampScalar', () => {
    it('should set only bit 254 for an all-zero prefix', () => {
      expect(clampScalar(new Uint8Array(64))).toBe(1n << 254n);
    });

    it('should clear bits 0-2 and 255 for an all-ones prefix', () => {
      expect(clampScalar(new Uint8Array(64).fill(0xff))).toBe((1n << 255n) - 8n);
    });

    it('should read only the first 32 bytes', () => {
      const digest = new Uint8Array(64);
      digest.fill(0xff, 32);
      expect(clampScalar(digest)).toBe(1n << 254n);
    });

    it('should force bit 254 and clear bits 0-2 and 255', () => {
      fc.assert(
        fc.property(arbitraryBytes(64, 64), (digest) => {
          const a = clampScalar(digest);
          const raw = bytesToNumberLE(digest.subarray(0, 32));
          return (
            (a & 7n) === 0n &&
            (a >> 254n) === 1n &&
            (a & ((1n << 254n) - 8n)) === (raw & ((1n << 254n) - 8n))
          );
        }),
        PROPERTY_TEST_CONFIG
      );
    });
  });

  describe('derivePublicKey', () => {
    it(
      'should be deterministic',
      () => {
        const sk = hexToBytes(SIGN_VECTORS[0]?.secretKey ?? '');
        expect(bytesToHex(derivePublicKey(hash, sk))).toBe(bytesToHex(derivePublicKey(hash, sk)));
      },
      SLOW_TEST_TIMEOUT
    );
  });

  describe('signature', () => {
    const vector = SIGN_VECTORS[1];
    const sk = hexToBytes(vector?.secretKey ?? '');
    const pk = hexToBytes(vector?.publicKey ?? '');

    it(
      'should derive the public key when it is omitted',
      () => {
        const message = utf8ToBytes('derived');
        expect(bytesToHex(signature(hash, message, sk))).toBe(bytesToHex(signature(hash, message, sk, pk)));
      },
      SLOW_TEST_TIMEOUT
    );

    it(
      'should produce 64 bytes with S reduced below the group order',
      () => {
        const sig = signature(hash, utf8ToBytes('reduced'), sk, pk);
        expect(sig.length).toBe(64);
        expect(bytesToNumberLE(sig.subarray(32)) < L).toBe(true);
      },
      SLOW_TEST_TIMEOUT
    );

    it(
      'should sign with an injected hash that verifies only under that hash',
      () => {
        const tagged = (message: Uint8Array): Uint8Array => sha512(concatBytes(new Uint8Array([1]), message));
        const message = utf8ToBytes('tagged hash');
        const taggedPk = derivePublicKey(tagged, sk);
        const sig = signature(tagged, message, sk, taggedPk);

        expect(bytesToHex(taggedPk)).not.toBe(vector?.publicKey);
        expect(isValidSignature(tagged, sig, message, taggedPk)).toBe(true);
        expect(isValidSignature(hash, sig, message, taggedPk)).toBe(false);
      },
      SLOW_TEST_TIMEOUT
    );

    it(
      'should sign with a 32-byte digest hash',
      () => {
        const shortHash = (message: Uint8Array): Uint8Array => sha256(message);
        const message = utf8ToBytes('short digest');
        const shortPk = derivePublicKey(shortHash, sk);
        const sig = signature(shortHash, message, sk, shortPk);

        expect(sig.length).toBe(64);
        expect(isValidSignature(shortHash, sig, message, shortPk)).toBe(true);
      },
      SLOW_TEST_TIMEOUT
    );
  });

  describe('generateKeyPair', () => {
    const vector = SIGN_VECTORS[0];

    it(
      'should derive the public key from the random source',
      () => {
        const config = resolveConfig({ randomBytes: () => hexToBytes(vector?.secretKey ?? '') });
        const { secretKey, publicKey } = generateKeyPair(config);
        expect(bytesToHex(secretKey)).toBe(vector?.secretKey);
        expect(bytesToHex(publicKey)).toBe(vector?.publicKey);
      },
      SLOW_TEST_TIMEOUT
    );

    it(
      'should use a supplied secret instead of the random source',
      () => {
        const config = resolveConfig({
          randomBytes: () => {
            throw new Error('random source should not be used');
          },
        });
        const { publicKey } = generateKeyPair(config, hexToBytes(vector?.secretKey ?? ''));
        expect(bytesToHex(publicKey)).toBe(vector?.publicKey);
      },
      SLOW_TEST_TIMEOUT
    );

    it('should reject a random source that returns the wrong length', () => {
      const config = resolveConfig({ randomBytes: () => new Uint8Array(16) });
      const error = expectErrorCode(() => generateKeyPair(config), ErrorCode.INVALID_KEY_FORMAT);
      expect(error.message).toBe('Invalid secret key: expected 32 bytes, got 16');
    });

    it('should reject a supplied secret of the wrong length', () => {
      expectErrorCode(() => generateKeyPair(resolveConfig(), new Uint8Array(31)), ErrorCode.INVALID_KEY_FORMAT);
    });

    it(
      'should produce a 32-byte pair whose public key re-derives from the secret',
      () => {
        const { secretKey, publicKey } = generateKeyPair(resolveConfig());
        expect(secretKey.length).toBe(32);
        expect(publicKey.length).toBe(32);
        expect(bytesToHex(derivePublicKey(hash, secretKey))).toBe(bytesToHex(publicKey));
      },
      SLOW_TEST_TIMEOUT
    );
  });
});

/**
 * Assertion helpers for Ed25519Error codes
 */

import { expect } from 'vitest';
import { ErrorCode, isEd25519Error, type Ed25519Error } from '../errors.js';

/**
 * Run fn, assert it throws an Ed25519Error with the given code, and return the error
 */
export function expectErrorCode(fn: () => unknown, code: ErrorCode): Ed25519Error {
  let thrown: unknown;
  try {
    fn();
  } catch (error) {
    thrown = error;
  }
  expect(thrown).toBeDefined();
  if (!isEd25519Error(thrown)) {
    throw new Error(`Expected Ed25519Error [${code}], got ${String(thrown)}`);
  }
  expect(thrown.code).toBe(code);
  return thrown;
}

/**
 * Run a predicate, treating an INVALID_POINT decode failure as false
 */
export function falseOnInvalidPoint(fn: () => boolean): boolean {
  try {
    return fn();
  } catch (error) {
    if (isEd25519Error(error) && error.code === ErrorCode.INVALID_POINT) {
      return false;
    }
    throw error;
  }
}

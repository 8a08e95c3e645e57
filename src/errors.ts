/**
 * Error handling for node-ed25519
 *
 * Every failure raised by this library is an Ed25519Error carrying an
 * ErrorCode for programmatic handling and an optional details object.
 */

/**
 * Error codes for Ed25519 operations
 */
export enum ErrorCode {
  /** Input is not the expected byte length (keys, points, seeds) */
  INVALID_KEY_FORMAT = 'INVALID_KEY_FORMAT',
  /** Decoded coordinates do not satisfy the curve equation */
  INVALID_POINT = 'INVALID_POINT',
  /** Unsupported mode tag or malformed argument */
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  /** Invalid configuration option */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Base error class for Ed25519 errors
 *
 * @example
 * ```typescript
 * try {
 *   toCurve25519(key, 'public');
 * } catch (error) {
 *   if (isEd25519Error(error) && error.code === ErrorCode.INVALID_POINT) {
 *     console.error('Not a curve point:', error.details);
 *   }
 * }
 * ```
 */
export class Ed25519Error extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional context; never contains secret material
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'Ed25519Error';
    Object.setPrototypeOf(this, Ed25519Error.prototype);
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is an Ed25519Error
 */
export function isEd25519Error(error: unknown): error is Ed25519Error {
  return error instanceof Ed25519Error;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for input of the wrong byte length
 *
 * @param what - What was being decoded, e.g. 'point' or 'secret key'
 * @param expected - Required byte length
 * @param actual - Byte length received
 */
export function invalidKeyFormatError(
  what: string,
  expected: number,
  actual: number
): Ed25519Error {
  return new Ed25519Error(
    `Invalid ${what}: expected ${expected} bytes, got ${actual}`,
    ErrorCode.INVALID_KEY_FORMAT,
    { what, expected, actual }
  );
}

/**
 * Create an error for an encoding whose recovered point is off the curve
 *
 * @param y - Decoded y coordinate
 */
export function invalidPointError(y: bigint): Ed25519Error {
  return new Ed25519Error('Point off curve', ErrorCode.INVALID_POINT, { y: y.toString() });
}

/**
 * Create an error for an unsupported argument value
 *
 * @param argument - Name of the argument
 * @param value - The rejected value
 * @param validValues - Optional list of accepted values
 */
export function invalidArgumentError(
  argument: string,
  value: unknown,
  validValues?: unknown[]
): Ed25519Error {
  const details: Record<string, unknown> = { argument, value: String(value) };
  if (validValues) {
    details['validValues'] = validValues;
  }
  return new Ed25519Error(
    `Invalid argument '${argument}': ${String(value)}`,
    ErrorCode.INVALID_ARGUMENT,
    details
  );
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 * @param validValues - Optional list of valid values
 */
export function invalidConfigError(
  option: string,
  value: unknown,
  validValues?: unknown[]
): Ed25519Error {
  const details: Record<string, unknown> = { option, value: String(value) };
  if (validValues) {
    details['validValues'] = validValues;
  }
  return new Ed25519Error(
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    details
  );
}

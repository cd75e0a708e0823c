/**
 * Bundle errors
 *
 * Every failure surfaced by @plugseal/bundle is a BundleError carrying a
 * canonical E_BUNDLE_* code from @plugseal/kernel.
 */

import { CryptoError } from '@plugseal/crypto';
import { ERROR_CODES, getError, type ErrorCode } from '@plugseal/kernel';

/**
 * Typed error for bundle operations
 */
export class BundleError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'BundleError';
    this.code = code;
    this.details = details;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, BundleError.prototype);
  }

  /** Short human title for the code, from the kernel registry */
  get title(): string {
    return getError(this.code)?.title ?? this.code;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

/**
 * Type guard for BundleError, optionally for one code
 */
export function isBundleError(err: unknown, code?: ErrorCode): err is BundleError {
  return err instanceof BundleError && (code === undefined || err.code === code);
}

/**
 * Map a CryptoError onto the canonical key or signature format code.
 * Other errors pass through unchanged.
 */
export function fromCryptoError(err: unknown, details: Record<string, unknown> = {}): unknown {
  if (!(err instanceof CryptoError)) {
    return err;
  }
  const code =
    err.code === 'CRYPTO_INVALID_SIGNATURE_FORMAT'
      ? ERROR_CODES.E_BUNDLE_SIGNATURE_FORMAT
      : ERROR_CODES.E_BUNDLE_KEY_FORMAT;
  return new BundleError(code, err.message, { ...details, cryptoCode: err.code });
}

/**
 * Attach extra details to a BundleError, or wrap anything else as-is
 */
export function withDetails(err: unknown, details: Record<string, unknown>): unknown {
  if (err instanceof BundleError) {
    return new BundleError(err.code, err.message, { ...err.details, ...details });
  }
  return err;
}

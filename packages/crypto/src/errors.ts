/**
 * Typed errors for @plugseal/crypto
 *
 * These codes are internal to @plugseal/crypto. @plugseal/bundle maps them
 * to canonical E_BUNDLE_* codes from @plugseal/kernel.
 */

/**
 * Internal error codes for crypto operations
 */
export type CryptoErrorCode =
  | 'CRYPTO_INVALID_KEY_FORMAT'
  | 'CRYPTO_INVALID_SIGNATURE_FORMAT'
  | 'CRYPTO_INVALID_KEY_LENGTH'
  | 'CRYPTO_INVALID_SEED_LENGTH'
  | 'CRYPTO_INVALID_COMMENT';

/**
 * Typed error for crypto operations
 *
 * Raised only for structurally invalid input. A well-formed signature that
 * does not verify is reported as `false`, never as a CryptoError.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, message: string) {
    super(message);
    this.name = 'CryptoError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CryptoError.prototype);
  }
}

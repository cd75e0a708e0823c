/**
 * plugseal error codes
 *
 * Canonical E_BUNDLE_* codes raised by the bundle loader. Package-internal
 * codes (such as @plugseal/crypto's CRYPTO_* codes) are mapped onto these
 * before they reach callers.
 */

import type { ErrorDefinition } from './types.js';

/**
 * Error code constants
 */
export const ERROR_CODES = {
  E_BUNDLE_FILE_NOT_FOUND: 'E_BUNDLE_FILE_NOT_FOUND',
  E_BUNDLE_INVALID_FORMAT: 'E_BUNDLE_INVALID_FORMAT',
  E_BUNDLE_PATH_TRAVERSAL: 'E_BUNDLE_PATH_TRAVERSAL',
  E_BUNDLE_SIZE_EXCEEDED: 'E_BUNDLE_SIZE_EXCEEDED',
  E_BUNDLE_MANIFEST_INVALID: 'E_BUNDLE_MANIFEST_INVALID',
  E_BUNDLE_UNSUPPORTED_PLATFORM: 'E_BUNDLE_UNSUPPORTED_PLATFORM',
  E_BUNDLE_VARIANT_NOT_FOUND: 'E_BUNDLE_VARIANT_NOT_FOUND',
  E_BUNDLE_INVALID_VARIANT_NAME: 'E_BUNDLE_INVALID_VARIANT_NAME',
  E_BUNDLE_BRIDGE_MISSING: 'E_BUNDLE_BRIDGE_MISSING',
  E_BUNDLE_SCHEMA_NOT_FOUND: 'E_BUNDLE_SCHEMA_NOT_FOUND',
  E_BUNDLE_CHECKSUM_MISMATCH: 'E_BUNDLE_CHECKSUM_MISMATCH',
  E_BUNDLE_PUBLIC_KEY_MISSING: 'E_BUNDLE_PUBLIC_KEY_MISSING',
  E_BUNDLE_KEY_FORMAT: 'E_BUNDLE_KEY_FORMAT',
  E_BUNDLE_SIGNATURE_FORMAT: 'E_BUNDLE_SIGNATURE_FORMAT',
  E_BUNDLE_SIGNATURE_INVALID: 'E_BUNDLE_SIGNATURE_INVALID',
  E_BUNDLE_DESTINATION_CONFLICT: 'E_BUNDLE_DESTINATION_CONFLICT',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error definitions map
 *
 * Every bundle failure is local and deterministic, so none is retriable:
 * a corrupt manifest or a bad signature does not become valid on retry.
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  E_BUNDLE_FILE_NOT_FOUND: {
    code: 'E_BUNDLE_FILE_NOT_FOUND',
    title: 'File Not Found',
    description: 'Bundle file or a required archive member is absent',
    retriable: false,
    category: 'archive',
  },
  E_BUNDLE_INVALID_FORMAT: {
    code: 'E_BUNDLE_INVALID_FORMAT',
    title: 'Invalid Archive',
    description: 'Bundle is not a readable zip archive',
    retriable: false,
    category: 'archive',
  },
  E_BUNDLE_PATH_TRAVERSAL: {
    code: 'E_BUNDLE_PATH_TRAVERSAL',
    title: 'Unsafe Path',
    description: 'Archive member path escapes the bundle root',
    retriable: false,
    category: 'archive',
  },
  E_BUNDLE_SIZE_EXCEEDED: {
    code: 'E_BUNDLE_SIZE_EXCEEDED',
    title: 'Size Limit Exceeded',
    description: 'Archive entry count or decompressed size exceeds the configured limit',
    retriable: false,
    category: 'archive',
  },
  E_BUNDLE_MANIFEST_INVALID: {
    code: 'E_BUNDLE_MANIFEST_INVALID',
    title: 'Invalid Manifest',
    description: 'manifest.json is malformed or missing a required field',
    retriable: false,
    category: 'manifest',
  },
  E_BUNDLE_UNSUPPORTED_PLATFORM: {
    code: 'E_BUNDLE_UNSUPPORTED_PLATFORM',
    title: 'Unsupported Platform',
    description: 'Host platform key is absent from the manifest platform map',
    retriable: false,
    category: 'resolution',
  },
  E_BUNDLE_VARIANT_NOT_FOUND: {
    code: 'E_BUNDLE_VARIANT_NOT_FOUND',
    title: 'Variant Not Found',
    description: 'Requested or default variant cannot be resolved for the platform',
    retriable: false,
    category: 'resolution',
  },
  E_BUNDLE_INVALID_VARIANT_NAME: {
    code: 'E_BUNDLE_INVALID_VARIANT_NAME',
    title: 'Invalid Variant Name',
    description: 'Variant names must be lowercase alphanumeric with hyphens',
    retriable: false,
    category: 'manifest',
  },
  E_BUNDLE_BRIDGE_MISSING: {
    code: 'E_BUNDLE_BRIDGE_MISSING',
    title: 'Bridge Missing',
    description: 'Bundle does not contain a bridge library',
    retriable: false,
    category: 'resolution',
  },
  E_BUNDLE_SCHEMA_NOT_FOUND: {
    code: 'E_BUNDLE_SCHEMA_NOT_FOUND',
    title: 'Schema Not Found',
    description: 'Named schema is not declared in the manifest',
    retriable: false,
    category: 'resolution',
  },
  E_BUNDLE_CHECKSUM_MISMATCH: {
    code: 'E_BUNDLE_CHECKSUM_MISMATCH',
    title: 'Checksum Mismatch',
    description: 'Computed SHA-256 digest disagrees with the declared checksum',
    retriable: false,
    category: 'integrity',
  },
  E_BUNDLE_PUBLIC_KEY_MISSING: {
    code: 'E_BUNDLE_PUBLIC_KEY_MISSING',
    title: 'Public Key Missing',
    description: 'Signature verification is enabled but no public key is available',
    retriable: false,
    category: 'signature',
  },
  E_BUNDLE_KEY_FORMAT: {
    code: 'E_BUNDLE_KEY_FORMAT',
    title: 'Invalid Public Key',
    description: 'Minisign public key is structurally invalid',
    retriable: false,
    category: 'signature',
  },
  E_BUNDLE_SIGNATURE_FORMAT: {
    code: 'E_BUNDLE_SIGNATURE_FORMAT',
    title: 'Invalid Signature Format',
    description: 'Minisign signature block is structurally invalid',
    retriable: false,
    category: 'signature',
  },
  E_BUNDLE_SIGNATURE_INVALID: {
    code: 'E_BUNDLE_SIGNATURE_INVALID',
    title: 'Signature Verification Failed',
    description: 'Signature does not verify or was made with a different key',
    retriable: false,
    category: 'signature',
  },
  E_BUNDLE_DESTINATION_CONFLICT: {
    code: 'E_BUNDLE_DESTINATION_CONFLICT',
    title: 'Destination Conflict',
    description: 'Target file already exists at the extraction destination',
    retriable: false,
    category: 'destination',
  },
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERRORS, code);
}

/**
 * Get error definition by code
 */
export function getError(code: string): ErrorDefinition | undefined {
  return isErrorCode(code) ? ERRORS[code] : undefined;
}

/**
 * Check if error is retriable
 */
export function isRetriable(code: string): boolean {
  return getError(code)?.retriable ?? false;
}

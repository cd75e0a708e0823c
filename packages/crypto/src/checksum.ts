/**
 * Content checksums
 *
 * Checksums are declared as "sha256:<hex>" (or bare "<hex>" in older
 * manifests) and compared case-insensitively.
 */

import { sha256Hex } from './hash.js';

const SHA256_PREFIX = 'sha256:';

/**
 * Format the checksum of data in the self-describing "sha256:<hex>" form
 */
export function formatChecksum(data: Uint8Array | string): string {
  return `${SHA256_PREFIX}${sha256Hex(data)}`;
}

/**
 * Strip an optional (case-insensitive) "sha256:" prefix and lowercase the digest
 */
export function normalizeChecksum(checksum: string): string {
  const trimmed = checksum.trim();
  const hex = trimmed.toLowerCase().startsWith(SHA256_PREFIX)
    ? trimmed.slice(SHA256_PREFIX.length)
    : trimmed;
  return hex.toLowerCase();
}

/**
 * Verify that the SHA-256 of data matches the expected checksum
 */
export function verifyChecksum(data: Uint8Array, expected: string): boolean {
  return sha256Hex(data) === normalizeChecksum(expected);
}

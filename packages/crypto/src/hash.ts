/**
 * Hash utilities
 *
 * SHA-256 for content checksums and BLAKE2b-512 for minisign prehashing,
 * both from node:crypto.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';

/**
 * Compute SHA-256 of data as a lowercase hex string (64 characters)
 */
export function sha256Hex(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Compute the 64-byte BLAKE2b-512 digest of data
 */
export function blake2b512(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash('blake2b512').update(data).digest());
}

/**
 * Convert Uint8Array to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

/**
 * Convert hex string to Uint8Array
 *
 * @throws Error if the string is not an even-length hex string
 */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error('Invalid hex string');
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

/**
 * Constant-length byte comparison
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * plugseal crypto package
 *
 * SHA-256 checksums, minisign (Ed25519) signature parsing, verification and
 * signing.
 *
 * @packageDocumentation
 */

export * from './base64.js';
export * from './checksum.js';
export * from './errors.js';
export * from './hash.js';
export * from './minisign.js';

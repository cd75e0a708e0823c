/**
 * Minisign signatures over Ed25519
 *
 * Public key:  base64( "Ed" | key id (8) | Ed25519 public key (32) )  = 42 bytes
 * Signature:   untrusted comment line, then
 *              base64( "ED" | key id (8) | Ed25519 signature (64) ) = 74 bytes,
 *              then an optional trusted comment and global signature.
 *
 * "ED" signatures are prehashed: the signed message is BLAKE2b-512(data).
 * "Ed" signatures are legacy and sign the raw data.
 *
 * Verification has two result channels. Structurally invalid keys or
 * signatures throw CryptoError; a well-formed signature that does not verify,
 * including one made by a different key id, resolves to false.
 */

import * as ed25519 from './ed25519.js';
import { base64Decode, base64Encode } from './base64.js';
import { CryptoError } from './errors.js';
import { blake2b512, bytesEqual, bytesToHex } from './hash.js';

const ALG_BYTES = 2;
const KEY_ID_BYTES = 8;
const PUBLIC_KEY_BYTES = 32;
const SECRET_KEY_BYTES = 32;
const SIGNATURE_BYTES = 64;

/** Total decoded length of a minisign public key */
export const MINISIGN_PUBLIC_KEY_LENGTH = ALG_BYTES + KEY_ID_BYTES + PUBLIC_KEY_BYTES;

/** Total decoded length of a minisign signature line */
export const MINISIGN_SIGNATURE_LENGTH = ALG_BYTES + KEY_ID_BYTES + SIGNATURE_BYTES;

/** "Ed": Ed25519 public keys and legacy (non-prehashed) signatures */
const ALG_ED25519 = new Uint8Array([0x45, 0x64]);

/** "ED": prehashed Ed25519 signatures */
const ALG_ED25519_PREHASHED = new Uint8Array([0x45, 0x44]);

const UNTRUSTED_PREFIX = 'untrusted comment:';
const TRUSTED_PREFIX = 'trusted comment: ';

/**
 * Parsed minisign public key
 */
export interface MinisignPublicKey {
  keyId: Uint8Array;
  publicKey: Uint8Array;
}

/**
 * Parsed minisign signature block
 */
export interface MinisignSignature {
  algorithm: 'prehashed' | 'legacy';
  keyId: Uint8Array;
  signature: Uint8Array;
  /** Trusted comment text (line 3), not consumed by verification */
  trustedComment?: string;
  /** Global signature (line 4), not consumed by verification */
  globalSignature?: Uint8Array;
}

/**
 * Key pair used to produce minisign signatures
 */
export interface MinisignKeyPair extends MinisignPublicKey {
  /** Ed25519 secret key (32-byte seed) */
  secretKey: Uint8Array;
}

export interface SignOptions {
  /** Sign BLAKE2b-512(data) with the "ED" tag (default true) */
  prehash?: boolean;
  untrustedComment?: string;
  trustedComment?: string;
}

function describeTag(tag: Uint8Array): string {
  const ascii = /^[\x20-\x7e]{2}$/.test(Buffer.from(tag).toString('latin1'))
    ? ` ("${Buffer.from(tag).toString('latin1')}")`
    : '';
  return `0x${bytesToHex(tag)}${ascii}`;
}

/**
 * Format a key id the way minisign displays it (little-endian u64, upper-case hex)
 */
export function formatKeyId(keyId: Uint8Array): string {
  return bytesToHex(Uint8Array.from(keyId).reverse()).toUpperCase();
}

/**
 * Parse a minisign public key.
 *
 * Accepts the bare base64 key ("RW...") or the contents of a minisign
 * public key file (untrusted comment line followed by the key).
 *
 * @throws CryptoError CRYPTO_INVALID_KEY_FORMAT
 */
export function parsePublicKey(text: string): MinisignPublicKey {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith(UNTRUSTED_PREFIX));

  if (lines.length !== 1) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_FORMAT',
      `Invalid public key: expected a single base64 key line, got ${lines.length}`
    );
  }

  const decoded = base64Decode(lines[0]);
  if (!decoded) {
    throw new CryptoError('CRYPTO_INVALID_KEY_FORMAT', 'Invalid base64 encoding in public key');
  }

  if (decoded.length !== MINISIGN_PUBLIC_KEY_LENGTH) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_FORMAT',
      `Invalid public key length: expected ${MINISIGN_PUBLIC_KEY_LENGTH} bytes, got ${decoded.length}`
    );
  }

  const tag = decoded.subarray(0, ALG_BYTES);
  if (!bytesEqual(tag, ALG_ED25519)) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_FORMAT',
      `Invalid public key algorithm: expected 0x4564 ("Ed"), got ${describeTag(tag)}`
    );
  }

  return {
    keyId: decoded.slice(ALG_BYTES, ALG_BYTES + KEY_ID_BYTES),
    publicKey: decoded.slice(ALG_BYTES + KEY_ID_BYTES),
  };
}

/**
 * Parse a minisign signature block.
 *
 * Line 1 (untrusted comment) is ignored and line 2 carries the signature.
 * Lines 3 and 4 are kept when present but never validated here.
 *
 * @throws CryptoError CRYPTO_INVALID_SIGNATURE_FORMAT
 */
export function parseSignature(text: string): MinisignSignature {
  const lines = text.trim().split(/\r?\n/);
  if (lines.length < 2) {
    throw new CryptoError(
      'CRYPTO_INVALID_SIGNATURE_FORMAT',
      `Invalid signature: expected at least 2 lines, got ${lines.length}`
    );
  }

  const decoded = base64Decode(lines[1].trim());
  if (!decoded) {
    throw new CryptoError('CRYPTO_INVALID_SIGNATURE_FORMAT', 'Invalid base64 encoding in signature');
  }

  if (decoded.length !== MINISIGN_SIGNATURE_LENGTH) {
    throw new CryptoError(
      'CRYPTO_INVALID_SIGNATURE_FORMAT',
      `Invalid signature length: expected ${MINISIGN_SIGNATURE_LENGTH} bytes, got ${decoded.length}`
    );
  }

  const tag = decoded.subarray(0, ALG_BYTES);
  let algorithm: MinisignSignature['algorithm'];
  if (bytesEqual(tag, ALG_ED25519_PREHASHED)) {
    algorithm = 'prehashed';
  } else if (bytesEqual(tag, ALG_ED25519)) {
    algorithm = 'legacy';
  } else {
    throw new CryptoError(
      'CRYPTO_INVALID_SIGNATURE_FORMAT',
      `Invalid signature algorithm: expected 0x4544 ("ED") or 0x4564 ("Ed"), got ${describeTag(tag)}`
    );
  }

  const parsed: MinisignSignature = {
    algorithm,
    keyId: decoded.slice(ALG_BYTES, ALG_BYTES + KEY_ID_BYTES),
    signature: decoded.slice(ALG_BYTES + KEY_ID_BYTES),
  };

  const trustedLine = lines[2]?.trim();
  if (trustedLine?.startsWith(TRUSTED_PREFIX)) {
    parsed.trustedComment = trustedLine.slice(TRUSTED_PREFIX.length);
  }

  const globalSignature = lines[3] ? base64Decode(lines[3].trim()) : null;
  if (globalSignature && globalSignature.length === SIGNATURE_BYTES) {
    parsed.globalSignature = globalSignature;
  }

  return parsed;
}

/**
 * Verify a minisign signature over data.
 *
 * @returns true if the signature verifies; false on key id mismatch or a bad signature
 * @throws CryptoError if the key or signature is malformed
 */
export async function verifySignature(
  data: Uint8Array,
  signature: string | MinisignSignature,
  publicKey: string | MinisignPublicKey
): Promise<boolean> {
  const sig = typeof signature === 'string' ? parseSignature(signature) : signature;
  const key = typeof publicKey === 'string' ? parsePublicKey(publicKey) : publicKey;

  if (!bytesEqual(sig.keyId, key.keyId)) {
    return false;
  }

  const message = sig.algorithm === 'prehashed' ? blake2b512(data) : data;
  return ed25519.verify(sig.signature, message, key.publicKey, { zip215: false });
}

/**
 * Verifier bound to one public key, parsed once
 */
export class MinisignVerifier {
  private readonly key: MinisignPublicKey;

  /**
   * @throws CryptoError CRYPTO_INVALID_KEY_FORMAT
   */
  constructor(publicKey: string | MinisignPublicKey) {
    this.key = typeof publicKey === 'string' ? parsePublicKey(publicKey) : publicKey;
  }

  get keyId(): Uint8Array {
    return this.key.keyId;
  }

  verify(data: Uint8Array, signature: string | MinisignSignature): Promise<boolean> {
    return verifySignature(data, signature, this.key);
  }
}

// ============================================================================
// Signing (bundle tooling)
// ============================================================================

function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Encode a public key in minisign's base64 form
 */
export function formatPublicKey(key: MinisignPublicKey): string {
  if (key.keyId.length !== KEY_ID_BYTES || key.publicKey.length !== PUBLIC_KEY_BYTES) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_LENGTH',
      `Minisign public key needs an ${KEY_ID_BYTES}-byte key id and a ${PUBLIC_KEY_BYTES}-byte key`
    );
  }
  return base64Encode(concatBytes(ALG_ED25519, key.keyId, key.publicKey));
}

/**
 * Encode a public key as the contents of a minisign .pub file
 */
export function formatPublicKeyFile(key: MinisignPublicKey): string {
  return `${UNTRUSTED_PREFIX} minisign public key ${formatKeyId(key.keyId)}\n${formatPublicKey(key)}\n`;
}

/**
 * Generate a random minisign key pair
 */
export async function generateKeyPair(): Promise<MinisignKeyPair> {
  const secretKey = ed25519.randomSecretKey();
  const publicKey = await ed25519.getPublicKey(secretKey);
  const keyId = ed25519.randomSecretKey().slice(0, KEY_ID_BYTES);
  return { keyId, secretKey, publicKey };
}

/** Decoded length of an unencrypted secret key line */
export const SECRET_KEY_FILE_LENGTH = ALG_BYTES + KEY_ID_BYTES + SECRET_KEY_BYTES + PUBLIC_KEY_BYTES;

/**
 * Encode a key pair as an unencrypted secret key file:
 * base64( "Ed" | key id (8) | Ed25519 seed (32) | public key (32) )
 *
 * Unlike minisign's own secret key files, the key is not protected by a
 * password. Keep the file out of bundles and source control.
 */
export function formatSecretKeyFile(keyPair: MinisignKeyPair): string {
  if (
    keyPair.keyId.length !== KEY_ID_BYTES ||
    keyPair.secretKey.length !== SECRET_KEY_BYTES ||
    keyPair.publicKey.length !== PUBLIC_KEY_BYTES
  ) {
    throw new CryptoError('CRYPTO_INVALID_KEY_LENGTH', 'Invalid key pair lengths');
  }
  const encoded = base64Encode(
    concatBytes(ALG_ED25519, keyPair.keyId, keyPair.secretKey, keyPair.publicKey)
  );
  return `${UNTRUSTED_PREFIX} plugseal unencrypted secret key ${formatKeyId(keyPair.keyId)}\n${encoded}\n`;
}

/**
 * Parse a file written by formatSecretKeyFile
 *
 * @throws CryptoError CRYPTO_INVALID_KEY_FORMAT
 */
export async function parseSecretKeyFile(text: string): Promise<MinisignKeyPair> {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith(UNTRUSTED_PREFIX));

  const decoded = lines.length === 1 ? base64Decode(lines[0]) : null;
  if (!decoded || decoded.length !== SECRET_KEY_FILE_LENGTH) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_FORMAT',
      `Invalid secret key: expected one base64 line of ${SECRET_KEY_FILE_LENGTH} bytes`
    );
  }
  if (!bytesEqual(decoded.subarray(0, ALG_BYTES), ALG_ED25519)) {
    throw new CryptoError('CRYPTO_INVALID_KEY_FORMAT', 'Invalid secret key algorithm');
  }

  const seedStart = ALG_BYTES + KEY_ID_BYTES;
  const keyId = decoded.slice(ALG_BYTES, seedStart);
  const secretKey = decoded.slice(seedStart, seedStart + SECRET_KEY_BYTES);
  const publicKey = decoded.slice(seedStart + SECRET_KEY_BYTES);

  if (!bytesEqual(await ed25519.getPublicKey(secretKey), publicKey)) {
    throw new CryptoError('CRYPTO_INVALID_KEY_FORMAT', 'Secret key does not match its public key');
  }
  return { keyId, secretKey, publicKey };
}

/**
 * Produce a four-line minisign signature block over data.
 *
 * The global signature covers the signature bytes followed by the trusted
 * comment, as minisign itself computes it.
 */
export async function signMinisign(
  data: Uint8Array,
  keyPair: MinisignKeyPair,
  options: SignOptions = {}
): Promise<string> {
  if (keyPair.secretKey.length !== SECRET_KEY_BYTES) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_LENGTH',
      `Ed25519 secret key must be ${SECRET_KEY_BYTES} bytes, got ${keyPair.secretKey.length}`
    );
  }
  if (keyPair.keyId.length !== KEY_ID_BYTES) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_LENGTH',
      `Minisign key id must be ${KEY_ID_BYTES} bytes, got ${keyPair.keyId.length}`
    );
  }

  const prehash = options.prehash ?? true;
  const untrustedComment = options.untrustedComment ?? 'signature from plugseal secret key';
  const trustedComment =
    options.trustedComment ?? `timestamp:${Math.floor(Date.now() / 1000)}`;

  if (/[\r\n]/.test(untrustedComment) || /[\r\n]/.test(trustedComment)) {
    throw new CryptoError('CRYPTO_INVALID_COMMENT', 'Signature comments must be a single line');
  }

  const message = prehash ? blake2b512(data) : data;
  const signature = await ed25519.sign(message, keyPair.secretKey);
  const globalSignature = await ed25519.sign(
    concatBytes(signature, new TextEncoder().encode(trustedComment)),
    keyPair.secretKey
  );

  const tag = prehash ? ALG_ED25519_PREHASHED : ALG_ED25519;
  return [
    `${UNTRUSTED_PREFIX} ${untrustedComment}`,
    base64Encode(concatBytes(tag, keyPair.keyId, signature)),
    `${TRUSTED_PREFIX}${trustedComment}`,
    base64Encode(globalSignature),
    '',
  ].join('\n');
}

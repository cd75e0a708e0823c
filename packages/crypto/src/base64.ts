/**
 * Strict base64 (RFC 4648 §4) encoding/decoding
 * Used for minisign keys and signatures
 */

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Encode bytes to padded base64
 */
export function base64Encode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * Decode padded base64, returning null for anything that is not canonical base64.
 *
 * Buffer.from(..., 'base64') silently skips invalid characters, so the input
 * is checked against the alphabet first.
 */
export function base64Decode(str: string): Uint8Array | null {
  if (!BASE64_PATTERN.test(str)) {
    return null;
  }
  return new Uint8Array(Buffer.from(str, 'base64'));
}

/**
 * plugseal crypto test kit
 *
 * Deterministic key material for TEST FIXTURES ONLY. Not exported from the
 * main entry point; import from '@plugseal/crypto/testkit'.
 */

import { getPublicKey } from './ed25519.js';
import { CryptoError } from './errors.js';
import { sha256Hex, hexToBytes } from './hash.js';
import type { MinisignKeyPair } from './minisign.js';

/**
 * Derive a minisign key pair from a deterministic seed.
 *
 * WARNING: seeded keys are predictable. Production code uses generateKeyPair().
 *
 * @param seed - 32-byte Ed25519 seed
 * @param keyId - 8-byte key id; defaults to the first 8 bytes of SHA-256(seed)
 */
export async function generateKeyPairFromSeed(
  seed: Uint8Array,
  keyId?: Uint8Array
): Promise<MinisignKeyPair> {
  if (seed.length !== 32) {
    throw new CryptoError('CRYPTO_INVALID_SEED_LENGTH', 'Ed25519 seed must be 32 bytes');
  }
  if (keyId && keyId.length !== 8) {
    throw new CryptoError('CRYPTO_INVALID_KEY_LENGTH', 'Minisign key id must be 8 bytes');
  }

  const publicKey = await getPublicKey(seed);
  return {
    keyId: keyId ?? hexToBytes(sha256Hex(seed)).slice(0, 8),
    secretKey: seed,
    publicKey,
  };
}

/**
 * Seed derived from a label, e.g. seedFromLabel('plugseal-test-key-001')
 */
export function seedFromLabel(label: string): Uint8Array {
  return hexToBytes(sha256Hex(label));
}

/**
 * Internal Ed25519 wrapper -- async-only surface
 *
 * Only the async methods of @noble/ed25519 are used: they hash with the
 * built-in Web Crypto SHA-512 and need no configuration. All other modules
 * in @plugseal/crypto import from this file, never from '@noble/ed25519'.
 */

import { signAsync, verifyAsync, getPublicKeyAsync, utils } from '@noble/ed25519';

/** Sign a message with Ed25519 */
export const sign = signAsync;

/** Verify an Ed25519 signature */
export const verify = verifyAsync;

/** Derive public key from a 32-byte secret key */
export const getPublicKey = getPublicKeyAsync;

/** Generate a cryptographically random 32-byte secret key */
export const randomSecretKey = utils.randomPrivateKey;

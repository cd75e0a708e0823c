/**
 * Tests for loader configuration, logging and errors
 */

import { describe, it, expect } from 'vitest';
import { ARCHIVE_LIMITS } from '@plugseal/kernel';
import { CryptoError } from '@plugseal/crypto';
import {
  ConfigError,
  LOADER_DEFAULTS,
  resolveLoaderConfig,
  validateConfig,
  verifySignaturesFromEnv,
} from '../src/config.js';
import { BundleError, fromCryptoError, isBundleError } from '../src/errors.js';
import { createLogger, resolveLogLevel, silentLogger } from '../src/logger.js';

describe('resolveLoaderConfig', () => {
  it('should apply defaults', () => {
    expect(resolveLoaderConfig()).toEqual({
      verifySignatures: true,
      publicKeyOverride: undefined,
      platform: undefined,
      limits: ARCHIVE_LIMITS,
    });
    expect(LOADER_DEFAULTS.verifySignatures).toBe(true);
  });

  it('should merge partial limits over the defaults', () => {
    const config = resolveLoaderConfig({ limits: { maxEntries: 5 } });
    expect(config.limits).toEqual({ ...ARCHIVE_LIMITS, maxEntries: 5 });
  });

  it('should keep explicit options', () => {
    const config = resolveLoaderConfig({ verifySignatures: false, platform: 'darwin-aarch64' });
    expect(config.verifySignatures).toBe(false);
    expect(config.platform).toBe('darwin-aarch64');
  });
});

describe('validateConfig', () => {
  it('should list every invalid field', () => {
    try {
      validateConfig({
        publicKeyOverride: 'RWQ=',
        platform: 'linux',
        limits: { maxEntrySize: 0, maxTotalSize: 1.5 },
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.errors.map((e) => e.field)).toEqual([
          'publicKeyOverride',
          'platform',
          'limits.maxEntrySize',
          'limits.maxTotalSize',
        ]);
        expect(err.errors[0].message).toBe('Invalid public key length: expected 42 bytes, got 2');
        expect(err.message).toContain('platform: must be an "<os>-<arch>" key');
      }
    }
  });

  it('should accept an empty configuration', () => {
    expect(() => validateConfig({})).not.toThrow();
  });
});

describe('verifySignaturesFromEnv', () => {
  it.each([
    ['false', false],
    ['0', false],
    [' FALSE ', false],
    ['true', true],
    ['1', true],
  ])('should read %j as %s', (value, expected) => {
    expect(verifySignaturesFromEnv({ PLUGSEAL_VERIFY_SIGNATURES: value })).toBe(expected);
  });

  it('should leave unset or unrecognized values undefined', () => {
    expect(verifySignaturesFromEnv({})).toBeUndefined();
    expect(verifySignaturesFromEnv({ PLUGSEAL_VERIFY_SIGNATURES: 'maybe' })).toBeUndefined();
  });
});

describe('logger', () => {
  it('should resolve the level from option, then environment', () => {
    expect(resolveLogLevel('debug', { LOG_LEVEL: 'warn' })).toBe('debug');
    expect(resolveLogLevel(undefined, { PLUGSEAL_LOG_LEVEL: 'trace', LOG_LEVEL: 'warn' })).toBe('trace');
    expect(resolveLogLevel(undefined, { LOG_LEVEL: 'warn' })).toBe('warn');
    expect(resolveLogLevel(undefined, {})).toBe('info');
  });

  it('should create named loggers at the requested level', () => {
    expect(createLogger({ level: 'error' }).level).toBe('error');
    expect(silentLogger().level).toBe('silent');
  });

  it('should write redacted JSON lines to the destination', () => {
    const lines: string[] = [];
    const logger = createLogger({
      name: 'test',
      level: 'info',
      destination: { write: (line: string) => void lines.push(line) },
    });

    logger.info({ keyPair: { secretKey: 'test-secret' } }, 'hello');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'info',
      name: 'test',
      msg: 'hello',
      keyPair: { secretKey: '[REDACTED]' },
    });
  });
});

describe('BundleError', () => {
  it('should carry code, details and a registry title', () => {
    const err = new BundleError('E_BUNDLE_CHECKSUM_MISMATCH', 'bad checksum', { member: 'lib/a.so' });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('BundleError');
    expect(err.title).toBe('Checksum Mismatch');
    expect(err.toJSON()).toEqual({
      name: 'BundleError',
      code: 'E_BUNDLE_CHECKSUM_MISMATCH',
      message: 'bad checksum',
      details: { member: 'lib/a.so' },
    });
    expect(isBundleError(err, 'E_BUNDLE_CHECKSUM_MISMATCH')).toBe(true);
    expect(isBundleError(err, 'E_BUNDLE_KEY_FORMAT')).toBe(false);
  });

  it('should map crypto format errors to canonical codes', () => {
    const keyErr = fromCryptoError(new CryptoError('CRYPTO_INVALID_KEY_FORMAT', 'bad key'));
    const sigErr = fromCryptoError(new CryptoError('CRYPTO_INVALID_SIGNATURE_FORMAT', 'bad sig'));
    expect(isBundleError(keyErr, 'E_BUNDLE_KEY_FORMAT')).toBe(true);
    expect(isBundleError(sigErr, 'E_BUNDLE_SIGNATURE_FORMAT')).toBe(true);
  });

  it('should pass other errors through', () => {
    const plain = new Error('disk full');
    expect(fromCryptoError(plain)).toBe(plain);
  });
});

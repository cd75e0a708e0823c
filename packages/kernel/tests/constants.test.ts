import { describe, it, expect } from 'vitest';
import { CHECKSUM, DEFAULT_VARIANT, VARIANT_NAME_PATTERN, KNOWN_PLATFORMS } from '../src/constants.js';

describe('constants', () => {
  it('defaults variants to release', () => {
    expect(DEFAULT_VARIANT).toBe('release');
  });

  it('accepts hyphenated lowercase variant names', () => {
    expect(VARIANT_NAME_PATTERN.test('release')).toBe(true);
    expect(VARIANT_NAME_PATTERN.test('debug-asan')).toBe(true);
    expect(VARIANT_NAME_PATTERN.test('Debug')).toBe(false);
    expect(VARIANT_NAME_PATTERN.test('-debug')).toBe(false);
    expect(VARIANT_NAME_PATTERN.test('debug_asan')).toBe(false);
  });

  it('matches prefixed and bare checksums', () => {
    const hex = 'a'.repeat(64);
    expect(CHECKSUM.pattern.test(`sha256:${hex}`)).toBe(true);
    expect(CHECKSUM.hexPattern.test(hex)).toBe(true);
    expect(CHECKSUM.pattern.test(hex)).toBe(false);
  });

  it('lists the six supported host platforms', () => {
    expect(KNOWN_PLATFORMS).toContain('linux-x86_64');
    expect(KNOWN_PLATFORMS).toContain('darwin-aarch64');
    expect(KNOWN_PLATFORMS).toHaveLength(6);
  });
});

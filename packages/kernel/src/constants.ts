/**
 * plugseal bundle constants
 *
 * Normative values shared by the bundle reader, builder and CLI.
 */

import type { ArchiveLimits } from './types.js';

/**
 * Bundle format version written by the builder.
 * Readers accept any non-empty version string.
 */
export const BUNDLE_VERSION = '1.0' as const;

/**
 * Well-known archive member names
 */
export const BUNDLE_MEMBERS = {
  manifest: 'manifest.json',
  manifestSignature: 'manifest.json.minisig',
  /** Suffix appended to an artifact path to locate its signature */
  signatureSuffix: '.minisig',
} as const;

/**
 * Variant used when a platform entry declares no default_variant
 */
export const DEFAULT_VARIANT = 'release' as const;

/**
 * Variant names: lowercase alphanumeric segments joined by hyphens
 */
export const VARIANT_NAME_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

/**
 * Platform keys known to the builder.
 * The loader itself accepts any key and matches it against the host.
 */
export const KNOWN_PLATFORMS = [
  'linux-x86_64',
  'linux-aarch64',
  'darwin-x86_64',
  'darwin-aarch64',
  'windows-x86_64',
  'windows-aarch64',
] as const;

/**
 * Checksum format: self-describing sha256:<64 hex chars>, legacy bare hex accepted on read
 */
export const CHECKSUM = {
  algorithm: 'sha256' as const,
  prefix: 'sha256:' as const,
  pattern: /^sha256:[0-9a-fA-F]{64}$/,
  hexPattern: /^[0-9a-fA-F]{64}$/,
};

/**
 * Default archive limits (DoS protection)
 */
export const ARCHIVE_LIMITS: ArchiveLimits = {
  maxEntries: 10_000,
  maxEntrySize: 256 * 1024 * 1024,
  maxTotalSize: 1024 * 1024 * 1024,
};

/**
 * Prefix of directories created by ephemeral extraction
 */
export const TEMP_DIR_PREFIX = 'plugseal-' as const;

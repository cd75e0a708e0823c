/**
 * Platform and variant resolution
 */

import { DEFAULT_VARIANT, ERROR_CODES } from '@plugseal/kernel';
import { BundleError } from './errors.js';
import type { PlatformEntry } from './manifest.js';

const OS_ALIASES: Record<string, string> = {
  linux: 'linux',
  darwin: 'darwin',
  windows: 'windows',
  win32: 'windows',
};

const ARCH_ALIASES: Record<string, string> = {
  x86_64: 'x86_64',
  amd64: 'x86_64',
  x64: 'x86_64',
  aarch64: 'aarch64',
  arm64: 'aarch64',
};

/**
 * Artifact selected for one platform
 */
export interface ResolvedArtifact {
  variant: string;
  library: string;
  checksum: string;
}

function lookupAlias(map: Record<string, string>, value: string): string {
  const lower = value.toLowerCase();
  return Object.prototype.hasOwnProperty.call(map, lower) ? map[lower] : lower;
}

/**
 * Canonical "<os>-<arch>" key of a host.
 * Unknown OS or architecture names pass through lowercased.
 *
 * @example currentPlatform('win32', 'x64') // 'windows-x86_64'
 */
export function currentPlatform(
  os: string = process.platform,
  arch: string = process.arch
): string {
  return `${lookupAlias(OS_ALIASES, os)}-${lookupAlias(ARCH_ALIASES, arch)}`;
}

/**
 * Variant a platform entry resolves to when none is requested
 */
export function defaultVariant(entry: PlatformEntry): string {
  return entry.default_variant || DEFAULT_VARIANT;
}

/**
 * Select the artifact for a requested (or default) variant
 *
 * @throws BundleError E_BUNDLE_VARIANT_NOT_FOUND
 */
export function resolveVariant(entry: PlatformEntry, requested?: string): ResolvedArtifact {
  const variant = requested ?? defaultVariant(entry);

  if (entry.kind === 'variants') {
    if (!Object.prototype.hasOwnProperty.call(entry.variants, variant)) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_VARIANT_NOT_FOUND,
        `Variant '${variant}' not found; available: ${Object.keys(entry.variants).join(', ') || 'none'}`,
        { variant, available: Object.keys(entry.variants) }
      );
    }
    const { library, checksum } = entry.variants[variant];
    return { variant, library, checksum };
  }

  if (!entry.library || !entry.checksum) {
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_VARIANT_NOT_FOUND,
      `Variant '${variant}' not found: platform entry declares no library`,
      { variant, available: [] }
    );
  }
  return { variant, library: entry.library, checksum: entry.checksum };
}

/**
 * Variant names of a platform entry; a legacy entry lists only its default
 */
export function listVariants(entry: PlatformEntry): string[] {
  return entry.kind === 'variants' ? Object.keys(entry.variants) : [defaultVariant(entry)];
}

/**
 * Every artifact a platform entry declares, one per variant
 */
export function listArtifacts(entry: PlatformEntry): ResolvedArtifact[] {
  if (entry.kind === 'variants') {
    return Object.entries(entry.variants).map(([variant, v]) => ({
      variant,
      library: v.library,
      checksum: v.checksum,
    }));
  }
  return entry.library && entry.checksum
    ? [{ variant: defaultVariant(entry), library: entry.library, checksum: entry.checksum }]
    : [];
}

/**
 * Look up a platform entry by key
 *
 * @throws BundleError E_BUNDLE_UNSUPPORTED_PLATFORM
 */
export function lookupPlatform(
  platforms: Record<string, PlatformEntry>,
  platform: string
): PlatformEntry {
  if (!Object.prototype.hasOwnProperty.call(platforms, platform)) {
    const available = Object.keys(platforms);
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_UNSUPPORTED_PLATFORM,
      `Platform '${platform}' is not supported by this bundle; available: ${available.join(', ') || 'none'}`,
      { platform, available }
    );
  }
  return platforms[platform];
}

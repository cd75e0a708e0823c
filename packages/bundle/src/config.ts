/**
 * Loader Configuration Validation
 *
 * Applies defaults to BundleLoader options and validates them before use.
 *
 * @packageDocumentation
 */

import { ARCHIVE_LIMITS, type ArchiveLimits } from '@plugseal/kernel';
import { parsePublicKey } from '@plugseal/crypto';
import type { Logger } from './logger.js';
import type { LoadStage } from './stages.js';

/**
 * Options accepted by BundleLoader
 */
export interface LoaderOptions {
  /** Verify minisign signatures of the manifest and artifacts (default true) */
  verifySignatures?: boolean;
  /** Trusted public key; overrides the key embedded in the manifest */
  publicKeyOverride?: string;
  /** Platform key to resolve instead of the running host */
  platform?: string;
  /** Archive size limits; missing fields take the kernel defaults */
  limits?: Partial<ArchiveLimits>;
  /** Parent directory of ephemeral extraction directories (default os.tmpdir()) */
  tempDir?: string;
  logger?: Logger;
  /** Observer called on every pipeline stage transition */
  onStage?: (stage: LoadStage, info: StageInfo) => void;
}

/**
 * Context passed to onStage observers
 */
export interface StageInfo {
  bundlePath: string;
  platform?: string;
  variant?: string;
  artifact?: string;
}

/**
 * Fully resolved loader configuration
 */
export interface LoaderConfig {
  verifySignatures: boolean;
  publicKeyOverride?: string;
  platform?: string;
  limits: ArchiveLimits;
  tempDir?: string;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

/**
 * Default configuration values
 */
export const LOADER_DEFAULTS = {
  verifySignatures: true,
  limits: ARCHIVE_LIMITS,
} as const;

/**
 * Configuration validation error
 */
export class ConfigError extends Error {
  readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    const message = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    super(`Invalid loader configuration: ${message}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

function validateLimit(
  field: keyof ArchiveLimits,
  value: number | undefined,
  errors: ConfigValidationError[]
): void {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    errors.push({ field: `limits.${field}`, message: 'must be a positive integer' });
  }
}

/**
 * Validate loader options
 *
 * @throws ConfigError if any option is invalid
 */
export function validateConfig(options: LoaderOptions): void {
  const errors: ConfigValidationError[] = [];

  if (options.verifySignatures !== undefined && typeof options.verifySignatures !== 'boolean') {
    errors.push({ field: 'verifySignatures', message: 'must be a boolean' });
  }

  if (options.publicKeyOverride !== undefined) {
    try {
      parsePublicKey(options.publicKeyOverride);
    } catch (err) {
      errors.push({
        field: 'publicKeyOverride',
        message: err instanceof Error ? err.message : 'must be a minisign public key',
      });
    }
  }

  if (options.platform !== undefined && !/^[^-\s/\\]+-[^\s/\\]+$/.test(options.platform)) {
    errors.push({ field: 'platform', message: 'must be an "<os>-<arch>" key' });
  }

  if (options.tempDir !== undefined && options.tempDir.trim().length === 0) {
    errors.push({ field: 'tempDir', message: 'must be a non-empty path' });
  }

  if (options.limits) {
    validateLimit('maxEntries', options.limits.maxEntries, errors);
    validateLimit('maxEntrySize', options.limits.maxEntrySize, errors);
    validateLimit('maxTotalSize', options.limits.maxTotalSize, errors);
  }

  if (options.onStage !== undefined && typeof options.onStage !== 'function') {
    errors.push({ field: 'onStage', message: 'must be a function' });
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

/**
 * Validate options and apply defaults
 */
export function resolveLoaderConfig(options: LoaderOptions = {}): LoaderConfig {
  validateConfig(options);
  return {
    verifySignatures: options.verifySignatures ?? LOADER_DEFAULTS.verifySignatures,
    publicKeyOverride: options.publicKeyOverride,
    platform: options.platform,
    limits: {
      maxEntries: options.limits?.maxEntries ?? LOADER_DEFAULTS.limits.maxEntries,
      maxEntrySize: options.limits?.maxEntrySize ?? LOADER_DEFAULTS.limits.maxEntrySize,
      maxTotalSize: options.limits?.maxTotalSize ?? LOADER_DEFAULTS.limits.maxTotalSize,
    },
    tempDir: options.tempDir,
  };
}

/**
 * Read PLUGSEAL_VERIFY_SIGNATURES from the environment.
 * "false" or "0" disables verification and "true" or "1" enables it;
 * any other value is ignored.
 */
export function verifySignaturesFromEnv(env: NodeJS.ProcessEnv = process.env): boolean | undefined {
  const value = env.PLUGSEAL_VERIFY_SIGNATURES?.trim().toLowerCase();
  if (value === 'false' || value === '0') return false;
  if (value === 'true' || value === '1') return true;
  return undefined;
}

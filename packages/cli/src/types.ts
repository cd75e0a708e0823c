/**
 * Types for the plugseal CLI
 */

import type { BuildInfo, VerificationReport } from '@plugseal/bundle';

export interface CLIOptions {
  json?: boolean;
  /** Log level for the loader's pino logger (logs go to stderr) */
  logLevel?: string;
}

/**
 * Options shared by commands that verify bundles
 */
export interface TrustOptions extends CLIOptions {
  /** Trusted public key (base64), overriding the manifest key */
  key?: string;
  /** Path to a minisign public key file */
  keyFile?: string;
  /** false to skip signature verification; unset reads PLUGSEAL_VERIFY_SIGNATURES */
  verify?: boolean;
  /** Platform key instead of the running host */
  platform?: string;
}

export interface Timing {
  started: number;
  completed: number;
  duration: number;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  /** Canonical error code when the failure came from a BundleError */
  code?: string;
  timing?: Timing;
}

export interface InfoResult {
  bundle: string;
  bundle_version: string;
  plugin: {
    name: string;
    version: string;
    description?: string;
    authors: string[];
  };
  signed: boolean;
  platforms: Array<{ platform: string; variants: string[]; default_variant: string }>;
  bridges: string[];
  schemas: string[];
  build_info?: BuildInfo;
  files: number;
}

export interface VariantsResult {
  platform: string;
  variants: string[];
  default_variant: string;
}

export type VerifyResult = VerificationReport;

export interface ExtractResult {
  path: string;
  kind: 'library' | 'bridge';
  platform: string;
  variant?: string;
  verified: boolean;
}

export type SchemaResult =
  | { action: 'list'; schemas: Array<{ name: string; path: string; format?: string }> }
  | { action: 'read'; name: string; content: string }
  | { action: 'extract'; name: string; path: string };

export interface KeygenResult {
  key_id: string;
  public_key: string;
  public_key_file: string;
  secret_key_file: string;
}

export interface SignResult {
  file: string;
  signature_file: string;
  key_id: string;
}

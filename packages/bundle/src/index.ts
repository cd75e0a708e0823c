/**
 * plugseal bundle package
 *
 * Reading, verifying, extracting and building plugin bundles.
 *
 * @packageDocumentation
 */

export { BundleArchive, isPathSafe } from './archive.js';
export { BundleBuilder, detectSchemaFormat } from './builder.js';
export type { BundleBuilderOptions, PluginMetadata, SchemaOptions } from './builder.js';
export {
  ConfigError,
  LOADER_DEFAULTS,
  resolveLoaderConfig,
  validateConfig,
  verifySignaturesFromEnv,
} from './config.js';
export type {
  ConfigValidationError,
  LoaderConfig,
  LoaderOptions,
  StageInfo,
} from './config.js';
export { BundleError, fromCryptoError, isBundleError } from './errors.js';
export { BundleLoader } from './loader.js';
export type { ArtifactReport, ExtractOptions, VerificationReport } from './loader.js';
export { createLogger, resolveLogLevel, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export {
  ManifestSchema,
  PlatformEntrySchema,
  SchemaEntrySchema,
  VariantEntrySchema,
  collectManifestIssues,
  parseManifest,
  serializeManifest,
  validateManifest,
} from './manifest.js';
export type {
  ApiInfo,
  BuildInfo,
  LegacyPlatformEntry,
  Manifest,
  ManifestInput,
  ManifestIssue,
  PlatformEntry,
  PluginInfo,
  Sbom,
  SchemaEntry,
  VariantEntry,
  VariantPlatformEntry,
} from './manifest.js';
export {
  currentPlatform,
  defaultVariant,
  listArtifacts,
  listVariants,
  lookupPlatform,
  resolveVariant,
} from './platform.js';
export type { ResolvedArtifact } from './platform.js';
export { LOAD_STAGES, canTransition } from './stages.js';
export type { LoadStage } from './stages.js';

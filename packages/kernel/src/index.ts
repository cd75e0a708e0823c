/**
 * plugseal kernel
 * Normative constants and error codes for plugin bundles
 *
 * @packageDocumentation
 */

export type { ErrorDefinition, ArchiveLimits } from './types.js';

export {
  BUNDLE_VERSION,
  BUNDLE_MEMBERS,
  DEFAULT_VARIANT,
  VARIANT_NAME_PATTERN,
  KNOWN_PLATFORMS,
  CHECKSUM,
  ARCHIVE_LIMITS,
  TEMP_DIR_PREFIX,
} from './constants.js';

export { ERROR_CODES, ERRORS, getError, isRetriable, type ErrorCode } from './errors.js';

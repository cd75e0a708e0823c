/**
 * Bundle manifest parsing
 *
 * manifest.json uses snake_case wire names, which are kept as-is on the
 * parsed object. Platform entries are normalized into a tagged union:
 * `variants` whenever a variants key is present, `legacy` otherwise.
 */

import { z, ZodError } from 'zod';
import {
  CHECKSUM,
  ERROR_CODES,
  KNOWN_PLATFORMS,
  VARIANT_NAME_PATTERN,
} from '@plugseal/kernel';
import { BundleError } from './errors.js';

// ============================================================================
// Schemas
// ============================================================================

export const VariantEntrySchema = z.object({
  library: z.string(),
  checksum: z.string(),
  build: z.record(z.unknown()).optional(),
});

export type VariantEntry = z.infer<typeof VariantEntrySchema>;

/**
 * Platform entry with one or more named build variants
 */
export interface VariantPlatformEntry {
  kind: 'variants';
  default_variant?: string;
  variants: Record<string, VariantEntry>;
  /** Flat fields some writers keep alongside variants; never used for resolution */
  library?: string;
  checksum?: string;
}

/**
 * Platform entry with a single flat artifact
 */
export interface LegacyPlatformEntry {
  kind: 'legacy';
  default_variant?: string;
  library?: string;
  checksum?: string;
}

export type PlatformEntry = VariantPlatformEntry | LegacyPlatformEntry;

const RawPlatformEntrySchema = z.object({
  library: z.string().optional(),
  checksum: z.string().optional(),
  default_variant: z.string().optional(),
  variants: z.record(VariantEntrySchema).optional(),
});

export const PlatformEntrySchema = RawPlatformEntrySchema.transform(
  (raw): PlatformEntry => {
    if (raw.variants !== undefined) {
      return {
        kind: 'variants',
        default_variant: raw.default_variant,
        variants: raw.variants,
        library: raw.library,
        checksum: raw.checksum,
      };
    }
    return {
      kind: 'legacy',
      default_variant: raw.default_variant,
      library: raw.library,
      checksum: raw.checksum,
    };
  }
);

export const SchemaEntrySchema = z.object({
  path: z.string(),
  checksum: z.string(),
  format: z.string().optional(),
  description: z.string().optional(),
});

export type SchemaEntry = z.infer<typeof SchemaEntrySchema>;

export const PluginInfoSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().optional(),
  authors: z.array(z.string()).default([]),
  license: z.string().optional(),
  repository: z.string().optional(),
});

export type PluginInfo = z.infer<typeof PluginInfoSchema>;

export const ApiMessageSchema = z.object({
  type_tag: z.string(),
  description: z.string().optional(),
  request_schema: z.string().optional(),
  response_schema: z.string().optional(),
  message_id: z.number().int().nonnegative().optional(),
  cstruct_request: z.string().optional(),
  cstruct_response: z.string().optional(),
});

export const ApiInfoSchema = z.object({
  min_version: z.string().optional(),
  transports: z.array(z.string()).default([]),
  messages: z.array(ApiMessageSchema).default([]),
});

export type ApiInfo = z.infer<typeof ApiInfoSchema>;

export const GitInfoSchema = z.object({
  commit: z.string(),
  branch: z.string().optional(),
  tag: z.string().optional(),
  dirty: z.boolean().optional(),
});

export const BuildInfoSchema = z.object({
  built_by: z.string().optional(),
  built_at: z.string().optional(),
  host: z.string().optional(),
  compiler: z.string().optional(),
  tool_version: z.string().optional(),
  git: GitInfoSchema.optional(),
});

export type BuildInfo = z.infer<typeof BuildInfoSchema>;

export const SbomSchema = z.object({
  cyclonedx: z.string().optional(),
  spdx: z.string().optional(),
});

export type Sbom = z.infer<typeof SbomSchema>;

export const BridgesSchema = z.object({
  jni: z.record(PlatformEntrySchema).default({}),
});

export const ManifestSchema = z.object({
  bundle_version: z.string().min(1),
  plugin: PluginInfoSchema,
  public_key: z.string().optional(),
  platforms: z.record(PlatformEntrySchema),
  schemas: z.record(SchemaEntrySchema).default({}),
  api: ApiInfoSchema.optional(),
  build_info: BuildInfoSchema.optional(),
  sbom: SbomSchema.optional(),
  schema_checksum: z.string().optional(),
  notices: z.string().optional(),
  bridges: BridgesSchema.optional(),
});

export type Manifest = z.infer<typeof ManifestSchema>;

/** Manifest as written by hand or by the builder, before defaults apply */
export type ManifestInput = z.input<typeof ManifestSchema>;

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.length > 0;
}

/**
 * First missing required field, in a fixed order
 */
function findMissingField(raw: Record<string, unknown>): string | undefined {
  if (!isNonEmptyString(raw.bundle_version)) return 'bundle_version';
  const plugin = raw.plugin;
  if (!isRecord(plugin) || !isNonEmptyString(plugin.name)) return 'plugin.name';
  if (!isNonEmptyString(plugin.version)) return 'plugin.version';
  return undefined;
}

function formatIssues(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Parse manifest.json bytes or text
 *
 * @throws BundleError E_BUNDLE_MANIFEST_INVALID
 */
export function parseManifest(input: Uint8Array | string): Manifest {
  const text = typeof input === 'string' ? input : Buffer.from(input).toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_MANIFEST_INVALID,
      `Manifest is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { reason: 'malformed' }
    );
  }

  if (!isRecord(raw)) {
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_MANIFEST_INVALID,
      'Manifest must be a JSON object',
      { reason: 'malformed' }
    );
  }

  const missing = findMissingField(raw);
  if (missing) {
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_MANIFEST_INVALID,
      `Manifest is missing required field: ${missing}`,
      { reason: 'missing_field', field: missing }
    );
  }

  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_MANIFEST_INVALID,
      `Manifest validation failed: ${formatIssues(result.error)}`,
      {
        reason: 'invalid',
        field: first ? first.path.join('.') : undefined,
        issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      }
    );
  }
  return result.data;
}

// ============================================================================
// Serialization
// ============================================================================

function platformEntryToWire(entry: PlatformEntry): Record<string, unknown> {
  const wire: Record<string, unknown> = {};
  if (entry.library !== undefined) wire.library = entry.library;
  if (entry.checksum !== undefined) wire.checksum = entry.checksum;
  if (entry.default_variant !== undefined) wire.default_variant = entry.default_variant;
  if (entry.kind === 'variants') wire.variants = entry.variants;
  return wire;
}

function platformMapToWire(map: Record<string, PlatformEntry>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(map)) {
    out[key] = platformEntryToWire(entry);
  }
  return out;
}

/**
 * Serialize a manifest to pretty JSON in wire form.
 * The output parses back to an equal manifest.
 */
export function serializeManifest(manifest: Manifest): string {
  const { platforms, bridges, ...rest } = manifest;
  const wire: Record<string, unknown> = {
    ...rest,
    platforms: platformMapToWire(platforms),
  };
  if (bridges) {
    wire.bridges = { jni: platformMapToWire(bridges.jni) };
  }
  return JSON.stringify(wire, null, 2);
}

// ============================================================================
// Builder-side validation
// ============================================================================

export interface ManifestIssue {
  field: string;
  message: string;
}

function isKnownPlatform(key: string): boolean {
  return KNOWN_PLATFORMS.some((p) => p === key);
}

function checkArtifact(
  field: string,
  library: string | undefined,
  checksum: string | undefined,
  issues: ManifestIssue[]
): void {
  if (!library) {
    issues.push({ field: `${field}.library`, message: 'library path is required' });
  }
  if (!checksum) {
    issues.push({ field: `${field}.checksum`, message: 'checksum is required' });
  } else if (!CHECKSUM.pattern.test(checksum)) {
    issues.push({
      field: `${field}.checksum`,
      message: `checksum must be '${CHECKSUM.prefix}' followed by 64 hex characters`,
    });
  }
}

function checkPlatformMap(
  prefix: string,
  map: Record<string, PlatformEntry>,
  issues: ManifestIssue[]
): void {
  for (const [key, entry] of Object.entries(map)) {
    const field = `${prefix}.${key}`;
    if (!isKnownPlatform(key)) {
      issues.push({ field, message: `unknown platform: ${key}` });
    }
    if (entry.kind === 'legacy') {
      checkArtifact(field, entry.library, entry.checksum, issues);
      continue;
    }
    for (const [name, variant] of Object.entries(entry.variants)) {
      if (!VARIANT_NAME_PATTERN.test(name)) {
        issues.push({ field: `${field}.variants.${name}`, message: `invalid variant name: ${name}` });
      }
      checkArtifact(`${field}.variants.${name}`, variant.library, variant.checksum, issues);
    }
    if (
      entry.default_variant !== undefined &&
      !Object.prototype.hasOwnProperty.call(entry.variants, entry.default_variant)
    ) {
      issues.push({
        field: `${field}.default_variant`,
        message: `default variant '${entry.default_variant}' is not defined`,
      });
    }
  }
}

/**
 * Collect strict validation issues of a manifest about to be published
 */
export function collectManifestIssues(manifest: Manifest): ManifestIssue[] {
  const issues: ManifestIssue[] = [];

  if (!manifest.plugin.name) {
    issues.push({ field: 'plugin.name', message: 'plugin.name is required' });
  }
  if (!manifest.plugin.version) {
    issues.push({ field: 'plugin.version', message: 'plugin.version is required' });
  }
  if (Object.keys(manifest.platforms).length === 0) {
    issues.push({ field: 'platforms', message: 'at least one platform must be defined' });
  }

  checkPlatformMap('platforms', manifest.platforms, issues);
  if (manifest.bridges) {
    checkPlatformMap('bridges.jni', manifest.bridges.jni, issues);
  }

  for (const [name, schema] of Object.entries(manifest.schemas)) {
    if (!schema.path) {
      issues.push({ field: `schemas.${name}.path`, message: 'schema path is required' });
    }
    if (!CHECKSUM.pattern.test(schema.checksum)) {
      issues.push({
        field: `schemas.${name}.checksum`,
        message: `checksum must be '${CHECKSUM.prefix}' followed by 64 hex characters`,
      });
    }
  }

  return issues;
}

/**
 * Validate a manifest strictly before it is written into a bundle
 *
 * @throws BundleError E_BUNDLE_MANIFEST_INVALID listing every issue
 */
export function validateManifest(manifest: Manifest): void {
  const issues = collectManifestIssues(manifest);
  if (issues.length > 0) {
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_MANIFEST_INVALID,
      `Manifest validation failed: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`,
      { reason: 'invalid', field: issues[0].field, issues }
    );
  }
}

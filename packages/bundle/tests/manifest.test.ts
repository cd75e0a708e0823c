/**
 * Tests for manifest parsing, serialization and validation
 */

import { describe, it, expect } from 'vitest';
import { BundleError } from '../src/errors.js';
import {
  collectManifestIssues,
  parseManifest,
  serializeManifest,
  validateManifest,
  type Manifest,
} from '../src/manifest.js';
import { resolveVariant } from '../src/platform.js';

const CHECKSUM_A = `sha256:${'a'.repeat(64)}`;
const CHECKSUM_B = `sha256:${'b'.repeat(64)}`;

function minimal(extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    bundle_version: '1.0',
    plugin: { name: 'example', version: '1.2.3' },
    platforms: {},
    ...extra,
  });
}

function expectManifestError(input: string): BundleError {
  try {
    parseManifest(input);
  } catch (err) {
    expect(err).toBeInstanceOf(BundleError);
    if (err instanceof BundleError) {
      expect(err.code).toBe('E_BUNDLE_MANIFEST_INVALID');
      return err;
    }
  }
  throw new Error('expected parseManifest to throw');
}

describe('parseManifest', () => {
  it('should parse a minimal manifest and default optional sections', () => {
    const manifest = parseManifest(minimal());
    expect(manifest.bundle_version).toBe('1.0');
    expect(manifest.plugin).toEqual({ name: 'example', version: '1.2.3', authors: [] });
    expect(manifest.platforms).toEqual({});
    expect(manifest.schemas).toEqual({});
    expect(manifest.public_key).toBeUndefined();
    expect(manifest.bridges).toBeUndefined();
  });

  it('should accept bytes', () => {
    const manifest = parseManifest(new TextEncoder().encode(minimal()));
    expect(manifest.plugin.name).toBe('example');
  });

  it('should ignore unknown keys', () => {
    const manifest = parseManifest(minimal({ future_field: { nested: true } }));
    expect(Object.keys(manifest)).not.toContain('future_field');
  });

  it('should parse a legacy flat platform entry', () => {
    const manifest = parseManifest(
      minimal({ platforms: { 'linux-x86_64': { library: 'lib/libexample.so', checksum: CHECKSUM_A } } })
    );
    expect(manifest.platforms['linux-x86_64']).toEqual({
      kind: 'legacy',
      library: 'lib/libexample.so',
      checksum: CHECKSUM_A,
    });
  });

  it('should parse a variants platform entry', () => {
    const manifest = parseManifest(
      minimal({
        platforms: {
          'darwin-aarch64': {
            default_variant: 'debug',
            variants: {
              release: { library: 'lib/release/libexample.dylib', checksum: CHECKSUM_A },
              debug: { library: 'lib/debug/libexample.dylib', checksum: CHECKSUM_B, build: { opt: 0 } },
            },
          },
        },
      })
    );
    const entry = manifest.platforms['darwin-aarch64'];
    expect(entry.kind).toBe('variants');
    if (entry.kind === 'variants') {
      expect(entry.default_variant).toBe('debug');
      expect(Object.keys(entry.variants)).toEqual(['release', 'debug']);
      expect(entry.variants.debug.build).toEqual({ opt: 0 });
    }
  });

  it('should treat an empty variants map as variant-aware', () => {
    const manifest = parseManifest(
      minimal({
        platforms: { 'linux-x86_64': { library: 'lib/a.so', checksum: CHECKSUM_A, variants: {} } },
      })
    );
    const entry = manifest.platforms['linux-x86_64'];
    expect(entry.kind).toBe('variants');
    try {
      resolveVariant(entry);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BundleError);
      if (err instanceof BundleError) {
        expect(err.code).toBe('E_BUNDLE_VARIANT_NOT_FOUND');
        expect(err.message).toBe("Variant 'release' not found; available: none");
      }
    }
  });

  it('should parse bridges, schemas, api, build info and sbom', () => {
    const manifest = parseManifest(
      minimal({
        public_key: 'RWQ-placeholder',
        bridges: { jni: { 'linux-x86_64': { library: 'bridge/libjni.so', checksum: CHECKSUM_A } } },
        schemas: { messages: { path: 'schema/messages.json', checksum: CHECKSUM_B, format: 'json-schema' } },
        api: { min_version: '0.5.0', messages: [{ type_tag: 'echo', message_id: 1 }] },
        build_info: { built_by: 'ci', git: { commit: 'abc123', dirty: false } },
        sbom: { cyclonedx: 'sbom/bom.cdx.json' },
        schema_checksum: CHECKSUM_B,
        notices: 'docs/NOTICES.txt',
      })
    );

    expect(manifest.public_key).toBe('RWQ-placeholder');
    expect(manifest.bridges?.jni['linux-x86_64'].library).toBe('bridge/libjni.so');
    expect(manifest.schemas.messages.format).toBe('json-schema');
    expect(manifest.api).toEqual({
      min_version: '0.5.0',
      transports: [],
      messages: [{ type_tag: 'echo', message_id: 1 }],
    });
    expect(manifest.build_info?.git).toEqual({ commit: 'abc123', dirty: false });
    expect(manifest.sbom).toEqual({ cyclonedx: 'sbom/bom.cdx.json' });
    expect(manifest.notices).toBe('docs/NOTICES.txt');
  });

  it('should report malformed JSON', () => {
    const err = expectManifestError('{"bundle_version": ');
    expect(err.details.reason).toBe('malformed');
  });

  it('should reject a non-object document', () => {
    const err = expectManifestError('[1, 2]');
    expect(err.message).toBe('Manifest must be a JSON object');
  });

  it('should name missing required fields in order', () => {
    expect(expectManifestError('{}').details.field).toBe('bundle_version');
    expect(expectManifestError('{"bundle_version":"1.0"}').details.field).toBe('plugin.name');
    expect(
      expectManifestError('{"bundle_version":"1.0","plugin":{"name":"example"}}').details.field
    ).toBe('plugin.version');
  });

  it('should treat empty required strings as missing', () => {
    const err = expectManifestError(
      JSON.stringify({ bundle_version: '1.0', plugin: { name: '', version: '1.0.0' }, platforms: {} })
    );
    expect(err.message).toBe('Manifest is missing required field: plugin.name');
  });

  it('should report structural problems with their path', () => {
    const err = expectManifestError(
      minimal({ platforms: { 'linux-x86_64': { variants: { release: { library: 1 } } } } })
    );
    expect(err.details.reason).toBe('invalid');
    expect(err.details.field).toBe('platforms.linux-x86_64.variants.release.library');
  });

  it('should require the platforms key', () => {
    const err = expectManifestError(
      JSON.stringify({ bundle_version: '1.0', plugin: { name: 'example', version: '1.0.0' } })
    );
    expect(err.details.field).toBe('platforms');
  });
});

describe('serializeManifest', () => {
  it('should round-trip through parseManifest', () => {
    const original = parseManifest(
      minimal({
        platforms: {
          'linux-x86_64': { library: 'lib/a.so', checksum: CHECKSUM_A },
          'windows-x86_64': {
            default_variant: 'release',
            variants: { release: { library: 'lib/a.dll', checksum: CHECKSUM_B } },
          },
        },
        bridges: { jni: { 'linux-x86_64': { library: 'bridge/b.so', checksum: CHECKSUM_B } } },
      })
    );
    expect(parseManifest(serializeManifest(original))).toEqual(original);
  });

  it('should write wire field names without the internal kind tag', () => {
    const manifest = parseManifest(
      minimal({ platforms: { 'linux-x86_64': { library: 'lib/a.so', checksum: CHECKSUM_A } } })
    );
    const wire = JSON.parse(serializeManifest(manifest));
    expect(wire.platforms['linux-x86_64']).toEqual({ library: 'lib/a.so', checksum: CHECKSUM_A });
  });
});

describe('validateManifest', () => {
  function manifestWith(platforms: Record<string, unknown>): Manifest {
    return parseManifest(minimal({ platforms }));
  }

  it('should accept a well-formed manifest', () => {
    expect(() =>
      validateManifest(manifestWith({ 'linux-x86_64': { library: 'lib/a.so', checksum: CHECKSUM_A } }))
    ).not.toThrow();
  });

  it('should require at least one platform', () => {
    expect(collectManifestIssues(manifestWith({}))).toEqual([
      { field: 'platforms', message: 'at least one platform must be defined' },
    ]);
  });

  it('should reject unknown platform keys', () => {
    const issues = collectManifestIssues(
      manifestWith({ 'plan9-mips': { library: 'lib/a.so', checksum: CHECKSUM_A } })
    );
    expect(issues).toEqual([{ field: 'platforms.plan9-mips', message: 'unknown platform: plan9-mips' }]);
  });

  it('should require the sha256: prefix on checksums', () => {
    const issues = collectManifestIssues(
      manifestWith({ 'linux-x86_64': { library: 'lib/a.so', checksum: 'a'.repeat(64) } })
    );
    expect(issues).toEqual([
      {
        field: 'platforms.linux-x86_64.checksum',
        message: "checksum must be 'sha256:' followed by 64 hex characters",
      },
    ]);
  });

  it('should flag a default variant that is not defined', () => {
    const issues = collectManifestIssues(
      manifestWith({
        'linux-x86_64': {
          default_variant: 'debug',
          variants: { release: { library: 'lib/a.so', checksum: CHECKSUM_A } },
        },
      })
    );
    expect(issues).toEqual([
      {
        field: 'platforms.linux-x86_64.default_variant',
        message: "default variant 'debug' is not defined",
      },
    ]);
  });

  it('should throw one error listing every issue', () => {
    const manifest = manifestWith({ 'linux-x86_64': { library: '', checksum: 'bad' } });
    try {
      validateManifest(manifest);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BundleError);
      if (err instanceof BundleError) {
        expect(err.code).toBe('E_BUNDLE_MANIFEST_INVALID');
        expect(err.details.field).toBe('platforms.linux-x86_64.library');
        expect(err.details.issues).toHaveLength(2);
      }
    }
  });
});

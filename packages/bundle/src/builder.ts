/**
 * Bundle builder
 *
 * Assembles a bundle zip in memory: manifest.json first, then the manifest
 * signature, then every member in insertion order with a `.minisig` beside
 * each library when a signing key is set.
 */

import { writeFile } from 'node:fs/promises';
import { posix as pathPosix } from 'node:path';
import * as yazl from 'yazl';
import {
  BUNDLE_MEMBERS,
  BUNDLE_VERSION,
  ERROR_CODES,
  VARIANT_NAME_PATTERN,
} from '@plugseal/kernel';
import {
  formatChecksum,
  formatPublicKey,
  signMinisign,
  type MinisignKeyPair,
} from '@plugseal/crypto';
import { isPathSafe } from './archive.js';
import { BundleError } from './errors.js';
import {
  serializeManifest,
  validateManifest,
  type ApiInfo,
  type BuildInfo,
  type Manifest,
  type PlatformEntry,
  type PluginInfo,
  type Sbom,
  type SchemaEntry,
  type VariantEntry,
} from './manifest.js';

/** Default mtime for every member, so identical inputs give identical zips */
const DEFAULT_MTIME = new Date('2000-01-01T00:00:00Z');

export interface BundleBuilderOptions {
  /** Modification time stamped on every member (default 2000-01-01T00:00:00Z) */
  mtime?: Date;
  /** bundle_version written to the manifest (default BUNDLE_VERSION) */
  bundleVersion?: string;
}

export interface SchemaOptions {
  format?: string;
  description?: string;
}

/**
 * Plugin metadata accepted by the builder; authors default to []
 */
export type PluginMetadata = Omit<PluginInfo, 'authors'> & { authors?: string[] };

/**
 * Schema format from a file extension
 */
export function detectSchemaFormat(fileName: string): string {
  const ext = pathPosix.extname(fileName).toLowerCase();
  if (ext === '.h' || ext === '.hpp') return 'c-header';
  if (ext === '.json') return 'json-schema';
  return 'unknown';
}

function assertSafePath(archivePath: string): void {
  if (!isPathSafe(archivePath) || archivePath.endsWith('/')) {
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_PATH_TRAVERSAL,
      `Unsafe archive path: ${archivePath}`,
      { entry: archivePath }
    );
  }
}

function assertVariantName(variant: string): void {
  if (!VARIANT_NAME_PATTERN.test(variant)) {
    throw new BundleError(
      ERROR_CODES.E_BUNDLE_INVALID_VARIANT_NAME,
      `Invalid variant name '${variant}': use lowercase letters, digits and single hyphens`,
      { variant }
    );
  }
}

/**
 * Builds plugin bundles
 *
 * @example
 * ```typescript
 * const zip = await new BundleBuilder({ name: 'example', version: '1.0.0' })
 *   .addLibrary('linux-x86_64', 'lib/linux-x86_64/libexample.so', bytes)
 *   .withSigningKey(keyPair)
 *   .build();
 * ```
 */
export class BundleBuilder {
  private readonly plugin: PluginInfo;
  private readonly mtime: Date;
  private readonly bundleVersion: string;
  private readonly files = new Map<string, Buffer>();
  private readonly signedPaths = new Set<string>();
  private readonly platforms: Record<string, PlatformEntry> = {};
  private readonly bridges: Record<string, PlatformEntry> = {};
  private readonly schemas: Record<string, SchemaEntry> = {};
  private api?: ApiInfo;
  private buildInfo?: BuildInfo;
  private sbom?: Sbom;
  private notices?: string;
  private publicKey?: string;
  private signingKey?: MinisignKeyPair;

  constructor(plugin: PluginMetadata, options: BundleBuilderOptions = {}) {
    this.plugin = { ...plugin, authors: plugin.authors ?? [] };
    this.mtime = options.mtime ?? DEFAULT_MTIME;
    this.bundleVersion = options.bundleVersion ?? BUNDLE_VERSION;
  }

  /**
   * Add a library as the platform's single flat artifact
   */
  addLibrary(platform: string, archivePath: string, contents: Uint8Array): this {
    this.putFile(archivePath, contents, true);
    const existing = this.platforms[platform];
    const checksum = formatChecksum(contents);
    this.platforms[platform] =
      existing?.kind === 'variants'
        ? { ...existing, library: archivePath, checksum }
        : { kind: 'legacy', default_variant: existing?.default_variant, library: archivePath, checksum };
    return this;
  }

  /**
   * Add a named build variant of a platform's library
   *
   * @throws BundleError E_BUNDLE_INVALID_VARIANT_NAME
   */
  addLibraryVariant(
    platform: string,
    variant: string,
    archivePath: string,
    contents: Uint8Array,
    build?: Record<string, unknown>
  ): this {
    assertVariantName(variant);
    this.putFile(archivePath, contents, true);

    const existing = this.platforms[platform];
    const variants: Record<string, VariantEntry> =
      existing?.kind === 'variants' ? { ...existing.variants } : {};
    variants[variant] = { library: archivePath, checksum: formatChecksum(contents), build };

    this.platforms[platform] = {
      kind: 'variants',
      default_variant: existing?.default_variant,
      variants,
      library: existing?.library,
      checksum: existing?.checksum,
    };
    return this;
  }

  /**
   * Set the variant a platform resolves to when none is requested
   */
  withDefaultVariant(platform: string, variant: string): this {
    assertVariantName(variant);
    const existing = this.platforms[platform];
    if (!existing) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_UNSUPPORTED_PLATFORM,
        `No library added for platform '${platform}'`,
        { platform }
      );
    }
    this.platforms[platform] = { ...existing, default_variant: variant };
    return this;
  }

  /**
   * Add a JNI bridge library for a platform
   */
  addBridge(platform: string, archivePath: string, contents: Uint8Array): this {
    this.putFile(archivePath, contents, true);
    this.bridges[platform] = {
      kind: 'legacy',
      library: archivePath,
      checksum: formatChecksum(contents),
    };
    return this;
  }

  /**
   * Add a schema file; its format is detected from the extension unless given
   */
  addSchema(name: string, archivePath: string, contents: Uint8Array, options: SchemaOptions = {}): this {
    this.putFile(archivePath, contents, false);
    this.schemas[name] = {
      path: archivePath,
      checksum: formatChecksum(contents),
      format: options.format ?? detectSchemaFormat(archivePath),
      description: options.description,
    };
    return this;
  }

  /**
   * Add an arbitrary member (documentation, SBOM, license text)
   */
  addFile(archivePath: string, contents: Uint8Array): this {
    this.putFile(archivePath, contents, false);
    return this;
  }

  /**
   * Add a notices file and reference it from the manifest
   */
  withNotices(archivePath: string, contents: Uint8Array): this {
    this.putFile(archivePath, contents, false);
    this.notices = archivePath;
    return this;
  }

  withApi(api: ApiInfo): this {
    this.api = api;
    return this;
  }

  withBuildInfo(buildInfo: BuildInfo): this {
    this.buildInfo = buildInfo;
    return this;
  }

  withSbom(sbom: Sbom): this {
    this.sbom = sbom;
    return this;
  }

  /**
   * Embed a public key in the manifest without signing (bundles signed elsewhere)
   */
  withPublicKey(publicKey: string): this {
    this.publicKey = publicKey;
    return this;
  }

  /**
   * Sign the manifest and every library with this key, and embed its public key
   */
  withSigningKey(keyPair: MinisignKeyPair): this {
    this.signingKey = keyPair;
    this.publicKey = formatPublicKey(keyPair);
    return this;
  }

  /**
   * Manifest describing the members added so far
   */
  manifest(): Manifest {
    const manifest: Manifest = {
      bundle_version: this.bundleVersion,
      plugin: this.plugin,
      public_key: this.publicKey,
      platforms: { ...this.platforms },
      schemas: { ...this.schemas },
      api: this.api,
      build_info: this.buildInfo,
      sbom: this.sbom,
      notices: this.notices,
    };
    if (Object.keys(this.bridges).length > 0) {
      manifest.bridges = { jni: { ...this.bridges } };
    }
    return manifest;
  }

  /**
   * Validate the manifest and produce the bundle zip
   *
   * @throws BundleError E_BUNDLE_MANIFEST_INVALID
   */
  async build(): Promise<Buffer> {
    const manifest = this.manifest();
    validateManifest(manifest);

    const manifestBytes = Buffer.from(serializeManifest(manifest), 'utf8');
    const zipfile = new yazl.ZipFile();
    const zipOptions = { mtime: this.mtime, compress: false };

    zipfile.addBuffer(manifestBytes, BUNDLE_MEMBERS.manifest, zipOptions);
    if (this.signingKey) {
      const signature = await this.sign(manifestBytes, BUNDLE_MEMBERS.manifest, this.signingKey);
      zipfile.addBuffer(signature, BUNDLE_MEMBERS.manifestSignature, zipOptions);
    }

    for (const [archivePath, contents] of this.files) {
      zipfile.addBuffer(contents, archivePath, zipOptions);
      if (this.signingKey && this.signedPaths.has(archivePath)) {
        const signature = await this.sign(contents, archivePath, this.signingKey);
        zipfile.addBuffer(
          signature,
          `${archivePath}${BUNDLE_MEMBERS.signatureSuffix}`,
          zipOptions
        );
      }
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];

      zipfile.outputStream
        .on('data', (chunk: Buffer) => chunks.push(chunk))
        .on('end', () => resolve(Buffer.concat(chunks)))
        .on('error', (err: Error) => {
          reject(
            new BundleError(
              ERROR_CODES.E_BUNDLE_INVALID_FORMAT,
              `Failed to create ZIP: ${err.message}`
            )
          );
        });

      zipfile.end();
    });
  }

  /**
   * Build the bundle and write it to disk
   */
  async writeTo(outputPath: string): Promise<void> {
    await writeFile(outputPath, await this.build());
  }

  private putFile(archivePath: string, contents: Uint8Array, signed: boolean): void {
    assertSafePath(archivePath);
    if (
      archivePath === BUNDLE_MEMBERS.manifest ||
      archivePath.endsWith(BUNDLE_MEMBERS.signatureSuffix)
    ) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_INVALID_FORMAT,
        `Archive path is reserved: ${archivePath}`,
        { entry: archivePath }
      );
    }
    this.files.set(archivePath, Buffer.from(contents));
    if (signed) {
      this.signedPaths.add(archivePath);
    }
  }

  private async sign(data: Uint8Array, archivePath: string, keyPair: MinisignKeyPair): Promise<Buffer> {
    const timestamp = Math.floor(this.mtime.getTime() / 1000);
    const block = await signMinisign(data, keyPair, {
      trustedComment: `timestamp:${timestamp}\tfile:${pathPosix.basename(archivePath)}\thashed`,
    });
    return Buffer.from(block, 'utf8');
  }
}

/**
 * Bundle loader
 *
 * Selects the artifact for a platform, proves it (and the manifest that
 * describes it) unaltered and signed by a trusted key, and writes it to a
 * local file. Every load runs the same forward-only pipeline; see stages.ts.
 *
 * Two destination modes:
 * - safe: a caller-supplied directory; an existing target file is never overwritten
 * - ephemeral: a fresh temp directory per call, removed entirely on failure
 */

import { chmod, mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, posix as pathPosix } from 'node:path';
import {
  BUNDLE_MEMBERS,
  ERROR_CODES,
  TEMP_DIR_PREFIX,
  type ErrorCode,
} from '@plugseal/kernel';
import {
  CryptoError,
  MinisignVerifier,
  formatKeyId,
  sha256Hex,
  verifyChecksum,
} from '@plugseal/crypto';
import { BundleArchive } from './archive.js';
import { resolveLoaderConfig, type LoaderConfig, type LoaderOptions, type StageInfo } from './config.js';
import { BundleError, fromCryptoError, withDetails } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import {
  parseManifest,
  type BuildInfo,
  type Manifest,
  type PlatformEntry,
  type SchemaEntry,
} from './manifest.js';
import {
  currentPlatform,
  defaultVariant,
  listArtifacts,
  listVariants,
  lookupPlatform,
  resolveVariant,
} from './platform.js';
import { canTransition, type LoadStage } from './stages.js';

export interface ExtractOptions {
  /** Variant to extract; defaults to the platform entry's default variant */
  variant?: string;
}

type ArtifactKind = 'library' | 'bridge';

type Destination = { mode: 'safe'; dir: string } | { mode: 'ephemeral' };

/**
 * Outcome of checking one artifact or schema in verifyBundle
 */
export interface ArtifactReport {
  kind: 'library' | 'bridge' | 'schema';
  /** Platform key, or schema name */
  name: string;
  variant?: string;
  path: string;
  ok: boolean;
  error?: { code: ErrorCode; message: string };
}

/**
 * Result of verifyBundle
 */
export interface VerificationReport {
  bundle: string;
  plugin: { name: string; version: string };
  signaturesVerified: boolean;
  /** Key id (minisign display form) the signatures were checked against */
  keyId?: string;
  artifacts: ArtifactReport[];
  ok: boolean;
}

function isErrnoError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) return false;
    throw err;
  }
}

function destinationConflict(target: string): BundleError {
  return new BundleError(
    ERROR_CODES.E_BUNDLE_DESTINATION_CONFLICT,
    `File already exists at target path: ${target}`,
    { target }
  );
}

/**
 * Write bytes to dir/fileName without ever replacing an existing file.
 * A failed write or chmod removes what was written.
 */
async function writeExclusive(
  dir: string,
  fileName: string,
  data: Uint8Array,
  executable: boolean
): Promise<string> {
  const target = join(dir, fileName);
  if (await pathExists(target)) {
    throw destinationConflict(target);
  }

  await mkdir(dir, { recursive: true });

  try {
    await writeFile(target, data, { flag: 'wx' });
  } catch (err) {
    if (isErrnoError(err, 'EEXIST')) {
      throw destinationConflict(target);
    }
    await rm(target, { force: true });
    throw err;
  }

  if (executable && process.platform !== 'win32') {
    try {
      const { mode } = await stat(target);
      await chmod(target, mode | 0o111);
    } catch (err) {
      await rm(target, { force: true });
      throw err;
    }
  }

  return target;
}

/**
 * Tracks one load through the pipeline stages
 */
class LoadRun {
  private stage?: LoadStage;
  private attempting: LoadStage = 'opened';

  constructor(
    private readonly logger: Logger,
    private readonly onStage: LoaderOptions['onStage'],
    readonly info: StageInfo
  ) {}

  /**
   * Run the work for a stage, then record the transition into it
   */
  async step<T>(stage: LoadStage, work: () => T | Promise<T>): Promise<T> {
    this.attempting = stage;
    const result = await work();
    this.enter(stage);
    return result;
  }

  enter(stage: LoadStage): void {
    if (!canTransition(this.stage, stage)) {
      throw new Error(`Invalid load stage transition: ${this.stage ?? 'start'} -> ${stage}`);
    }
    this.stage = stage;
    this.logger.debug({ stage, ...this.info }, 'bundle load stage');
    this.onStage?.(stage, { ...this.info });
  }

  /**
   * Move to failed and return the error to throw, tagged with the failing stage
   */
  fail(err: unknown): unknown {
    const failedAt = this.attempting;
    const mapped = withDetails(fromCryptoError(err), { stage: failedAt });
    this.stage = 'failed';
    this.logger.warn(
      {
        stage: failedAt,
        code: mapped instanceof BundleError ? mapped.code : undefined,
        err: mapped,
        ...this.info,
      },
      'bundle load failed'
    );
    try {
      this.onStage?.('failed', { ...this.info });
    } catch (hookErr) {
      this.logger.error({ err: hookErr, ...this.info }, 'onStage hook threw on failure');
    }
    return mapped;
  }
}

/**
 * Loads and verifies plugin bundles
 *
 * @example
 * ```typescript
 * const loader = new BundleLoader({ publicKeyOverride: trustedKey });
 * const libraryPath = await loader.extractLibraryToTemp('plugin.bundle');
 * ```
 */
export class BundleLoader {
  private readonly config: LoaderConfig;
  private readonly logger: Logger;
  private readonly onStage: LoaderOptions['onStage'];

  /**
   * @throws ConfigError if an option is invalid
   */
  constructor(options: LoaderOptions = {}) {
    this.config = resolveLoaderConfig(options);
    this.logger = options.logger ?? createLogger({ name: 'plugseal-bundle' });
    this.onStage = options.onStage;
  }

  /** Platform key artifacts are resolved for */
  get platform(): string {
    return this.config.platform ?? currentPlatform();
  }

  get verifiesSignatures(): boolean {
    return this.config.verifySignatures;
  }

  // ==========================================================================
  // Extraction
  // ==========================================================================

  /**
   * Extract the verified library into destDir (safe mode)
   *
   * @throws BundleError E_BUNDLE_DESTINATION_CONFLICT if the target file exists
   */
  extractLibrary(bundlePath: string, destDir: string, options: ExtractOptions = {}): Promise<string> {
    return this.extract('library', bundlePath, { mode: 'safe', dir: destDir }, options);
  }

  /**
   * Extract the verified library into a fresh temp directory (ephemeral mode).
   * The caller owns the directory afterwards.
   */
  extractLibraryToTemp(bundlePath: string, options: ExtractOptions = {}): Promise<string> {
    return this.extract('library', bundlePath, { mode: 'ephemeral' }, options);
  }

  /**
   * Extract the verified JNI bridge library into destDir (safe mode)
   *
   * @throws BundleError E_BUNDLE_BRIDGE_MISSING if the bundle has no bridge
   */
  extractBridge(bundlePath: string, destDir: string, options: ExtractOptions = {}): Promise<string> {
    return this.extract('bridge', bundlePath, { mode: 'safe', dir: destDir }, options);
  }

  /**
   * Extract the verified JNI bridge library into a fresh temp directory
   */
  extractBridgeToTemp(bundlePath: string, options: ExtractOptions = {}): Promise<string> {
    return this.extract('bridge', bundlePath, { mode: 'ephemeral' }, options);
  }

  private async extract(
    kind: ArtifactKind,
    bundlePath: string,
    destination: Destination,
    options: ExtractOptions
  ): Promise<string> {
    const run = new LoadRun(this.logger, this.onStage, { bundlePath, platform: this.platform });
    let tempDir: string | undefined;
    let writtenPath: string | undefined;

    try {
      const archive = await run.step('opened', () =>
        BundleArchive.open(bundlePath, this.config.limits)
      );

      const { manifestBytes, manifest } = await run.step('manifest_loaded', () => {
        const bytes = archive.read(BUNDLE_MEMBERS.manifest);
        return { manifestBytes: bytes, manifest: parseManifest(bytes) };
      });

      let verifier: MinisignVerifier | undefined;
      if (this.config.verifySignatures) {
        verifier = await run.step('manifest_verified', async () => {
          const v = this.createVerifier(manifest);
          await this.verifyMember(archive, BUNDLE_MEMBERS.manifest, manifestBytes, v);
          return v;
        });
      }

      const artifact = await run.step('platform_resolved', () => {
        const entry = lookupPlatform(this.platformMap(manifest, kind), this.platform);
        return resolveVariant(entry, options.variant);
      });
      run.info.variant = artifact.variant;
      run.info.artifact = artifact.library;

      const data = await run.step('artifact_read', () => archive.read(artifact.library));

      await run.step('checksum_verified', () =>
        this.checkChecksum(artifact.library, data, artifact.checksum)
      );

      if (verifier) {
        const v = verifier;
        await run.step('signature_verified', () =>
          this.verifyMember(archive, artifact.library, data, v)
        );
      }

      const outputPath = await run.step('written', async () => {
        let dir: string;
        if (destination.mode === 'safe') {
          dir = destination.dir;
        } else {
          tempDir = await mkdtemp(join(this.config.tempDir ?? tmpdir(), TEMP_DIR_PREFIX));
          dir = tempDir;
        }
        writtenPath = await writeExclusive(dir, pathPosix.basename(artifact.library), data, true);
        return writtenPath;
      });

      run.enter('done');
      return outputPath;
    } catch (err) {
      // Nothing from a failed load may remain on disk
      if (tempDir) {
        await this.removeQuietly(tempDir);
      } else if (writtenPath) {
        await this.removeQuietly(writtenPath);
      }
      throw run.fail(err);
    }
  }

  /**
   * Remove a path left by a failed load; a cleanup error is logged so the
   * load error still reaches the caller
   */
  private async removeQuietly(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (err) {
      this.logger.error({ err, path }, 'failed to remove output of failed load');
    }
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  /**
   * Parse the manifest of a bundle (no signature verification)
   */
  async getManifest(bundlePath: string): Promise<Manifest> {
    const archive = await this.open(bundlePath);
    return parseManifest(archive.read(BUNDLE_MEMBERS.manifest));
  }

  /** Names of every file member in the bundle */
  async listFiles(bundlePath: string): Promise<string[]> {
    return (await this.open(bundlePath)).names();
  }

  /**
   * Variant names available for a platform (default: the loader's platform)
   */
  async listVariants(bundlePath: string, platform?: string): Promise<string[]> {
    return listVariants(await this.platformEntry(bundlePath, platform));
  }

  async getDefaultVariant(bundlePath: string, platform?: string): Promise<string> {
    return defaultVariant(await this.platformEntry(bundlePath, platform));
  }

  async getBuildInfo(bundlePath: string): Promise<BuildInfo | undefined> {
    return (await this.getManifest(bundlePath)).build_info;
  }

  /**
   * Whether the bundle carries a JNI bridge for a platform (default: the loader's platform)
   */
  async hasBridge(bundlePath: string, platform?: string): Promise<boolean> {
    const jni = (await this.getManifest(bundlePath)).bridges?.jni ?? {};
    return Object.prototype.hasOwnProperty.call(jni, platform ?? this.platform);
  }

  async getSchemas(bundlePath: string): Promise<Record<string, SchemaEntry>> {
    return (await this.getManifest(bundlePath)).schemas;
  }

  /**
   * Read a schema's text after verifying its checksum
   *
   * @throws BundleError E_BUNDLE_SCHEMA_NOT_FOUND or E_BUNDLE_CHECKSUM_MISMATCH
   */
  async readSchema(bundlePath: string, name: string): Promise<string> {
    const { data } = await this.readVerifiedSchema(bundlePath, name);
    return Buffer.from(data).toString('utf8');
  }

  /**
   * Write a checksum-verified schema file into destDir, never overwriting
   */
  async extractSchema(bundlePath: string, name: string, destDir: string): Promise<string> {
    const { entry, data } = await this.readVerifiedSchema(bundlePath, name);
    return writeExclusive(destDir, pathPosix.basename(entry.path), data, false);
  }

  // ==========================================================================
  // Verification without extraction
  // ==========================================================================

  /**
   * Check the manifest signature and every library, bridge and schema in the
   * bundle without writing anything.
   *
   * Problems with the archive, manifest or key throw; per-artifact failures
   * are reported.
   */
  async verifyBundle(bundlePath: string): Promise<VerificationReport> {
    const archive = await this.open(bundlePath);
    const manifestBytes = archive.read(BUNDLE_MEMBERS.manifest);
    const manifest = parseManifest(manifestBytes);

    let verifier: MinisignVerifier | undefined;
    if (this.config.verifySignatures) {
      verifier = this.createVerifier(manifest);
      await this.verifyMember(archive, BUNDLE_MEMBERS.manifest, manifestBytes, verifier);
    }

    const artifacts: ArtifactReport[] = [];
    const checkPlatforms = async (
      kind: ArtifactKind,
      map: Record<string, PlatformEntry>
    ): Promise<void> => {
      for (const [platform, entry] of Object.entries(map)) {
        for (const artifact of listArtifacts(entry)) {
          const report: ArtifactReport = {
            kind,
            name: platform,
            variant: artifact.variant,
            path: artifact.library,
            ok: true,
          };
          try {
            const data = archive.read(artifact.library);
            this.checkChecksum(artifact.library, data, artifact.checksum);
            if (verifier) {
              await this.verifyMember(archive, artifact.library, data, verifier);
            }
          } catch (err) {
            report.ok = false;
            report.error = toReportError(err);
          }
          artifacts.push(report);
        }
      }
    };

    await checkPlatforms('library', manifest.platforms);
    await checkPlatforms('bridge', manifest.bridges?.jni ?? {});

    for (const [name, entry] of Object.entries(manifest.schemas)) {
      const report: ArtifactReport = { kind: 'schema', name, path: entry.path, ok: true };
      try {
        this.checkChecksum(entry.path, archive.read(entry.path), entry.checksum);
      } catch (err) {
        report.ok = false;
        report.error = toReportError(err);
      }
      artifacts.push(report);
    }

    const ok = artifacts.every((a) => a.ok);
    this.logger.debug({ bundlePath, ok, artifacts: artifacts.length }, 'bundle verified');

    return {
      bundle: bundlePath,
      plugin: { name: manifest.plugin.name, version: manifest.plugin.version },
      signaturesVerified: verifier !== undefined,
      keyId: verifier ? formatKeyId(verifier.keyId) : undefined,
      artifacts,
      ok,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private open(bundlePath: string): Promise<BundleArchive> {
    return BundleArchive.open(bundlePath, this.config.limits);
  }

  private async platformEntry(bundlePath: string, platform?: string): Promise<PlatformEntry> {
    const manifest = await this.getManifest(bundlePath);
    return lookupPlatform(manifest.platforms, platform ?? this.platform);
  }

  private platformMap(manifest: Manifest, kind: ArtifactKind): Record<string, PlatformEntry> {
    if (kind === 'library') {
      return manifest.platforms;
    }
    const jni = manifest.bridges?.jni ?? {};
    if (Object.keys(jni).length === 0) {
      throw new BundleError(ERROR_CODES.E_BUNDLE_BRIDGE_MISSING, 'Bundle does not contain a JNI bridge');
    }
    return jni;
  }

  /**
   * Verifier for the caller's key, else the key embedded in the manifest
   *
   * @throws BundleError E_BUNDLE_PUBLIC_KEY_MISSING or E_BUNDLE_KEY_FORMAT
   */
  private createVerifier(manifest: Manifest): MinisignVerifier {
    const publicKey = this.config.publicKeyOverride ?? manifest.public_key;
    if (!publicKey) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_PUBLIC_KEY_MISSING,
        'Signature verification enabled but no public key available: ' +
          'the manifest has no public_key and no override was given'
      );
    }
    try {
      return new MinisignVerifier(publicKey);
    } catch (err) {
      throw fromCryptoError(err, { source: this.config.publicKeyOverride ? 'override' : 'manifest' });
    }
  }

  /**
   * Verify `<member>.minisig` over a member's bytes
   *
   * @throws BundleError E_BUNDLE_FILE_NOT_FOUND, E_BUNDLE_SIGNATURE_FORMAT
   *   or E_BUNDLE_SIGNATURE_INVALID
   */
  private async verifyMember(
    archive: BundleArchive,
    member: string,
    data: Uint8Array,
    verifier: MinisignVerifier
  ): Promise<void> {
    const signaturePath = `${member}${BUNDLE_MEMBERS.signatureSuffix}`;
    if (!archive.has(signaturePath)) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_FILE_NOT_FOUND,
        `Signature not found in bundle: ${signaturePath}`,
        { entry: signaturePath }
      );
    }

    let valid: boolean;
    try {
      valid = await verifier.verify(data, archive.readText(signaturePath));
    } catch (err) {
      if (err instanceof CryptoError) {
        throw fromCryptoError(err, { member });
      }
      throw err;
    }

    if (!valid) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_SIGNATURE_INVALID,
        `Signature verification failed for ${member}`,
        { member }
      );
    }
  }

  private checkChecksum(member: string, data: Uint8Array, expected: string): void {
    if (!verifyChecksum(data, expected)) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_CHECKSUM_MISMATCH,
        `Checksum verification failed for ${member}`,
        { member, expected, actual: `sha256:${sha256Hex(data)}` }
      );
    }
  }

  private async readVerifiedSchema(
    bundlePath: string,
    name: string
  ): Promise<{ entry: SchemaEntry; data: Uint8Array }> {
    const archive = await this.open(bundlePath);
    const manifest = parseManifest(archive.read(BUNDLE_MEMBERS.manifest));

    if (!Object.prototype.hasOwnProperty.call(manifest.schemas, name)) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_SCHEMA_NOT_FOUND,
        `Schema not found in bundle: ${name}`,
        { schema: name, available: Object.keys(manifest.schemas) }
      );
    }

    const entry = manifest.schemas[name];
    const data = archive.read(entry.path);
    this.checkChecksum(entry.path, data, entry.checksum);
    return { entry, data };
  }
}

function toReportError(err: unknown): { code: ErrorCode; message: string } {
  const mapped = fromCryptoError(err);
  if (mapped instanceof BundleError) {
    return { code: mapped.code, message: mapped.message };
  }
  throw mapped;
}

/**
 * Read-only access to bundle zip archives
 *
 * Every member is read once, with path validation and size limits counted
 * on the actual decompressed bytes rather than the sizes the zip claims.
 */

import { readFile } from 'node:fs/promises';
import { posix as pathPosix } from 'node:path';
import * as yauzl from 'yauzl';
import { ARCHIVE_LIMITS, ERROR_CODES, type ArchiveLimits } from '@plugseal/kernel';
import { BundleError } from './errors.js';

/**
 * Virtual root for path containment checks
 */
const VIRTUAL_ROOT = '/bundle';

/**
 * Validate an archive member name against zip-slip and path traversal.
 *
 * Rejects backslashes, NUL bytes, absolute paths and any path that escapes
 * the archive root after normalization.
 */
export function isPathSafe(entryPath: string): boolean {
  if (entryPath.length === 0) return false;
  if (entryPath.includes('\\')) return false;
  if (entryPath.includes('\0')) return false;

  const normalized = pathPosix.normalize(entryPath);
  if (normalized.startsWith('/')) return false;
  if (normalized === '..' || normalized.startsWith('../')) return false;
  if (normalized === '.') return false;

  const resolved = pathPosix.resolve(VIRTUAL_ROOT, normalized);
  return resolved.startsWith(VIRTUAL_ROOT + '/');
}

/**
 * Convert a yauzl error to the matching bundle error.
 * yauzl rejects unsafe file names itself; those become E_BUNDLE_PATH_TRAVERSAL.
 */
function handleZipError(zipErr: Error, source: string): BundleError {
  const isPathError =
    zipErr.message.includes('invalid relative path') ||
    zipErr.message.includes('absolute path') ||
    zipErr.message.includes('invalid characters in fileName');

  if (isPathError) {
    return new BundleError(
      ERROR_CODES.E_BUNDLE_PATH_TRAVERSAL,
      `Unsafe path in bundle: ${zipErr.message}`,
      { bundle: source }
    );
  }
  return new BundleError(ERROR_CODES.E_BUNDLE_INVALID_FORMAT, `ZIP error: ${zipErr.message}`, {
    bundle: source,
  });
}

function sizeExceeded(message: string, details: Record<string, unknown>): BundleError {
  return new BundleError(ERROR_CODES.E_BUNDLE_SIZE_EXCEEDED, message, details);
}

/**
 * Read every file member of a zip buffer into memory
 */
function readEntries(
  zipBuffer: Buffer,
  limits: ArchiveLimits,
  source: string
): Promise<Map<string, Buffer>> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(zipBuffer, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(
          new BundleError(
            ERROR_CODES.E_BUNDLE_INVALID_FORMAT,
            `Failed to open ZIP: ${err?.message ?? 'unknown error'}`,
            { bundle: source }
          )
        );
        return;
      }

      const files = new Map<string, Buffer>();
      let settled = false;
      let entryCount = 0;
      let claimedTotal = 0;
      let actualTotal = 0;

      const fail = (error: BundleError): void => {
        if (settled) return;
        settled = true;
        zipfile.close();
        reject(error);
      };

      zipfile.on('entry', (entry: yauzl.Entry) => {
        if (settled) return;

        if (entry.fileName.endsWith('/')) {
          zipfile.readEntry();
          return;
        }

        entryCount++;
        if (entryCount > limits.maxEntries) {
          fail(sizeExceeded(`Too many ZIP entries: > ${limits.maxEntries}`, { limit: limits.maxEntries }));
          return;
        }

        if (!isPathSafe(entry.fileName)) {
          fail(
            new BundleError(
              ERROR_CODES.E_BUNDLE_PATH_TRAVERSAL,
              `Unsafe path in bundle: ${entry.fileName}`,
              { bundle: source, entry: entry.fileName }
            )
          );
          return;
        }

        if (entry.uncompressedSize > limits.maxEntrySize) {
          fail(
            sizeExceeded(`Entry too large: ${entry.fileName}`, {
              entry: entry.fileName,
              claimed: entry.uncompressedSize,
              limit: limits.maxEntrySize,
            })
          );
          return;
        }

        claimedTotal += entry.uncompressedSize;
        if (claimedTotal > limits.maxTotalSize) {
          fail(
            sizeExceeded(`Total size exceeded: > ${limits.maxTotalSize} bytes`, {
              limit: limits.maxTotalSize,
            })
          );
          return;
        }

        zipfile.openReadStream(entry, (readErr, readStream) => {
          if (readErr || !readStream) {
            fail(
              new BundleError(
                ERROR_CODES.E_BUNDLE_INVALID_FORMAT,
                `Failed to read ${entry.fileName}: ${readErr?.message ?? 'no stream'}`,
                { bundle: source, entry: entry.fileName }
              )
            );
            return;
          }

          const chunks: Buffer[] = [];
          let actualBytes = 0;

          readStream.on('data', (chunk: Buffer) => {
            actualBytes += chunk.length;
            actualTotal += chunk.length;

            if (actualBytes > limits.maxEntrySize) {
              readStream.destroy();
              fail(
                sizeExceeded(`Entry exceeds size limit during decompression: ${entry.fileName}`, {
                  entry: entry.fileName,
                  claimed: entry.uncompressedSize,
                  actual: actualBytes,
                  limit: limits.maxEntrySize,
                })
              );
              return;
            }

            if (actualTotal > limits.maxTotalSize) {
              readStream.destroy();
              fail(
                sizeExceeded(
                  `Total decompressed size exceeds limit: ${actualTotal} > ${limits.maxTotalSize}`,
                  { actual: actualTotal, limit: limits.maxTotalSize }
                )
              );
              return;
            }

            chunks.push(chunk);
          });

          readStream.on('end', () => {
            if (settled) return;
            files.set(entry.fileName, Buffer.concat(chunks));
            zipfile.readEntry();
          });

          readStream.on('error', (streamErr: Error) => {
            fail(
              new BundleError(
                ERROR_CODES.E_BUNDLE_INVALID_FORMAT,
                `Stream error in ${entry.fileName}: ${streamErr.message}`,
                { bundle: source, entry: entry.fileName }
              )
            );
          });
        });
      });

      zipfile.on('end', () => {
        if (settled) return;
        settled = true;
        resolve(files);
      });

      zipfile.on('error', (zipErr: Error) => {
        fail(handleZipError(zipErr, source));
      });

      zipfile.readEntry();
    });
  });
}

/**
 * A bundle archive opened read-only
 */
export class BundleArchive {
  private constructor(
    /** Path or label the archive was read from */
    readonly source: string,
    private readonly files: Map<string, Buffer>
  ) {}

  /**
   * Open a bundle file from disk
   *
   * @throws BundleError E_BUNDLE_FILE_NOT_FOUND, E_BUNDLE_INVALID_FORMAT,
   *   E_BUNDLE_PATH_TRAVERSAL or E_BUNDLE_SIZE_EXCEEDED
   */
  static async open(
    bundlePath: string,
    limits: ArchiveLimits = ARCHIVE_LIMITS
  ): Promise<BundleArchive> {
    let buffer: Buffer;
    try {
      buffer = await readFile(bundlePath);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new BundleError(
          ERROR_CODES.E_BUNDLE_FILE_NOT_FOUND,
          `Bundle not found: ${bundlePath}`,
          { bundle: bundlePath }
        );
      }
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_INVALID_FORMAT,
        `Failed to read bundle ${bundlePath}: ${err instanceof Error ? err.message : String(err)}`,
        { bundle: bundlePath }
      );
    }
    return BundleArchive.fromBuffer(buffer, limits, bundlePath);
  }

  /**
   * Read a bundle already held in memory
   */
  static async fromBuffer(
    zipBuffer: Buffer,
    limits: ArchiveLimits = ARCHIVE_LIMITS,
    source = '<buffer>'
  ): Promise<BundleArchive> {
    const files = await readEntries(zipBuffer, limits, source);
    return new BundleArchive(source, files);
  }

  /** Member names in archive order */
  names(): string[] {
    return [...this.files.keys()];
  }

  has(name: string): boolean {
    return this.files.has(name);
  }

  /**
   * Read a member's bytes
   *
   * @throws BundleError E_BUNDLE_FILE_NOT_FOUND
   */
  read(name: string): Buffer {
    const data = this.files.get(name);
    if (!data) {
      throw new BundleError(
        ERROR_CODES.E_BUNDLE_FILE_NOT_FOUND,
        `File not found in bundle: ${name}`,
        { bundle: this.source, entry: name }
      );
    }
    return data;
  }

  /** Read a member as UTF-8 text */
  readText(name: string): string {
    return this.read(name).toString('utf8');
  }
}

/**
 * plugseal kernel types
 * Shared type definitions for kernel exports
 */

/**
 * Error code definition
 */
export interface ErrorDefinition {
  code: string;
  title: string;
  description: string;
  retriable: boolean;
  category: 'archive' | 'manifest' | 'resolution' | 'integrity' | 'signature' | 'destination';
}

/**
 * Size limits applied while reading bundle archives
 */
export interface ArchiveLimits {
  /** Maximum number of file entries in a bundle */
  maxEntries: number;
  /** Maximum decompressed size of one entry, in bytes */
  maxEntrySize: number;
  /** Maximum decompressed size across all entries read, in bytes */
  maxTotalSize: number;
}

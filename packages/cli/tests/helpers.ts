/**
 * Fixtures for CLI tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BundleBuilder } from '@plugseal/bundle';
import type { MinisignKeyPair } from '@plugseal/crypto';
import { generateKeyPairFromSeed, seedFromLabel } from '@plugseal/crypto/testkit';

export const PLATFORM = 'linux-x86_64';
export const LIBRARY_PATH = 'lib/linux-x86_64/libexample.so';
export const LIBRARY_BYTES = Buffer.from('fake shared object for the cli');
export const SCHEMA_PATH = 'schema/messages.json';
export const SCHEMA_TEXT = '{"type":"object"}';

export function testKeyPair(label = 'plugseal-cli-test-key'): Promise<MinisignKeyPair> {
  return generateKeyPairFromSeed(seedFromLabel(label));
}

export function exampleBuilder(): BundleBuilder {
  return new BundleBuilder({ name: 'example', version: '2.0.0', description: 'Example plugin' })
    .addLibraryVariant(PLATFORM, 'release', LIBRARY_PATH, LIBRARY_BYTES)
    .addLibraryVariant(PLATFORM, 'debug', 'lib/linux-x86_64/debug/libexample.so', Buffer.from('debug'))
    .addSchema('messages', SCHEMA_PATH, Buffer.from(SCHEMA_TEXT));
}

export function tempDirs(): { make: () => Promise<string>; cleanup: () => Promise<void> } {
  const dirs: string[] = [];
  return {
    async make() {
      const dir = await mkdtemp(join(tmpdir(), 'plugseal-cli-test-'));
      dirs.push(dir);
      return dir;
    },
    async cleanup() {
      await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
    },
  };
}

export async function writeBundle(dir: string, zip: Buffer): Promise<string> {
  const bundlePath = join(dir, 'example.bundle');
  await writeFile(bundlePath, zip);
  return bundlePath;
}

/**
 * Shared fixtures for bundle tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yazl from 'yazl';
import { generateKeyPairFromSeed, seedFromLabel } from '@plugseal/crypto/testkit';
import type { MinisignKeyPair } from '@plugseal/crypto';
import { BundleBuilder } from '../src/builder.js';

export const PLATFORM = 'linux-x86_64';
export const LIBRARY_PATH = 'lib/linux-x86_64/libexample.so';
export const LIBRARY_BYTES = Buffer.from('fake shared object for linux-x86_64');
export const BRIDGE_PATH = 'bridge/linux-x86_64/libexample_jni.so';
export const BRIDGE_BYTES = Buffer.from('fake jni bridge for linux-x86_64');
export const SCHEMA_PATH = 'schema/messages.json';
export const SCHEMA_TEXT = '{"type":"object"}';

export function testKeyPair(label = 'plugseal-test-key-001'): Promise<MinisignKeyPair> {
  return generateKeyPairFromSeed(seedFromLabel(label));
}

export function newBuilder(): BundleBuilder {
  return new BundleBuilder({ name: 'example', version: '1.2.3' });
}

/**
 * Temp directory tracker; call cleanup() in afterEach
 */
export function tempDirs(): { make: () => Promise<string>; cleanup: () => Promise<void> } {
  const dirs: string[] = [];
  return {
    async make() {
      const dir = await mkdtemp(join(tmpdir(), 'plugseal-test-'));
      dirs.push(dir);
      return dir;
    },
    async cleanup() {
      await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
    },
  };
}

/**
 * Write a bundle buffer to dir/name and return its path
 */
export async function writeBundle(dir: string, zip: Buffer, name = 'example.bundle'): Promise<string> {
  const bundlePath = join(dir, name);
  await writeFile(bundlePath, zip);
  return bundlePath;
}

/**
 * Replace every occurrence of a byte sequence with another of the same length
 */
export function patchBytes(zip: Buffer, from: string, to: string): Buffer {
  if (from.length !== to.length) {
    throw new Error('patchBytes needs equal-length strings');
  }
  const needle = Buffer.from(from, 'latin1');
  const replacement = Buffer.from(to, 'latin1');
  const out = Buffer.from(zip);
  let index = out.indexOf(needle);
  if (index === -1) {
    throw new Error(`patchBytes: ${from} not found`);
  }
  while (index !== -1) {
    replacement.copy(out, index);
    index = out.indexOf(needle, index + needle.length);
  }
  return out;
}

/**
 * Zip arbitrary members in order, for bundles the builder would refuse to produce
 */
export function zipMembers(members: Array<[string, Uint8Array | string]>): Promise<Buffer> {
  const zipfile = new yazl.ZipFile();
  for (const [name, contents] of members) {
    const data = typeof contents === 'string' ? Buffer.from(contents, 'utf8') : Buffer.from(contents);
    zipfile.addBuffer(data, name, { compress: false });
  }
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    zipfile.outputStream
      .on('data', (chunk: Buffer) => chunks.push(chunk))
      .on('end', () => resolve(Buffer.concat(chunks)))
      .on('error', reject);
    zipfile.end();
  });
}

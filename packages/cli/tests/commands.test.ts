/**
 * Tests for CLI command classes
 */

import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import { readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import chalk from 'chalk';
import {
  formatKeyId,
  formatPublicKey,
  formatSecretKeyFile,
  parsePublicKey,
  verifySignature,
  type MinisignKeyPair,
} from '@plugseal/crypto';
import { ExtractCommand } from '../src/commands/extract.js';
import { InfoCommand } from '../src/commands/info.js';
import { KeygenCommand } from '../src/commands/keygen.js';
import { SchemaCommand } from '../src/commands/schema.js';
import { SignCommand } from '../src/commands/sign.js';
import { VariantsCommand } from '../src/commands/variants.js';
import { VerifyCommand } from '../src/commands/verify.js';
import { createLoader, formatOutput, handleError } from '../src/utils.js';
import {
  LIBRARY_BYTES,
  LIBRARY_PATH,
  PLATFORM,
  SCHEMA_PATH,
  SCHEMA_TEXT,
  exampleBuilder,
  tempDirs,
  testKeyPair,
  writeBundle,
} from './helpers.js';

let keyPair: MinisignKeyPair;

beforeAll(async () => {
  chalk.level = 0;
  keyPair = await testKeyPair();
});

const temp = tempDirs();
afterEach(() => temp.cleanup());

async function signedBundle(dir: string): Promise<string> {
  return writeBundle(dir, await exampleBuilder().withSigningKey(keyPair).build());
}

describe('InfoCommand', () => {
  it('should summarize the manifest', async () => {
    const dir = await temp.make();
    const bundlePath = await signedBundle(dir);

    const result = await new InfoCommand().execute(bundlePath);

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      bundle: bundlePath,
      bundle_version: '1.0',
      plugin: { name: 'example', version: '2.0.0', description: 'Example plugin', authors: [] },
      signed: true,
      platforms: [{ platform: PLATFORM, variants: ['release', 'debug'], default_variant: 'release' }],
      bridges: [],
      schemas: ['messages'],
      build_info: undefined,
      files: 7,
    });
  });

  it('should render a human summary', async () => {
    const dir = await temp.make();
    const result = await new InfoCommand().execute(await signedBundle(dir));
    const text = formatOutput(result, false, InfoCommand.render);

    expect(text.split('\n')).toContain(`  ${PLATFORM}: release (default), debug`);
    expect(text.split('\n')).toContain('Signed: yes');
  });

  it('should report a missing bundle with its code', async () => {
    const dir = await temp.make();
    const result = await new InfoCommand().execute(join(dir, 'missing.bundle'));

    expect(result.success).toBe(false);
    expect(result.code).toBe('E_BUNDLE_FILE_NOT_FOUND');
    expect(result.error).toBe(`Bundle not found: ${join(dir, 'missing.bundle')}`);
  });
});

describe('VariantsCommand', () => {
  it('should list variants for the requested platform', async () => {
    const dir = await temp.make();
    const result = await new VariantsCommand().execute(await signedBundle(dir), { platform: PLATFORM });

    expect(result.data).toEqual({
      platform: PLATFORM,
      variants: ['release', 'debug'],
      default_variant: 'release',
    });
    expect(formatOutput(result, false, VariantsCommand.render)).toBe(
      `Variants for ${PLATFORM}:\n  release (default)\n  debug`
    );
  });

  it('should fail for a platform the bundle lacks', async () => {
    const dir = await temp.make();
    const result = await new VariantsCommand().execute(await signedBundle(dir), {
      platform: 'darwin-aarch64',
    });
    expect(result.code).toBe('E_BUNDLE_UNSUPPORTED_PLATFORM');
  });
});

describe('VerifyCommand', () => {
  it('should verify every artifact', async () => {
    const dir = await temp.make();
    const result = await new VerifyCommand().execute(await signedBundle(dir));

    expect(result.success).toBe(true);
    expect(result.data?.keyId).toBe(formatKeyId(keyPair.keyId));
    expect(result.data?.artifacts.map((a) => a.path)).toEqual([
      LIBRARY_PATH,
      'lib/linux-x86_64/debug/libexample.so',
      SCHEMA_PATH,
    ]);
  });

  it('should fail with the first artifact error code', async () => {
    const dir = await temp.make();
    const zip = await exampleBuilder()
      .addFile(LIBRARY_PATH, Buffer.from('tampered'))
      .withSigningKey(keyPair)
      .build();

    const result = await new VerifyCommand().execute(await writeBundle(dir, zip));

    expect(result.success).toBe(false);
    expect(result.error).toBe('1 of 3 artifacts failed verification');
    expect(result.code).toBe('E_BUNDLE_CHECKSUM_MISMATCH');
    expect(result.data?.ok).toBe(false);
  });

  it('should reject a manifest signed by another key', async () => {
    const dir = await temp.make();
    const other = await testKeyPair('plugseal-cli-other-key');

    const result = await new VerifyCommand().execute(await signedBundle(dir), {
      key: formatPublicKey(other),
    });

    expect(result.success).toBe(false);
    expect(result.code).toBe('E_BUNDLE_SIGNATURE_INVALID');
  });

  it('should read the trusted key from a file', async () => {
    const dir = await temp.make();
    const keyFile = join(dir, 'trusted.pub');
    await writeFile(keyFile, `untrusted comment: trusted\n${formatPublicKey(keyPair)}\n`);

    const result = await new VerifyCommand().execute(await signedBundle(dir), { keyFile });
    expect(result.success).toBe(true);
  });
});

describe('ExtractCommand', () => {
  it('should extract into the output directory', async () => {
    const dir = await temp.make();
    const output = join(dir, 'out');

    const result = await new ExtractCommand().execute(await signedBundle(dir), {
      output,
      platform: PLATFORM,
    });

    expect(result.data).toEqual({
      path: join(output, 'libexample.so'),
      kind: 'library',
      platform: PLATFORM,
      variant: undefined,
      verified: true,
    });
    expect((await readFile(join(output, 'libexample.so'))).equals(LIBRARY_BYTES)).toBe(true);
  });

  it('should extract a variant into a temp directory', async () => {
    const dir = await temp.make();
    const result = await new ExtractCommand().execute(await signedBundle(dir), {
      temp: true,
      variant: 'debug',
      platform: PLATFORM,
    });

    expect(result.success).toBe(true);
    if (result.data) {
      expect(await readFile(result.data.path, 'utf8')).toBe('debug');
      await rm(dirname(result.data.path), { recursive: true, force: true });
    }
  });

  it('should require exactly one destination', async () => {
    const dir = await temp.make();
    const bundlePath = await signedBundle(dir);
    const command = new ExtractCommand();

    expect((await command.execute(bundlePath, {})).error).toBe(
      'Either --output <dir> or --temp is required'
    );
    expect((await command.execute(bundlePath, { output: dir, temp: true })).error).toBe(
      '--output and --temp cannot be combined'
    );
  });

  it('should refuse to replace an existing file', async () => {
    const dir = await temp.make();
    await writeFile(join(dir, 'libexample.so'), 'existing');

    const result = await new ExtractCommand().execute(await signedBundle(dir), {
      output: dir,
      platform: PLATFORM,
    });

    expect(result.code).toBe('E_BUNDLE_DESTINATION_CONFLICT');
    expect(await readFile(join(dir, 'libexample.so'), 'utf8')).toBe('existing');
  });

  it('should extract an unsigned bundle only with verification off', async () => {
    const dir = await temp.make();
    const bundlePath = await writeBundle(dir, await exampleBuilder().build());

    const verified = await new ExtractCommand().execute(bundlePath, {
      output: join(dir, 'a'),
      platform: PLATFORM,
      verify: true,
    });
    const unverified = await new ExtractCommand().execute(bundlePath, {
      output: join(dir, 'b'),
      platform: PLATFORM,
      verify: false,
    });

    expect(verified.code).toBe('E_BUNDLE_PUBLIC_KEY_MISSING');
    expect(unverified.success).toBe(true);
    expect(unverified.data?.verified).toBe(false);
  });
});

describe('SchemaCommand', () => {
  it('should list schemas', async () => {
    const dir = await temp.make();
    const result = await new SchemaCommand().execute(await signedBundle(dir));
    expect(result.data).toEqual({
      action: 'list',
      schemas: [{ name: 'messages', path: SCHEMA_PATH, format: 'json-schema' }],
    });
  });

  it('should print a schema', async () => {
    const dir = await temp.make();
    const result = await new SchemaCommand().execute(await signedBundle(dir), 'messages');
    expect(formatOutput(result, false, SchemaCommand.render)).toBe(SCHEMA_TEXT);
  });

  it('should extract a schema', async () => {
    const dir = await temp.make();
    const output = join(dir, 'schemas');
    const result = await new SchemaCommand().execute(await signedBundle(dir), 'messages', { output });

    expect(result.data).toEqual({ action: 'extract', name: 'messages', path: join(output, 'messages.json') });
    expect(await readFile(join(output, 'messages.json'), 'utf8')).toBe(SCHEMA_TEXT);
  });

  it('should report an unknown schema', async () => {
    const dir = await temp.make();
    const result = await new SchemaCommand().execute(await signedBundle(dir), 'missing');
    expect(result.code).toBe('E_BUNDLE_SCHEMA_NOT_FOUND');
  });
});

describe('KeygenCommand and SignCommand', () => {
  it('should generate a key pair that signs verifiable files', async () => {
    const dir = await temp.make();
    const base = join(dir, 'release');

    const keygen = await new KeygenCommand().execute(base);
    expect(keygen.success).toBe(true);
    expect(keygen.data?.public_key_file).toBe(`${base}.pub`);
    expect(keygen.data?.secret_key_file).toBe(`${base}.key`);

    const publicKeyText = await readFile(`${base}.pub`, 'utf8');
    expect(formatKeyId(parsePublicKey(publicKeyText).keyId)).toBe(keygen.data?.key_id);

    const target = join(dir, 'libexample.so');
    await writeFile(target, LIBRARY_BYTES);
    const sign = await new SignCommand().execute(target, { secretKey: `${base}.key`, comment: 'release' });

    expect(sign.data).toEqual({
      file: target,
      signature_file: `${target}.minisig`,
      key_id: keygen.data?.key_id,
    });
    const signature = await readFile(`${target}.minisig`, 'utf8');
    expect(signature.split('\n')[2]).toBe('trusted comment: release');
    expect(await verifySignature(LIBRARY_BYTES, signature, publicKeyText)).toBe(true);
  });

  it('should not replace existing key files unless forced', async () => {
    const dir = await temp.make();
    const base = join(dir, 'release');
    const command = new KeygenCommand();

    await command.execute(base);
    const first = await readFile(`${base}.pub`, 'utf8');

    expect((await command.execute(base)).success).toBe(false);
    expect(await readFile(`${base}.pub`, 'utf8')).toBe(first);
    expect((await command.execute(base, { force: true })).success).toBe(true);
  });

  it('should write nothing when only the public key file exists', async () => {
    const dir = await temp.make();
    const base = join(dir, 'release');
    await writeFile(`${base}.pub`, 'existing public key');

    const result = await new KeygenCommand().execute(base);

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Key file already exists: ${base}.pub (use --force to replace)`);
    expect(await readdir(dir)).toEqual(['release.pub']);
    expect(await readFile(`${base}.pub`, 'utf8')).toBe('existing public key');
  });

  it.skipIf(process.platform === 'win32')('should restrict a replaced secret key file to its owner', async () => {
    const dir = await temp.make();
    const base = join(dir, 'release');
    await writeFile(`${base}.key`, 'old secret key', { mode: 0o644 });

    expect((await new KeygenCommand().execute(base, { force: true })).success).toBe(true);
    expect((await stat(`${base}.key`)).mode & 0o777).toBe(0o600);
  });

  it('should sign with a known key file', async () => {
    const dir = await temp.make();
    const keyFile = join(dir, 'test.key');
    await writeFile(keyFile, formatSecretKeyFile(keyPair));
    const target = join(dir, 'data.bin');
    await writeFile(target, 'data');

    const result = await new SignCommand().execute(target, { secretKey: keyFile });

    expect(result.data?.key_id).toBe(formatKeyId(keyPair.keyId));
    const signature = await readFile(`${target}.minisig`, 'utf8');
    expect(signature.split('\n')[2]).toMatch(/^trusted comment: timestamp:\d+\tfile:data\.bin\thashed$/);
  });

  it('should reject a public key passed as the secret key', async () => {
    const dir = await temp.make();
    const keyFile = join(dir, 'test.pub');
    await writeFile(keyFile, formatPublicKey(keyPair));
    const target = join(dir, 'data.bin');
    await writeFile(target, 'data');

    const result = await new SignCommand().execute(target, { secretKey: keyFile });
    expect(result.code).toBe('CRYPTO_INVALID_KEY_FORMAT');
  });
});

describe('createLoader', () => {
  it('should read verification from the environment unless given', async () => {
    const off = { PLUGSEAL_VERIFY_SIGNATURES: 'false' };
    expect((await createLoader({}, off)).verifiesSignatures).toBe(false);
    expect((await createLoader({ verify: true }, off)).verifiesSignatures).toBe(true);
    expect((await createLoader({}, {})).verifiesSignatures).toBe(true);
  });
});

describe('formatOutput', () => {
  it('should print the whole result as JSON', () => {
    const text = formatOutput({ success: true, data: { a: 1 } }, true);
    expect(JSON.parse(text)).toEqual({ success: true, data: { a: 1 } });
  });

  it('should print errors with their code', () => {
    expect(formatOutput({ success: false, error: 'bad', code: 'E_BUNDLE_KEY_FORMAT' })).toBe(
      'Error: bad\nCode: E_BUNDLE_KEY_FORMAT'
    );
  });

  it('should map unknown errors to a message', () => {
    expect(handleError('boom')).toEqual({ success: false, error: 'boom' });
  });
});

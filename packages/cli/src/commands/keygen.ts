/**
 * plugseal keygen <name>
 * Writes <name>.pub (minisign public key) and <name>.key (unencrypted secret key)
 */

import { chmod, rm, stat, writeFile } from 'node:fs/promises';
import chalk from 'chalk';
import {
  formatKeyId,
  formatPublicKey,
  formatPublicKeyFile,
  formatSecretKeyFile,
  generateKeyPair,
} from '@plugseal/crypto';
import type { CLIOptions, CommandResult, KeygenResult } from '../types.js';
import { handleError, timing } from '../utils.js';

export interface KeygenOptions extends CLIOptions {
  /** Replace existing key files */
  force?: boolean;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
}

export class KeygenCommand {
  async execute(basePath: string, options: KeygenOptions = {}): Promise<CommandResult<KeygenResult>> {
    const timer = timing();

    try {
      const keyPair = await generateKeyPair();
      const publicKeyFile = `${basePath}.pub`;
      const secretKeyFile = `${basePath}.key`;
      const flag = options.force ? 'w' : 'wx';

      // Both files are checked up front so a refused run never leaves half a pair
      if (!options.force) {
        for (const file of [publicKeyFile, secretKeyFile]) {
          if (await exists(file)) {
            throw new Error(`Key file already exists: ${file} (use --force to replace)`);
          }
        }
      }

      await writeFile(publicKeyFile, formatPublicKeyFile(keyPair), { flag });
      try {
        await writeFile(secretKeyFile, formatSecretKeyFile(keyPair), { flag, mode: 0o600 });
        // mode only applies when the file is created
        await chmod(secretKeyFile, 0o600);
      } catch (err) {
        await rm(publicKeyFile, { force: true });
        throw err;
      }

      const result: KeygenResult = {
        key_id: formatKeyId(keyPair.keyId),
        public_key: formatPublicKey(keyPair),
        public_key_file: publicKeyFile,
        secret_key_file: secretKeyFile,
      };
      return { success: true, data: result, timing: timer.end() };
    } catch (error) {
      return { ...handleError(error), timing: timer.end() };
    }
  }

  static render(data: KeygenResult): string {
    return [
      `Key id: ${chalk.bold(data.key_id)}`,
      `Public key: ${data.public_key}`,
      `Public key file: ${data.public_key_file}`,
      `Secret key file: ${data.secret_key_file} ${chalk.yellow('(unencrypted, keep it private)')}`,
    ].join('\n');
  }
}

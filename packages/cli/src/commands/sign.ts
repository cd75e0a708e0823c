/**
 * plugseal sign <file> --secret-key <file>
 * Writes <file>.minisig with a prehashed signature
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { formatKeyId, parseSecretKeyFile, signMinisign } from '@plugseal/crypto';
import type { CLIOptions, CommandResult, SignResult } from '../types.js';
import { handleError, timing } from '../utils.js';

export interface SignOptions extends CLIOptions {
  secretKey: string;
  /** Trusted comment; defaults to timestamp and file name */
  comment?: string;
  force?: boolean;
}

export class SignCommand {
  async execute(filePath: string, options: SignOptions): Promise<CommandResult<SignResult>> {
    const timer = timing();

    try {
      const keyPair = await parseSecretKeyFile(await readFile(options.secretKey, 'utf8'));
      const data = await readFile(filePath);
      const trustedComment =
        options.comment ??
        `timestamp:${Math.floor(Date.now() / 1000)}\tfile:${basename(filePath)}\thashed`;

      const signatureFile = `${filePath}.minisig`;
      await writeFile(signatureFile, await signMinisign(data, keyPair, { trustedComment }), {
        flag: options.force ? 'w' : 'wx',
      });

      const result: SignResult = {
        file: filePath,
        signature_file: signatureFile,
        key_id: formatKeyId(keyPair.keyId),
      };
      return { success: true, data: result, timing: timer.end() };
    } catch (error) {
      return { ...handleError(error), timing: timer.end() };
    }
  }

  static render(data: SignResult): string {
    return `Signed ${data.file} with key ${data.key_id}: ${data.signature_file}`;
  }
}

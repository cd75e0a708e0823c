/**
 * CLI utilities and formatting
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import {
  BundleError,
  BundleLoader,
  ConfigError,
  createLogger,
  verifySignaturesFromEnv,
} from '@plugseal/bundle';
import { CryptoError } from '@plugseal/crypto';
import type { CommandResult, Timing, TrustOptions } from './types.js';

export function formatOutput<T>(
  result: CommandResult<T>,
  json = false,
  render?: (data: T) => string
): string {
  if (json) {
    return JSON.stringify(result, null, 2);
  }

  if (!result.success) {
    const lines: string[] = [];
    if (result.data !== undefined && render) {
      lines.push(render(result.data), '');
    }
    lines.push(chalk.red(`Error: ${result.error ?? 'Unknown error'}`));
    if (result.code) {
      lines.push(chalk.dim(`Code: ${result.code}`));
    }
    return lines.join('\n');
  }

  if (result.data === undefined) {
    return '';
  }
  return render ? render(result.data) : JSON.stringify(result.data, null, 2);
}

export function createExitHandler(): (code: number) => void {
  return (code: number) => {
    process.exit(code);
  };
}

export function handleError(error: unknown): CommandResult<never> {
  if (error instanceof BundleError || error instanceof CryptoError) {
    return { success: false, error: error.message, code: error.code };
  }
  if (error instanceof ConfigError) {
    return { success: false, error: error.message, code: 'E_CONFIG' };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}

export function timing(): { started: number; end: () => Timing } {
  const started = Date.now();
  return {
    started,
    end: () => {
      const completed = Date.now();
      return {
        started,
        completed,
        duration: completed - started,
      };
    },
  };
}

/**
 * Build a loader from command line trust options.
 *
 * Verification is on unless --no-verify is given or PLUGSEAL_VERIFY_SIGNATURES
 * turns it off. Loader logs go to stderr so stdout stays parseable.
 */
export async function createLoader(
  options: TrustOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<BundleLoader> {
  let publicKeyOverride = options.key;
  if (options.keyFile) {
    publicKeyOverride = await readFile(options.keyFile, 'utf8');
  }

  return new BundleLoader({
    verifySignatures: options.verify ?? verifySignaturesFromEnv(env) ?? true,
    publicKeyOverride,
    platform: options.platform,
    logger: createLogger({
      name: 'plugseal-cli',
      level: options.logLevel || env.PLUGSEAL_LOG_LEVEL || 'error',
      destination: process.stderr,
    }),
  });
}

export function check(ok: boolean): string {
  return ok ? chalk.green('[ok]') : chalk.red('[failed]');
}

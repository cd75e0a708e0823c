/**
 * plugseal extract <bundle> (--output <dir> | --temp)
 * Verify and write the library (or JNI bridge) for this platform
 */

import type { CommandResult, ExtractResult, TrustOptions } from '../types.js';
import { createLoader, handleError, timing } from '../utils.js';

export interface ExtractCommandOptions extends TrustOptions {
  /** Destination directory (safe mode) */
  output?: string;
  /** Extract into a fresh temp directory instead */
  temp?: boolean;
  variant?: string;
  /** Extract the JNI bridge rather than the library */
  bridge?: boolean;
}

export class ExtractCommand {
  async execute(
    bundlePath: string,
    options: ExtractCommandOptions = {}
  ): Promise<CommandResult<ExtractResult>> {
    const timer = timing();

    try {
      if (options.output && options.temp) {
        throw new Error('--output and --temp cannot be combined');
      }
      if (!options.output && !options.temp) {
        throw new Error('Either --output <dir> or --temp is required');
      }

      const loader = await createLoader(options);
      const extractOptions = { variant: options.variant };
      const kind = options.bridge ? 'bridge' : 'library';

      let path: string;
      if (options.output) {
        path = options.bridge
          ? await loader.extractBridge(bundlePath, options.output, extractOptions)
          : await loader.extractLibrary(bundlePath, options.output, extractOptions);
      } else {
        path = options.bridge
          ? await loader.extractBridgeToTemp(bundlePath, extractOptions)
          : await loader.extractLibraryToTemp(bundlePath, extractOptions);
      }

      const result: ExtractResult = {
        path,
        kind,
        platform: loader.platform,
        variant: options.variant,
        verified: loader.verifiesSignatures,
      };
      return { success: true, data: result, timing: timer.end() };
    } catch (error) {
      return { ...handleError(error), timing: timer.end() };
    }
  }

  static render(data: ExtractResult): string {
    const verified = data.verified ? 'checksum and signature verified' : 'checksum verified, signatures skipped';
    return [`Extracted ${data.kind} for ${data.platform} (${verified}):`, data.path].join('\n');
  }
}

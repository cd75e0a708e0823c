/**
 * plugseal variants <bundle> [--platform <key>]
 */

import chalk from 'chalk';
import type { CommandResult, TrustOptions, VariantsResult } from '../types.js';
import { createLoader, handleError, timing } from '../utils.js';

export class VariantsCommand {
  async execute(
    bundlePath: string,
    options: Pick<TrustOptions, 'platform' | 'logLevel'> = {}
  ): Promise<CommandResult<VariantsResult>> {
    const timer = timing();

    try {
      const loader = await createLoader({ ...options, verify: false });
      const result: VariantsResult = {
        platform: loader.platform,
        variants: await loader.listVariants(bundlePath),
        default_variant: await loader.getDefaultVariant(bundlePath),
      };
      return { success: true, data: result, timing: timer.end() };
    } catch (error) {
      return { ...handleError(error), timing: timer.end() };
    }
  }

  static render(data: VariantsResult): string {
    const lines = [`Variants for ${chalk.blue(data.platform)}:`];
    for (const variant of data.variants) {
      lines.push(variant === data.default_variant ? `  ${variant} ${chalk.green('(default)')}` : `  ${variant}`);
    }
    return lines.join('\n');
  }
}

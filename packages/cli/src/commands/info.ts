/**
 * plugseal info <bundle>
 * Manifest summary; reads the manifest without verifying signatures
 */

import chalk from 'chalk';
import { defaultVariant, listVariants } from '@plugseal/bundle';
import type { CLIOptions, CommandResult, InfoResult } from '../types.js';
import { createLoader, handleError, timing } from '../utils.js';

export class InfoCommand {
  async execute(bundlePath: string, options: CLIOptions = {}): Promise<CommandResult<InfoResult>> {
    const timer = timing();

    try {
      const loader = await createLoader({ ...options, verify: false });
      const manifest = await loader.getManifest(bundlePath);
      const files = await loader.listFiles(bundlePath);

      const result: InfoResult = {
        bundle: bundlePath,
        bundle_version: manifest.bundle_version,
        plugin: {
          name: manifest.plugin.name,
          version: manifest.plugin.version,
          description: manifest.plugin.description,
          authors: manifest.plugin.authors,
        },
        signed: manifest.public_key !== undefined,
        platforms: Object.entries(manifest.platforms).map(([platform, entry]) => ({
          platform,
          variants: listVariants(entry),
          default_variant: defaultVariant(entry),
        })),
        bridges: Object.keys(manifest.bridges?.jni ?? {}),
        schemas: Object.keys(manifest.schemas),
        build_info: manifest.build_info,
        files: files.length,
      };

      return { success: true, data: result, timing: timer.end() };
    } catch (error) {
      return { ...handleError(error), timing: timer.end() };
    }
  }

  static render(data: InfoResult): string {
    const lines = [
      `${chalk.bold(data.plugin.name)} ${data.plugin.version}`,
    ];
    if (data.plugin.description) {
      lines.push(data.plugin.description);
    }
    lines.push('', `Bundle version: ${data.bundle_version}`);
    lines.push(`Signed: ${data.signed ? chalk.green('yes') : chalk.yellow('no')}`);
    if (data.plugin.authors.length > 0) {
      lines.push(`Authors: ${data.plugin.authors.join(', ')}`);
    }

    lines.push('', 'Platforms:');
    for (const p of data.platforms) {
      const variants = p.variants
        .map((v) => (v === p.default_variant ? chalk.green(`${v} (default)`) : v))
        .join(', ');
      lines.push(`  ${p.platform}: ${variants}`);
    }

    if (data.bridges.length > 0) {
      lines.push('', `JNI bridges: ${data.bridges.join(', ')}`);
    }
    if (data.schemas.length > 0) {
      lines.push('', `Schemas: ${data.schemas.join(', ')}`);
    }
    if (data.build_info?.git) {
      lines.push('', `Built from: ${data.build_info.git.commit}`);
    }
    lines.push('', `Files: ${data.files}`);

    return lines.join('\n');
  }
}

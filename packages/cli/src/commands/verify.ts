/**
 * plugseal verify <bundle>
 * Checks the manifest signature and every artifact without extracting
 */

import chalk from 'chalk';
import type { CommandResult, TrustOptions, VerifyResult } from '../types.js';
import { check, createLoader, handleError, timing } from '../utils.js';

export class VerifyCommand {
  async execute(bundlePath: string, options: TrustOptions = {}): Promise<CommandResult<VerifyResult>> {
    const timer = timing();

    try {
      const loader = await createLoader(options);
      const report = await loader.verifyBundle(bundlePath);

      if (!report.ok) {
        const failed = report.artifacts.filter((a) => !a.ok);
        return {
          success: false,
          data: report,
          error: `${failed.length} of ${report.artifacts.length} artifacts failed verification`,
          code: failed[0].error?.code,
          timing: timer.end(),
        };
      }

      return { success: true, data: report, timing: timer.end() };
    } catch (error) {
      return { ...handleError(error), timing: timer.end() };
    }
  }

  static render(data: VerifyResult): string {
    const lines = [
      `${chalk.bold(data.plugin.name)} ${data.plugin.version}`,
      data.signaturesVerified
        ? `Signatures: verified with key ${data.keyId ?? 'unknown'}`
        : chalk.yellow('Signatures: not verified'),
      '',
    ];
    for (const artifact of data.artifacts) {
      const label = artifact.variant ? `${artifact.name} (${artifact.variant})` : artifact.name;
      lines.push(`${check(artifact.ok)} ${artifact.kind} ${label}: ${artifact.path}`);
      if (artifact.error) {
        lines.push(`    ${chalk.red(artifact.error.code)} ${artifact.error.message}`);
      }
    }
    lines.push('', data.ok ? chalk.green('Bundle verified') : chalk.red('Bundle verification failed'));
    return lines.join('\n');
  }
}

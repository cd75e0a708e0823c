/**
 * plugseal command line program
 * Commands: info, variants, verify, extract, schema, keygen, sign
 */

import { Command } from 'commander';
import { ExtractCommand } from './commands/extract.js';
import { InfoCommand } from './commands/info.js';
import { KeygenCommand } from './commands/keygen.js';
import { SchemaCommand } from './commands/schema.js';
import { SignCommand } from './commands/sign.js';
import { VariantsCommand } from './commands/variants.js';
import { VerifyCommand } from './commands/verify.js';
import type { CommandResult, TrustOptions } from './types.js';
import { createExitHandler, formatOutput } from './utils.js';

export const VERSION = '0.1.0';

type GlobalFlags = {
  json?: boolean;
  logLevel?: string;
};

type TrustFlags = {
  key?: string;
  keyFile?: string;
  verify: boolean;
  platform?: string;
};

export interface ProgramIO {
  print: (text: string) => void;
  exit: (code: number) => void;
}

function trustOptions(flags: TrustFlags, cmd: Command): Omit<TrustOptions, keyof GlobalFlags> {
  return {
    key: flags.key,
    keyFile: flags.keyFile,
    // Unset unless --no-verify was given, so PLUGSEAL_VERIFY_SIGNATURES can apply
    verify: cmd.getOptionValueSource('verify') === 'cli' ? flags.verify : undefined,
    platform: flags.platform,
  };
}

function withTrustFlags(cmd: Command): Command {
  return cmd
    .option('-k, --key <base64>', 'trusted minisign public key (overrides the manifest key)')
    .option('--key-file <path>', 'trusted minisign public key file')
    .option('--no-verify', 'skip signature verification (checksums are still checked)')
    .option('-p, --platform <os-arch>', 'platform key instead of this host');
}

export function createProgram(
  io: ProgramIO = { print: (text) => console.log(text), exit: createExitHandler() }
): Command {
  const program = new Command();

  program
    .name('plugseal')
    .description('Inspect, verify and extract signed plugin bundles')
    .version(VERSION);

  // Global options
  program
    .option('-j, --json', 'output in JSON format')
    .option('--log-level <level>', 'loader log level, written to stderr');

  function report<T>(result: CommandResult<T>, render: (data: T) => string): void {
    const globals = program.opts<GlobalFlags>();
    io.print(formatOutput(result, globals.json, render));
    io.exit(result.success ? 0 : 1);
  }

  // plugseal info <bundle>
  program
    .command('info <bundle>')
    .description('Show the manifest summary of a bundle')
    .action(async (bundle: string) => {
      const result = await new InfoCommand().execute(bundle, program.opts<GlobalFlags>());
      report(result, InfoCommand.render);
    });

  // plugseal variants <bundle>
  program
    .command('variants <bundle>')
    .description('List build variants for a platform')
    .option('-p, --platform <os-arch>', 'platform key instead of this host')
    .action(async (bundle: string, flags: { platform?: string }) => {
      const result = await new VariantsCommand().execute(bundle, {
        ...program.opts<GlobalFlags>(),
        platform: flags.platform,
      });
      report(result, VariantsCommand.render);
    });

  // plugseal verify <bundle>
  withTrustFlags(
    program.command('verify <bundle>').description('Verify the manifest and every artifact')
  ).action(async (bundle: string, flags: TrustFlags, cmd: Command) => {
    const result = await new VerifyCommand().execute(bundle, {
      ...program.opts<GlobalFlags>(),
      ...trustOptions(flags, cmd),
    });
    report(result, VerifyCommand.render);
  });

  // plugseal extract <bundle> (-o <dir> | --temp)
  withTrustFlags(
    program
      .command('extract <bundle>')
      .description('Verify and extract the library for this platform')
      .option('-o, --output <dir>', 'destination directory; existing files are never replaced')
      .option('--temp', 'extract into a fresh temporary directory')
      .option('--variant <name>', 'build variant (default: the platform default)')
      .option('--bridge', 'extract the JNI bridge instead of the library')
  ).action(
    async (
      bundle: string,
      flags: TrustFlags & { output?: string; temp?: boolean; variant?: string; bridge?: boolean },
      cmd: Command
    ) => {
      const result = await new ExtractCommand().execute(bundle, {
        ...program.opts<GlobalFlags>(),
        ...trustOptions(flags, cmd),
        output: flags.output,
        temp: flags.temp,
        variant: flags.variant,
        bridge: flags.bridge,
      });
      report(result, ExtractCommand.render);
    }
  );

  // plugseal schema <bundle> [name]
  program
    .command('schema <bundle> [name]')
    .description('List schemas, or print or extract one')
    .option('-o, --output <dir>', 'write the schema into this directory')
    .action(async (bundle: string, name: string | undefined, flags: { output?: string }) => {
      const result = await new SchemaCommand().execute(bundle, name, {
        ...program.opts<GlobalFlags>(),
        output: flags.output,
      });
      report(result, SchemaCommand.render);
    });

  // plugseal keygen <name>
  program
    .command('keygen <name>')
    .description('Generate <name>.pub and <name>.key')
    .option('-f, --force', 'replace existing key files')
    .action(async (name: string, flags: { force?: boolean }) => {
      const result = await new KeygenCommand().execute(name, {
        ...program.opts<GlobalFlags>(),
        force: flags.force,
      });
      report(result, KeygenCommand.render);
    });

  // plugseal sign <file> -s <key>
  program
    .command('sign <file>')
    .description('Write <file>.minisig')
    .requiredOption('-s, --secret-key <path>', 'secret key file from keygen')
    .option('-c, --comment <text>', 'trusted comment')
    .option('-f, --force', 'replace an existing signature')
    .action(
      async (file: string, flags: { secretKey: string; comment?: string; force?: boolean }) => {
        const result = await new SignCommand().execute(file, {
          ...program.opts<GlobalFlags>(),
          secretKey: flags.secretKey,
          comment: flags.comment,
          force: flags.force,
        });
        report(result, SignCommand.render);
      }
    );

  return program;
}

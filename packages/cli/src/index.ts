/**
 * @plugseal/cli - command line tools for plugin bundles
 * Provides info, variants, verify, extract, schema, keygen and sign commands
 */

export { ExtractCommand } from './commands/extract.js';
export type { ExtractCommandOptions } from './commands/extract.js';
export { InfoCommand } from './commands/info.js';
export { KeygenCommand } from './commands/keygen.js';
export type { KeygenOptions } from './commands/keygen.js';
export { SchemaCommand } from './commands/schema.js';
export type { SchemaCommandOptions } from './commands/schema.js';
export { SignCommand } from './commands/sign.js';
export type { SignOptions } from './commands/sign.js';
export { VariantsCommand } from './commands/variants.js';
export { VerifyCommand } from './commands/verify.js';
export { createProgram, VERSION } from './program.js';
export type { ProgramIO } from './program.js';
export { createExitHandler, createLoader, formatOutput } from './utils.js';
export type * from './types.js';

/**
 * plugseal schema <bundle> [name] [--output <dir>]
 * Without a name, lists schemas; with one, prints or extracts it
 */

import type { CLIOptions, CommandResult, SchemaResult } from '../types.js';
import { createLoader, handleError, timing } from '../utils.js';

export interface SchemaCommandOptions extends CLIOptions {
  output?: string;
}

export class SchemaCommand {
  async execute(
    bundlePath: string,
    name?: string,
    options: SchemaCommandOptions = {}
  ): Promise<CommandResult<SchemaResult>> {
    const timer = timing();

    try {
      const loader = await createLoader({ ...options, verify: false });
      let result: SchemaResult;

      if (!name) {
        const schemas = await loader.getSchemas(bundlePath);
        result = {
          action: 'list',
          schemas: Object.entries(schemas).map(([schemaName, entry]) => ({
            name: schemaName,
            path: entry.path,
            format: entry.format,
          })),
        };
      } else if (options.output) {
        result = {
          action: 'extract',
          name,
          path: await loader.extractSchema(bundlePath, name, options.output),
        };
      } else {
        result = { action: 'read', name, content: await loader.readSchema(bundlePath, name) };
      }

      return { success: true, data: result, timing: timer.end() };
    } catch (error) {
      return { ...handleError(error), timing: timer.end() };
    }
  }

  static render(data: SchemaResult): string {
    switch (data.action) {
      case 'list':
        if (data.schemas.length === 0) return 'No schemas in bundle';
        return data.schemas
          .map((s) => `${s.name}: ${s.path}${s.format ? ` (${s.format})` : ''}`)
          .join('\n');
      case 'read':
        return data.content;
      case 'extract':
        return `Wrote schema ${data.name} to ${data.path}`;
    }
  }
}

import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliInspector, emitValue, getGlobalOptions, getOutput } from '../cli/context.js';

interface InspectOptions {
  field?: string;
}

/**
 * Answer one field for an installed package. Without `--field` the field
 * vocabulary is listed.
 */
async function inspectCommand(
  packageName: string,
  runtime: string,
  options: InspectOptions,
  command: Command
): Promise<void> {
  const globals = getGlobalOptions(command);
  const out = getOutput(globals);
  const inspector = await createCliInspector(globals);

  const field = options.field ?? '';
  const value = await inspector.inspect(packageName, runtime, field);
  emitValue(value, globals, out, field === '' ? 'Available fields' : `${packageName} (${runtime}) ${field}`);
}

export function setupInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Inspect a field of a package installed under a runtime')
    .argument('<package>', 'package name (close misspellings are accepted)')
    .argument('<runtime>', 'runtime version, e.g. 3.12')
    .option('-f, --field <field>', 'field to read; omit to list every field')
    .action(withErrorHandling(async (packageName: string, runtime: string, options: InspectOptions, command: Command) => {
      await inspectCommand(packageName, runtime, options, command);
    }));
}

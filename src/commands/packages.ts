import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliInspector, emitValue, getGlobalOptions, getOutput } from '../cli/context.js';

async function packagesCommand(runtime: string, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const out = getOutput(globals);
  const inspector = await createCliInspector(globals);

  const pairs = await out.task(
    {
      pending: `Reading packages installed under ${runtime}`,
      done: found => `Found ${found.length} packages`
    },
    () => inspector.getVersionPackages(runtime)
  );

  emitValue(pairs, globals, out);
}

export function setupPackagesCommand(program: Command): void {
  program
    .command('packages')
    .alias('ls')
    .description('List packages installed under a runtime with their versions')
    .argument('<runtime>', 'runtime version, e.g. 3.12')
    .action(withErrorHandling(async (runtime: string, _options: object, command: Command) => {
      await packagesCommand(runtime, command);
    }));
}

import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliInspector, emitValue, getGlobalOptions, getOutput } from '../cli/context.js';

/**
 * List installed runtimes, oldest first, with the directory each lives in.
 */
async function runtimesCommand(command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const out = getOutput(globals);
  const inspector = await createCliInspector(globals);

  const paths = await inspector.inspectTarget('runtime_paths', { runtime: null, packageName: null });
  emitValue(paths, globals, out, `Runtimes under ${inspector.config.runtimeRoot}`);
}

export function setupRuntimesCommand(program: Command): void {
  program
    .command('runtimes')
    .description('List installed runtime versions')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      await runtimesCommand(command);
    }));
}

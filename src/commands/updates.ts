import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliInspector, emitValue, getGlobalOptions, getOutput } from '../cli/context.js';

interface UpdatesOptions {
  current?: string;
  includeBetas?: boolean;
}

/**
 * Show releases published after the given (or newest installed) version.
 */
async function updatesCommand(packageName: string, options: UpdatesOptions, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const out = getOutput(globals);
  const inspector = await createCliInspector(globals);

  const updates = await out.task(
    { pending: `Checking releases of ${packageName}`, failed: 'Check failed' },
    () => inspector.listUpdates(packageName, options.current, { includeBetas: options.includeBetas })
  );

  if (globals.json) {
    emitValue(updates, globals, out);
  } else if (updates === null) {
    out.success(`${packageName} is up to date`);
  } else {
    emitValue(updates, globals, out, `${updates.length} newer release(s) of ${packageName}`);
  }
}

export function setupUpdatesCommand(program: Command): void {
  program
    .command('updates')
    .description('List releases newer than an installed or given version')
    .argument('<package>', 'package name')
    .option('-c, --current <version>', 'compare against this version instead of the installed one')
    .option('--include-betas', 'include pre-releases (not supported yet)')
    .action(withErrorHandling(async (packageName: string, options: UpdatesOptions, command: Command) => {
      await updatesCommand(packageName, options, command);
    }));
}

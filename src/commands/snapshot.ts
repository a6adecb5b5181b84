import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliInspector, emitValue, getGlobalOptions, getOutput } from '../cli/context.js';
import { SNAPSHOT_OPTIONS } from '../core/snapshot/snapshot.js';

async function snapshotCommand(option: string, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const out = getOutput(globals);
  const inspector = await createCliInspector(globals);

  const snapshot = await out.task(
    { pending: 'Collecting environment snapshot', done: taken => `Snapshot taken at ${taken.takenAt}` },
    () => inspector.snapshot(option)
  );

  if (globals.json) {
    emitValue(snapshot, globals, out);
    return;
  }
  for (const [field, value] of Object.entries(snapshot.data)) {
    emitValue(value, globals, out, field);
  }
}

export function setupSnapshotCommand(program: Command): void {
  program
    .command('snapshot')
    .description('Capture environment-wide listings in one pass')
    .argument('[option]', `one of: ${SNAPSHOT_OPTIONS.join(', ')}`, 'all')
    .action(withErrorHandling(async (option: string, _options: object, command: Command) => {
      await snapshotCommand(option, command);
    }));
}

import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliInspector, emitValue, getGlobalOptions, getOutput } from '../cli/context.js';

interface RemoteOptions {
  field?: string;
  ecosystem?: string;
}

async function remoteCommand(packageName: string, options: RemoteOptions, command: Command): Promise<void> {
  const globals = getGlobalOptions(command);
  const out = getOutput(globals);
  const inspector = await createCliInspector(globals);

  const field = options.field ?? '';
  const value = await out.task(
    { pending: `Fetching ${field || 'field list'} for ${packageName}`, failed: 'Request failed' },
    () => inspector.inspectRemote(packageName, field, options.ecosystem)
  );
  emitValue(value, globals, out, field === '' ? 'Remote fields' : `${packageName} ${field}`);
}

export function setupRemoteCommand(program: Command): void {
  program
    .command('remote')
    .description('Read release history and ecosystem statistics for a published package')
    .argument('<package>', 'package name as published')
    .option('-f, --field <field>', 'remote field to read; omit to list remote fields')
    .option('-e, --ecosystem <ecosystem>', 'statistics ecosystem (default from config)')
    .action(withErrorHandling(async (packageName: string, options: RemoteOptions, command: Command) => {
      await remoteCommand(packageName, options, command);
    }));
}

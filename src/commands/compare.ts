import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCliInspector, emitValue, getGlobalOptions, getOutput } from '../cli/context.js';
import { formatScalar } from '../utils/formatters.js';

interface CompareOptions {
  field: string;
  op?: string;
}

async function compareCommand(
  packageName: string,
  runtimeA: string,
  runtimeB: string,
  options: CompareOptions,
  command: Command
): Promise<void> {
  const globals = getGlobalOptions(command);
  const out = getOutput(globals);
  const inspector = await createCliInspector(globals);

  const comparison = await inspector.compareAcrossRuntimes(packageName, runtimeA, runtimeB, options.field, options.op);
  if (globals.json) {
    emitValue(comparison, globals, out);
    return;
  }

  const [labelA, labelB] = comparison.runtimes;
  const lines = [
    `${labelA}: ${formatScalar(comparison.values[0])}`,
    `${labelB}: ${formatScalar(comparison.values[1])}`
  ];
  if (comparison.result !== null) {
    lines.push(`${labelA} ${options.op} ${labelB}: ${comparison.result}`);
  }
  out.note(lines.join('\n'), `${comparison.packageName} ${comparison.field}`);
}

export function setupCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Compare one field of a package across two runtimes')
    .argument('<package>', 'package name')
    .argument('<runtimeA>', 'first runtime version')
    .argument('<runtimeB>', 'second runtime version')
    .requiredOption('-f, --field <field>', 'field to compare')
    .option('--op <op>', 'operator: ==, !=, >, >=, <, <= (or eq, ne, gt, ge, lt, le)')
    .action(withErrorHandling(async (
      packageName: string,
      runtimeA: string,
      runtimeB: string,
      options: CompareOptions,
      command: Command
    ) => {
      await compareCommand(packageName, runtimeA, runtimeB, options, command);
    }));
}

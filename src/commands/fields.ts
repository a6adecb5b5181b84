import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { emitValue, getGlobalOptions, getOutput } from '../cli/context.js';
import { searchFields } from '../core/metadata/field-vocabulary.js';

export function setupFieldsCommand(program: Command): void {
  program
    .command('fields')
    .description('List the field names that inspect, remote and compare accept')
    .argument('[search]', 'only show fields loosely matching this term')
    .action(withErrorHandling(async (term: string | undefined, _options: object, command: Command) => {
      const globals = getGlobalOptions(command);
      const names = searchFields(term ?? '');
      emitValue(names, globals, getOutput(globals), term ? `Fields matching '${term}'` : 'Available fields');
    }));
}

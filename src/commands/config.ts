import { Command } from 'commander';

import { withErrorHandling, InvalidArgumentError } from '../utils/errors.js';
import { emitValue, getGlobalOptions, getOutput } from '../cli/context.js';
import { CONFIG_KEYS, coerceConfigValue, configManager, isConfigKey } from '../core/config.js';
import type { PkgsightConfig } from '../types/index.js';

function requireKey(key: string): keyof PkgsightConfig {
  if (!isConfigKey(key)) {
    throw new InvalidArgumentError(`Unknown configuration key '${key}'. Valid keys: ${CONFIG_KEYS.join(', ')}`, { key });
  }
  return key;
}

/**
 * Configuration commands: the effective settings, single values, and
 * persisted changes to config.jsonc.
 */
export function setupConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Show or change pkgsight settings');

  config
    .command('list', { isDefault: true })
    .description('Show the effective configuration')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const globals = getGlobalOptions(command);
      const resolved = await configManager.resolve();
      emitValue(resolved, globals, getOutput(globals), await configManager.getConfigFilePath());
    }));

  config
    .command('get')
    .description('Print one effective setting')
    .argument('<key>', `one of: ${CONFIG_KEYS.join(', ')}`)
    .action(withErrorHandling(async (key: string, _options: object, command: Command) => {
      const globals = getGlobalOptions(command);
      emitValue(await configManager.get(requireKey(key)), globals, getOutput(globals));
    }));

  config
    .command('set')
    .description('Persist a setting (lists are comma separated)')
    .argument('<key>', `one of: ${CONFIG_KEYS.join(', ')}`)
    .argument('<value>', 'new value')
    .action(withErrorHandling(async (key: string, value: string, _options: object, command: Command) => {
      const out = getOutput(getGlobalOptions(command));
      const configKey = requireKey(key);
      await configManager.set(configKey, coerceConfigValue(configKey, value));
      out.success(`${configKey} saved to ${await configManager.getConfigFilePath()}`);
    }));

  config
    .command('path')
    .description('Print the configuration file location')
    .action(withErrorHandling(async () => {
      console.log(await configManager.getConfigFilePath());
    }));
}

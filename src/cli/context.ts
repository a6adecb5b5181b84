/**
 * CLI Context Factory
 *
 * Turns the global command-line options into an inspection session and an
 * output port. Command handlers use this instead of building either
 * themselves so `--root`, `--workers` and `--json` apply everywhere.
 */

import type { Command } from 'commander';
import type { GlobalOptions, PkgsightConfig } from '../types/index.js';
import { createPkgInspector } from '../api.js';
import type { PkgInspector } from '../core/inspector.js';
import { coerceConfigValue } from '../core/config.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput } from './clack-output-adapter.js';
import { formatValue, toJsonValue } from '../utils/formatters.js';

let cachedClackOutput: OutputPort | undefined;

/** Read the program-level options from any (sub)command. */
export function getGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    root: typeof opts.root === 'string' ? opts.root : undefined,
    workers: typeof opts.workers === 'string' ? opts.workers : undefined,
    verbose: opts.verbose === true,
    json: opts.json === true
  };
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(): boolean {
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

/**
 * Clack output on a terminal, plain console output when piped, in CI, or
 * when JSON was requested.
 */
export function getOutput(globals: GlobalOptions): OutputPort {
  if (globals.json || !detectInteractive()) {
    return consoleOutput;
  }
  cachedClackOutput ??= createClackOutput();
  return cachedClackOutput;
}

export function configOverrides(globals: GlobalOptions): PkgsightConfig {
  return {
    runtimeRoot: globals.root,
    maxWorkers: globals.workers === undefined ? undefined : coerceConfigValue('maxWorkers', globals.workers)
  };
}

export async function createCliInspector(globals: GlobalOptions): Promise<PkgInspector> {
  return createPkgInspector(configOverrides(globals));
}

/**
 * Print an inspected value: JSON on stdout under `--json`, otherwise
 * formatted lines through the output port.
 */
export function emitValue(value: unknown, globals: GlobalOptions, out: OutputPort, title?: string): void {
  if (globals.json) {
    console.log(JSON.stringify(toJsonValue(value), null, 2));
    return;
  }
  const text = formatValue(value).join('\n');
  if (title) {
    out.note(text, title);
  } else {
    out.message(text);
  }
}

/**
 * Plain console adapter, used when stdout is piped, in CI, and under --json.
 * Results go to stdout, warnings to stderr, and no progress is drawn.
 */

import pico from 'picocolors';
import type { OutputPort, TaskMessages } from './output.js';

export const consoleOutput: OutputPort = {
  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`${pico.green('✓')} ${message}`);
  },

  warn(message: string): void {
    console.error(`${pico.yellow('⚠')} ${message}`);
  },

  note(content: string, title?: string): void {
    console.log(title ? `${pico.bold(title)}\n${content}` : content);
  },

  task<T>(_messages: TaskMessages<T>, work: () => Promise<T>): Promise<T> {
    return work();
  }
};

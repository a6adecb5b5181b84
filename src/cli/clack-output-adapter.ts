/**
 * Interactive terminal adapter backed by @clack/prompts.
 */

import { log, note, spinner } from '@clack/prompts';
import type { OutputPort, TaskMessages } from '../core/ports/output.js';

export function createClackOutput(): OutputPort {
  return {
    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      note(content, title ?? '');
    },

    async task<T>(messages: TaskMessages<T>, work: () => Promise<T>): Promise<T> {
      const s = spinner();
      s.start(messages.pending);
      let result: T;
      try {
        result = await work();
      } catch (error) {
        s.stop(messages.failed ?? 'Failed', 1);
        throw error;
      }
      s.stop(messages.done ? messages.done(result) : messages.pending);
      return result;
    }
  };
}

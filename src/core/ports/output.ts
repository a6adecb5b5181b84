/**
 * Where command results and progress go. Commands never print through
 * console or @clack/prompts directly; `getOutput` picks the adapter.
 */

export interface TaskMessages<T> {
  /** Shown while the work runs */
  pending: string;
  /** Final line once the work resolves; omitted means the indicator just clears */
  done?: (result: T) => string;
  failed?: string;
}

export interface OutputPort {
  /** Plain result text */
  message(message: string): void;

  success(message: string): void;

  warn(message: string): void;

  /** Result block under a heading */
  note(content: string, title?: string): void;

  /**
   * Run `work` behind a progress indicator. The indicator is cleared whether
   * the work resolves or rejects; rejections propagate.
   */
  task<T>(messages: TaskMessages<T>, work: () => Promise<T>): Promise<T>;
}

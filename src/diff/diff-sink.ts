import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';

/** Where rendered diff text goes. The default is the terminal (stdout). */
export interface DiffSink {
  write(text: string): void;
}

/** Highlighting for the two sides of a difference. */
export interface DiffPalette {
  /** Text present in the golden file but not in the actual output. */
  deleted(text: string): string;
  /** Text present in the actual output but not in the golden file. */
  inserted(text: string): string;
}

export const stdoutSink: DiffSink = {
  write(text: string): void {
    process.stdout.write(text);
  },
};

export function chalkPalette(instance: ChalkInstance = chalk): DiffPalette {
  return {
    deleted: (text) => instance.red(text),
    inserted: (text) => instance.green(text),
  };
}

import { computeChunks } from './chunks.js';
import { LineCursor } from './line-cursor.js';
import type { DiffPalette, DiffSink } from './diff-sink.js';
import { chalkPalette, stdoutSink } from './diff-sink.js';

export interface DiffReporterOptions {
  readonly sink?: DiffSink;
  readonly palette?: DiffPalette;
}

/**
 * Renders the differences between two text windows and counts them.
 */
export class DiffReporter {
  private readonly sink: DiffSink;
  private readonly palette: DiffPalette;

  constructor(options: DiffReporterOptions = {}) {
    this.sink = options.sink ?? stdoutSink;
    this.palette = options.palette ?? chalkPalette();
  }

  /**
   * Prints `oldText` vs `newText` and returns the number of differences:
   * maximal runs of non-equal chunks, so a replaced fragment (delete followed
   * by insert) counts once. Zero means the windows are identical and nothing
   * was printed.
   */
  compare(oldText: string, newText: string): number {
    const oldCursor = new LineCursor(oldText, this.sink, this.palette);
    const newCursor = new LineCursor(newText, this.sink, this.palette);

    let differences = 0;
    let inDifference = false;

    for (const chunk of computeChunks(oldText, newText)) {
      const length = chunk.text.length;
      switch (chunk.op) {
        case 'equal':
          oldCursor.advance(length, 'equal', true);
          newCursor.advance(length, 'equal', false);
          inDifference = false;
          continue;
        case 'delete':
          oldCursor.advance(length, 'delete', true);
          break;
        case 'insert':
          // The old side already printed this line's prefix.
          newCursor.advance(length, 'insert', false);
          break;
      }
      if (!inDifference) {
        differences++;
        inDifference = true;
      }
    }

    if (differences !== 0) {
      this.sink.write('\n');
    }
    return differences;
  }
}

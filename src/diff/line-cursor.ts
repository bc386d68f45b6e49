import type { ChunkOp } from './chunks.js';
import type { DiffPalette, DiffSink } from './diff-sink.js';

/**
 * Walks one side (golden or actual) of a comparison window and renders it
 * as chunks are applied.
 *
 * Chunks do not respect line boundaries. The cursor only reconstructs the
 * current line when a difference forces a print: the unprinted prefix of the
 * line is emitted before the first difference, and the rest of the line is
 * emitted from the following equal chunk(s).
 *
 * Offsets are UTF-16 code-unit indices into `source`, the same unit the
 * diff chunks are measured in.
 */
export class LineCursor {
  private offset = 0;
  private lineStart = 0;
  private hasPrinted = false;

  constructor(
    private readonly source: string,
    private readonly sink: DiffSink,
    private readonly palette: DiffPalette
  ) {}

  /**
   * Consume the next `length` units of the source.
   *
   * `printEqualRuns` says whether this side echoes shared context. Only one
   * side of an equal pair should, or context is printed twice.
   */
  advance(length: number, op: ChunkOp, printEqualRuns: boolean): void {
    const start = this.offset;
    const end = start + length;

    if (op !== 'equal') {
      if (!this.hasPrinted && printEqualRuns) {
        this.sink.write(this.source.slice(this.lineStart, start));
      }
      this.hasPrinted = true;
      const text = this.source.slice(start, end);
      this.sink.write(op === 'delete' ? this.palette.deleted(text) : this.palette.inserted(text));
    }

    let firstNewline = -1;
    for (let i = start; i < end; i++) {
      if (this.source.charCodeAt(i) === 0x0a) {
        if (firstNewline === -1) firstNewline = i;
        this.lineStart = i + 1;
      }
    }

    // Finish the line a difference was printed on.
    if (op === 'equal' && this.hasPrinted && printEqualRuns) {
      let stop = end;
      if (firstNewline !== -1) {
        this.hasPrinted = false;
        stop = firstNewline + 1;
      }
      this.sink.write(this.source.slice(start, stop));
    }

    this.offset = end;
  }
}

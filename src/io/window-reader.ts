import type { Readable } from 'stream';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FsError } from './fs-error.js';
import { mapFsError } from './fs-error.js';

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

/**
 * Reads a stream in fixed-size windows, whatever chunk sizes the stream
 * (or a decompressor in front of it) produces.
 */
export class WindowReader {
  private pending: Buffer = Buffer.alloc(0);
  private exhausted = false;

  private constructor(
    private readonly stream: Readable,
    private readonly source: AsyncIterator<unknown>,
    private readonly label: string
  ) {}

  static from(stream: Readable, label: string): WindowReader {
    return new WindowReader(stream, stream[Symbol.asyncIterator](), label);
  }

  /** Up to `size` bytes; an empty buffer once the stream is fully consumed. */
  next(size: number): ResultAsync<Buffer, FsError> {
    return RA.fromPromise(this.fill(size), (e) => mapFsError(e, this.label));
  }

  close(): void {
    this.stream.destroy();
  }

  private async fill(size: number): Promise<Buffer> {
    while (this.pending.length < size && !this.exhausted) {
      const step = await this.source.next();
      if (step.done) {
        this.exhausted = true;
        break;
      }
      this.pending = Buffer.concat([this.pending, toBuffer(step.value)]);
    }

    const window = this.pending.subarray(0, size);
    this.pending = this.pending.subarray(size);
    return window;
  }
}

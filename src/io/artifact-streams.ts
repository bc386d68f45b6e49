import * as fs from 'fs/promises';
import * as path from 'path';
import * as zlib from 'zlib';
import { pipeline } from 'stream';
import { finished, pipeline as pipelineAsync } from 'stream/promises';
import type { Readable, Writable } from 'stream';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FsError } from './fs-error.js';
import { mapFsError } from './fs-error.js';

const COMPRESSED_EXTENSION = '.gz';

/**
 * A writable artifact plus a handle that settles once everything written to
 * `stream` (compressed, where applicable) is on disk.
 */
export interface ArtifactWriter {
  readonly stream: Writable;
  readonly done: ResultAsync<void, FsError>;
}

export interface StreamPair {
  readonly golden: Readable;
  readonly actual: Readable;
}

/** True when the final extension marks a gzip artifact. */
export function isCompressedArtifact(filePath: string): boolean {
  return path.extname(filePath) === COMPRESSED_EXTENSION;
}

/**
 * Create or truncate `filePath` for writing. `.gz` paths are gzip-compressed
 * at the highest level; everything else is written raw.
 */
export function openArtifactWriter(filePath: string): ResultAsync<ArtifactWriter, FsError> {
  return RA.fromPromise(fs.open(filePath, 'w'), (e) => mapFsError(e, filePath)).map((handle) => {
    const file = handle.createWriteStream();

    if (!isCompressedArtifact(filePath)) {
      return { stream: file, done: RA.fromPromise(finished(file), (e) => mapFsError(e, filePath)) };
    }

    const gzip = zlib.createGzip({ level: zlib.constants.Z_BEST_COMPRESSION });
    return { stream: gzip, done: RA.fromPromise(pipelineAsync(gzip, file), (e) => mapFsError(e, filePath)) };
  });
}

/**
 * Open `filePath` for reading, decompressing `.gz` paths transparently.
 * A missing file is an `FS_NOT_FOUND` error, never an empty stream.
 */
export function openArtifactReader(filePath: string): ResultAsync<Readable, FsError> {
  return RA.fromPromise(fs.open(filePath, 'r'), (e) => mapFsError(e, filePath)).map((handle): Readable => {
    const file = handle.createReadStream();

    if (!isCompressedArtifact(filePath)) {
      return file;
    }

    const gunzip = zlib.createGunzip();
    // pipeline destroys both streams on failure, so read errors (and early
    // close by the consumer) reach whoever iterates `gunzip`.
    pipeline(file, gunzip, (e) => {
      if (e && !gunzip.destroyed) gunzip.destroy(e);
    });
    return gunzip;
  });
}

/** Golden and staged readers for one registered path, golden opened first. */
export function openStreamPair(goldenPath: string, stagedPath: string): ResultAsync<StreamPair, FsError> {
  return openArtifactReader(goldenPath).andThen((golden) =>
    openArtifactReader(stagedPath)
      .map((actual) => ({ golden, actual }))
      .mapErr((e) => {
        golden.destroy();
        return e;
      })
  );
}

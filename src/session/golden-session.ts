import * as fs from 'fs/promises';
import * as path from 'path';
import type { Writable } from 'stream';
import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, err, errAsync, ok, okAsync } from 'neverthrow';
import type { GoldenConfig, GoldenMode } from '../config/golden-config.js';
import { loadGoldenConfig } from '../config/golden-config.js';
import type { Logger } from '../core/logging/index.js';
import { createLogger } from '../core/logging/index.js';
import { DiffReporter } from '../diff/diff-reporter.js';
import type { DiffPalette, DiffSink } from '../diff/diff-sink.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, GoldenError } from '../errors/golden-error.js';
import type { ArtifactWriter } from '../io/artifact-streams.js';
import { openStreamPair } from '../io/artifact-streams.js';
import { mapFsError } from '../io/fs-error.js';
import { WindowReader } from '../io/window-reader.js';
import { assertNever } from '../runtime/assert-never.js';
import type { ArtifactPath } from '../stage/artifact-path.js';
import { parseArtifactPath } from '../stage/artifact-path.js';
import { ArtifactStage } from '../stage/artifact-stage.js';

/**
 * active -> finalizing -> done.
 * Writers are only handed out while active; finalize runs once.
 */
export type SessionState = 'active' | 'finalizing' | 'done';

export interface GoldenSessionOptions {
  /** Verify or update. Read from UPDATE_GOLDEN when omitted. */
  readonly mode?: GoldenMode;
  /** Bytes compared per window. Read from GOLDEN_WINDOW_BYTES (default 1024) when omitted. */
  readonly windowBytes?: number;
  readonly logger?: Logger;
  readonly sink?: DiffSink;
  readonly palette?: DiffPalette;
}

interface TrackedWriter {
  readonly path: ArtifactPath;
  readonly writer: ArtifactWriter;
}

function resolveConfig(options: GoldenSessionOptions): Result<GoldenConfig, ConfigInvalidError> {
  if (options.windowBytes !== undefined && !(Number.isInteger(options.windowBytes) && options.windowBytes > 0)) {
    return err(Err.configInvalid([{ path: 'windowBytes', message: 'windowBytes must be a positive integer' }]));
  }
  if (options.mode !== undefined && options.windowBytes !== undefined) {
    return ok({ mode: options.mode, windowBytes: options.windowBytes });
  }
  return loadGoldenConfig({ env: process.env }).map((config) => ({
    mode: options.mode ?? config.mode,
    windowBytes: options.windowBytes ?? config.windowBytes,
  }));
}

/**
 * Captures a test's output files and, once, either verifies them against the
 * golden files under `goldenRoot` or promotes them over those golden files.
 *
 * Usage:
 * ```typescript
 * const session = expectOk(await GoldenSession.create('tests/golden'), 'create');
 * expectOk(await session.write('report.txt', render()), 'write');
 * expectOk(await session.finish(), 'finish');
 * ```
 * `withGoldenSession` wraps this and skips finalize when the body throws.
 */
export class GoldenSession {
  private state: SessionState = 'active';
  private readonly writers: TrackedWriter[] = [];

  private constructor(
    readonly goldenRoot: string,
    private readonly stage: ArtifactStage,
    readonly config: GoldenConfig,
    private readonly reporter: DiffReporter,
    private readonly logger: Logger
  ) {}

  static create(goldenRoot: string, options: GoldenSessionOptions = {}): ResultAsync<GoldenSession, GoldenError> {
    const config = resolveConfig(options);
    if (config.isErr()) return errAsync(config.error);

    const logger = options.logger ?? createLogger('golden-session');
    const reporter = new DiffReporter({ sink: options.sink, palette: options.palette });

    return ArtifactStage.create(logger).map(
      (stage) => new GoldenSession(path.resolve(goldenRoot), stage, config.value, reporter, logger)
    );
  }

  get currentState(): SessionState {
    return this.state;
  }

  get stageRoot(): string {
    return this.stage.root;
  }

  /** Registered paths, in request order. */
  paths(): readonly string[] {
    return this.stage.paths();
  }

  /**
   * Writer for `relativePath` under the stage. The caller ends it; any writer
   * still open when the session finalizes is ended then.
   */
  file(relativePath: string): ResultAsync<Writable, GoldenError> {
    return this.openTracked(relativePath).map((tracked) => tracked.writer.stream);
  }

  /** Write `content` as the whole of `relativePath` and wait until it is staged. */
  write(relativePath: string, content: string | Uint8Array): ResultAsync<void, GoldenError> {
    return this.openTracked(relativePath).andThen(({ path: artifact, writer }) => {
      writer.stream.end(content);
      return writer.done.mapErr((e) => Err.ioFailed('write', artifact, e));
    });
  }

  /**
   * Verify or update, depending on the configured mode. Runs at most once;
   * the stage is left in place (see `finish`).
   */
  finalize(): ResultAsync<void, GoldenError> {
    if (this.state !== 'active') return errAsync(Err.sessionClosed('finalize'));
    this.state = 'finalizing';

    const paths = this.stage.paths();
    const mode = this.config.mode;

    return this.flushWriters().andThen(() => {
      switch (mode.kind) {
        case 'update':
          return this.update(paths);
        case 'verify':
          return this.verify(paths);
        default:
          return assertNever(mode);
      }
    });
  }

  /**
   * Finalize, then remove the stage. When finalize already failed, a cleanup
   * failure is only logged and the finalize error is returned. After an
   * explicit `finalize()` only the stage removal runs.
   */
  finish(): ResultAsync<void, GoldenError> {
    if (this.state === 'finalizing') return this.teardown();
    return this.finalize()
      .orElse((failure) => this.teardownLogged().andThen(() => errAsync(failure)))
      .andThen(() => this.teardown());
  }

  /**
   * Release the session without verifying or updating anything. Used when the
   * test body failed.
   */
  abandon(): ResultAsync<void, never> {
    if (this.state === 'done') return okAsync(undefined);
    for (const { writer } of this.writers) {
      writer.stream.destroy();
    }
    if (this.state === 'active') {
      this.logger.debug({ root: this.stage.root }, 'Golden session abandoned; finalize skipped');
    }
    return this.teardownLogged();
  }

  private openTracked(relativePath: string): ResultAsync<TrackedWriter, GoldenError> {
    if (this.state !== 'active') return errAsync(Err.sessionClosed('file'));

    const parsed = parseArtifactPath(relativePath);
    if (parsed.isErr()) return errAsync(parsed.error);
    const artifact = parsed.value;

    return this.stage.openWriter(artifact).map((writer) => {
      const tracked = { path: artifact, writer };
      this.writers.push(tracked);
      return tracked;
    });
  }

  private flushWriters(): ResultAsync<void, GoldenError> {
    for (const { path: artifact, writer } of this.writers) {
      if (!writer.stream.writableEnded && !writer.stream.destroyed) {
        this.logger.warn({ path: artifact }, 'Writer still open at finalize; ending it');
        writer.stream.end();
      }
    }

    return this.writers.reduce<ResultAsync<void, GoldenError>>(
      (chain, { path: artifact, writer }) =>
        chain.andThen(() => writer.done.mapErr((e) => Err.ioFailed('write', artifact, e))),
      okAsync(undefined)
    );
  }

  private update(paths: readonly ArtifactPath[]): ResultAsync<void, GoldenError> {
    return paths.reduce<ResultAsync<void, GoldenError>>(
      (chain, artifact) => chain.andThen(() => this.promote(artifact)),
      okAsync(undefined)
    );
  }

  private promote(artifact: ArtifactPath): ResultAsync<void, GoldenError> {
    const target = path.join(this.goldenRoot, artifact);
    const dir = path.dirname(target);

    return RA.fromPromise(fs.mkdir(dir, { recursive: true }), (e) => Err.ioFailed('copy', artifact, mapFsError(e, dir)))
      .andThen(() =>
        RA.fromPromise(fs.copyFile(this.stage.stagedPath(artifact), target), (e) =>
          Err.ioFailed('copy', artifact, mapFsError(e, target))
        )
      )
      .map(() => {
        this.logger.info({ path: artifact, golden: target }, 'Golden file updated');
      });
  }

  private verify(paths: readonly ArtifactPath[]): ResultAsync<void, GoldenError> {
    return paths
      .reduce<ResultAsync<void, GoldenError>>(
        (chain, artifact) => chain.andThen(() => this.verifyPath(artifact)),
        okAsync(undefined)
      )
      .map(() => {
        this.logger.debug({ count: paths.length }, 'Golden files verified');
      });
  }

  private verifyPath(artifact: ArtifactPath): ResultAsync<void, GoldenError> {
    const goldenPath = path.join(this.goldenRoot, artifact);
    const stagedPath = this.stage.stagedPath(artifact);

    return openStreamPair(goldenPath, stagedPath)
      .mapErr((e) => Err.ioFailed('open', artifact, e))
      .andThen(({ golden, actual }) => {
        const goldenWindows = WindowReader.from(golden, goldenPath);
        const actualWindows = WindowReader.from(actual, stagedPath);
        const release = (): void => {
          goldenWindows.close();
          actualWindows.close();
        };

        return this.compareWindows(artifact, goldenWindows, actualWindows)
          .map(release)
          .mapErr((e) => {
            release();
            return e;
          });
      });
  }

  private compareWindows(
    artifact: ArtifactPath,
    golden: WindowReader,
    actual: WindowReader
  ): ResultAsync<void, GoldenError> {
    return golden
      .next(this.config.windowBytes)
      .andThen((oldWindow) => actual.next(this.config.windowBytes).map((newWindow) => ({ oldWindow, newWindow })))
      .mapErr((e) => Err.ioFailed('read', artifact, e))
      .andThen(({ oldWindow, newWindow }): ResultAsync<void, GoldenError> => {
        if (oldWindow.length === 0 && newWindow.length === 0) return okAsync(undefined);

        // A multi-byte character split across windows decodes lossily on both sides.
        const differences = this.reporter.compare(oldWindow.toString('utf8'), newWindow.toString('utf8'));
        if (differences !== 0) {
          this.logger.error({ path: artifact, differences }, 'Golden file mismatch');
          return errAsync(Err.verificationMismatch(artifact, differences));
        }
        return this.compareWindows(artifact, golden, actual);
      });
  }

  private teardown(): ResultAsync<void, GoldenError> {
    this.state = 'done';
    return this.stage.destroy();
  }

  private teardownLogged(): ResultAsync<void, never> {
    return this.teardown().orElse((cleanupError) => {
      this.logger.warn({ err: cleanupError }, 'Stage cleanup failed');
      return okAsync(undefined);
    });
  }
}

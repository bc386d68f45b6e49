import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { Err } from '../errors/factories.js';
import type { GoldenError, StagingFailedError } from '../errors/golden-error.js';
import { mapFsError } from '../io/fs-error.js';
import type { ArtifactWriter } from '../io/artifact-streams.js';
import { openArtifactWriter } from '../io/artifact-streams.js';
import type { ArtifactPath } from './artifact-path.js';

const STAGE_PREFIX = 'golden-stage-';

/**
 * Isolated temporary directory holding a session's candidate output.
 *
 * Owned by exactly one session; nothing else reads or writes under `root`.
 * Registered paths are kept once each, in first-request order.
 */
export class ArtifactStage {
  private readonly registered: ArtifactPath[] = [];

  private constructor(
    readonly root: string,
    private readonly logger: Logger
  ) {}

  static create(logger: Logger): ResultAsync<ArtifactStage, StagingFailedError> {
    const prefix = path.join(os.tmpdir(), STAGE_PREFIX);
    return RA.fromPromise(fs.mkdtemp(prefix), (e) => Err.stagingFailed('create', prefix, mapFsError(e, prefix))).map(
      (root) => {
        logger.debug({ root }, 'Created artifact stage');
        return new ArtifactStage(root, logger);
      }
    );
  }

  stagedPath(artifact: ArtifactPath): string {
    return path.join(this.root, artifact);
  }

  paths(): readonly ArtifactPath[] {
    return [...this.registered];
  }

  /**
   * Open (create or truncate) the staged file for `artifact`, creating parent
   * directories. Requesting the same path again overwrites the staged file.
   */
  openWriter(artifact: ArtifactPath): ResultAsync<ArtifactWriter, GoldenError> {
    const target = this.stagedPath(artifact);
    const dir = path.dirname(target);

    return RA.fromPromise(fs.mkdir(dir, { recursive: true }), (e) =>
      Err.stagingFailed('mkdir', dir, mapFsError(e, dir))
    )
      .andThen(() => openArtifactWriter(target).mapErr((e) => Err.ioFailed('open', artifact, e)))
      .map((writer) => {
        if (!this.registered.includes(artifact)) {
          this.registered.push(artifact);
        }
        this.logger.debug({ path: artifact }, 'Staged artifact writer opened');
        return writer;
      });
  }

  /** Recursively remove the stage directory. */
  destroy(): ResultAsync<void, StagingFailedError> {
    return RA.fromPromise(fs.rm(this.root, { recursive: true, force: true }), (e) =>
      Err.stagingFailed('destroy', this.root, mapFsError(e, this.root))
    );
  }
}

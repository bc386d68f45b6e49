// Session (the entry points tests use)
export { GoldenSession } from './session/golden-session.js';
export type { GoldenSessionOptions, SessionState } from './session/golden-session.js';
export { withGoldenSession, GoldenSessionFailure } from './session/with-golden-session.js';

// Configuration
export { loadGoldenConfig, DEFAULT_WINDOW_BYTES } from './config/golden-config.js';
export type { GoldenConfig, GoldenMode, LoadGoldenConfigOptions } from './config/golden-config.js';

// Diff rendering
export { DiffReporter } from './diff/diff-reporter.js';
export type { DiffReporterOptions } from './diff/diff-reporter.js';
export { LineCursor } from './diff/line-cursor.js';
export { computeChunks } from './diff/chunks.js';
export type { ChunkOp, DiffChunk } from './diff/chunks.js';
export { chalkPalette, stdoutSink } from './diff/diff-sink.js';
export type { DiffPalette, DiffSink } from './diff/diff-sink.js';

// Artifact streams and staging
export { isCompressedArtifact, openArtifactReader, openArtifactWriter, openStreamPair } from './io/artifact-streams.js';
export type { ArtifactWriter, StreamPair } from './io/artifact-streams.js';
export { WindowReader } from './io/window-reader.js';
export type { FsError, FsErrorCode } from './io/fs-error.js';
export { ArtifactStage } from './stage/artifact-stage.js';
export { parseArtifactPath } from './stage/artifact-path.js';
export type { ArtifactPath } from './stage/artifact-path.js';

// Errors
export { Err, formatGoldenError } from './errors/index.js';
export type * from './errors/golden-error.js';

// Logging
export { createLogger } from './core/logging/index.js';
export type { Logger, LogLevel } from './core/logging/index.js';

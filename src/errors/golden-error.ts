import type { FsErrorCode } from '../io/fs-error.js';

/**
 * Error Hierarchy - Discriminated Unions
 *
 * Errors are data. Everything a session can fail with is one of these,
 * keyed by `_tag`, and rendered for humans by `formatGoldenError`.
 */

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

// ============================================================================
// Staging (temporary directory and registered paths)
// ============================================================================

export type StagingFailedError = Readonly<{
  readonly _tag: 'StagingFailed';
  readonly operation: 'create' | 'mkdir' | 'destroy';
  readonly path: string;
  readonly message: string;
}>;

export type InvalidArtifactPathError = Readonly<{
  readonly _tag: 'InvalidArtifactPath';
  readonly path: string;
  readonly reason: 'empty' | 'absolute' | 'escapes_root';
  readonly message: string;
}>;

// ============================================================================
// Finalize (verify / update)
// ============================================================================

export type IoOperation = 'open' | 'read' | 'write' | 'copy';

export type IoFailedError = Readonly<{
  readonly _tag: 'IoFailed';
  readonly operation: IoOperation;
  readonly path: string;
  readonly code: FsErrorCode;
  readonly message: string;
}>;

export type VerificationMismatchError = Readonly<{
  readonly _tag: 'VerificationMismatch';
  readonly path: string;
  readonly differences: number;
  readonly message: string;
}>;

// ============================================================================
// Lifecycle and configuration
// ============================================================================

export type SessionClosedError = Readonly<{
  readonly _tag: 'SessionClosed';
  readonly operation: 'file' | 'finalize';
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type GoldenError =
  | StagingFailedError
  | InvalidArtifactPathError
  | IoFailedError
  | VerificationMismatchError
  | SessionClosedError
  | ConfigInvalidError;

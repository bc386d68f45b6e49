import type {
  ConfigInvalidError,
  ConfigIssue,
  GoldenError,
  InvalidArtifactPathError,
  IoFailedError,
  IoOperation,
  SessionClosedError,
  StagingFailedError,
  VerificationMismatchError,
} from './golden-error.js';
import type { FsError } from '../io/fs-error.js';

export const Err = {
  stagingFailed: (
    operation: StagingFailedError['operation'],
    path: string,
    cause: FsError
  ): StagingFailedError => ({
    _tag: 'StagingFailed',
    operation,
    path,
    message: `Staging ${operation} failed for ${path}: ${cause.message}`,
  }),

  invalidArtifactPath: (path: string, reason: InvalidArtifactPathError['reason']): InvalidArtifactPathError => ({
    _tag: 'InvalidArtifactPath',
    path,
    reason,
    message:
      reason === 'empty'
        ? 'Artifact path must not be empty'
        : reason === 'absolute'
          ? `Artifact path "${path}" must be relative`
          : `Artifact path "${path}" resolves outside the golden root`,
  }),

  ioFailed: (operation: IoOperation, path: string, cause: FsError): IoFailedError => ({
    _tag: 'IoFailed',
    operation,
    path,
    code: cause.code,
    message: cause.message,
  }),

  verificationMismatch: (path: string, differences: number): VerificationMismatchError => ({
    _tag: 'VerificationMismatch',
    path,
    differences,
    message: `Found at least ${differences} difference(s) in ${path}! Set UPDATE_GOLDEN=1 to update golden files.`,
  }),

  sessionClosed: (operation: SessionClosedError['operation']): SessionClosedError => ({
    _tag: 'SessionClosed',
    operation,
    message:
      operation === 'finalize'
        ? 'Golden session was already finalized'
        : 'Golden session no longer accepts new files',
  }),

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid golden configuration',
  }),
} as const satisfies Record<string, (...args: never[]) => GoldenError>;

export type {
  ConfigIssue,
  ConfigInvalidError,
  GoldenError,
  InvalidArtifactPathError,
  IoFailedError,
  IoOperation,
  SessionClosedError,
  StagingFailedError,
  VerificationMismatchError,
} from './golden-error.js';
export { Err } from './factories.js';
export { formatGoldenError } from './formatter.js';

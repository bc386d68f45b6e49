import type { GoldenError } from './golden-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatGoldenError(error: GoldenError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'IoFailed':
      return `Could not ${error.operation} ${error.path} (${error.code}): ${error.message}`;

    case 'StagingFailed':
    case 'InvalidArtifactPath':
    case 'VerificationMismatch':
    case 'SessionClosed':
      return error.message;

    default:
      return assertNever(error);
  }
}

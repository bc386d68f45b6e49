import { describe, it, expect } from 'vitest';
import { Err, formatGoldenError } from '../../src/errors/index.js';

describe('formatGoldenError', () => {
  it('names the path and the difference count on a mismatch', () => {
    expect(formatGoldenError(Err.verificationMismatch('reports/out.txt', 3))).toBe(
      'Found at least 3 difference(s) in reports/out.txt! Set UPDATE_GOLDEN=1 to update golden files.'
    );
  });

  it('includes the operation and fs code for IO failures', () => {
    const error = Err.ioFailed('open', 'out.txt', { code: 'FS_NOT_FOUND', message: 'Not found: /golden/out.txt' });
    expect(formatGoldenError(error)).toBe('Could not open out.txt (FS_NOT_FOUND): Not found: /golden/out.txt');
  });

  it('lists configuration issues', () => {
    const error = Err.configInvalid([{ path: 'windowBytes', message: 'windowBytes must be a positive integer' }]);
    expect(formatGoldenError(error)).toBe(
      'Invalid golden configuration\n\n  - windowBytes: windowBytes must be a positive integer'
    );
  });

  it('uses the message for lifecycle and staging errors', () => {
    expect(formatGoldenError(Err.sessionClosed('finalize'))).toBe('Golden session was already finalized');
    expect(formatGoldenError(Err.sessionClosed('file'))).toBe('Golden session no longer accepts new files');
    expect(
      formatGoldenError(Err.stagingFailed('create', '/tmp/golden-stage-', { code: 'FS_PERMISSION_DENIED', message: 'Permission denied: /tmp/golden-stage-' }))
    ).toBe('Staging create failed for /tmp/golden-stage-: Permission denied: /tmp/golden-stage-');
  });
});

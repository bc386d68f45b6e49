import { formatGoldenError } from '../errors/formatter.js';
import type { GoldenError } from '../errors/golden-error.js';
import type { GoldenSessionOptions } from './golden-session.js';
import { GoldenSession } from './golden-session.js';

/** Thrown at the test boundary when a session cannot be created or finalized. */
export class GoldenSessionFailure extends Error {
  constructor(readonly error: GoldenError) {
    super(formatGoldenError(error));
    this.name = 'GoldenSessionFailure';
  }
}

/**
 * Run `body` with a fresh session, then finalize it.
 *
 * If `body` throws, finalize is skipped (the stage is still removed) and the
 * original error is rethrown unchanged, so a failing test never also verifies
 * or updates golden files.
 */
export async function withGoldenSession<T>(
  goldenRoot: string,
  body: (session: GoldenSession) => Promise<T> | T,
  options: GoldenSessionOptions = {}
): Promise<T> {
  const created = await GoldenSession.create(goldenRoot, options);
  if (created.isErr()) throw new GoldenSessionFailure(created.error);
  const session = created.value;

  let value: T;
  try {
    value = await body(session);
  } catch (error) {
    await session.abandon();
    throw error;
  }

  const finished = await session.finish();
  if (finished.isErr()) throw new GoldenSessionFailure(finished.error);
  return value;
}

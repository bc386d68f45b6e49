import * as path from 'path';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { InvalidArtifactPathError } from '../errors/golden-error.js';

/**
 * A normalized relative path that stays inside whatever root it is joined to
 * (the stage directory or the golden root).
 */
export type ArtifactPath = Brand<string, 'ArtifactPath'>;

export function parseArtifactPath(raw: string): Result<ArtifactPath, InvalidArtifactPathError> {
  if (raw.length === 0) return err(Err.invalidArtifactPath(raw, 'empty'));
  if (path.isAbsolute(raw)) return err(Err.invalidArtifactPath(raw, 'absolute'));

  const normalized = path.normalize(raw);
  if (normalized === '.') {
    return err(Err.invalidArtifactPath(raw, 'empty'));
  }
  if (normalized === '..' || normalized.startsWith(`..${path.sep}`)) {
    return err(Err.invalidArtifactPath(raw, 'escapes_root'));
  }

  return ok(normalized as ArtifactPath);
}

/**
 * Golden harness configuration - parse, don't validate.
 *
 * - The environment is read only at the outermost entry point
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../errors/golden-error.js';

export const DEFAULT_WINDOW_BYTES = 1024;

/** What `finalize` does with staged output. */
export type GoldenMode = { readonly kind: 'verify' } | { readonly kind: 'update' };

export interface GoldenConfig {
  readonly mode: GoldenMode;
  readonly windowBytes: number;
}

export interface LoadGoldenConfigOptions {
  readonly env: Record<string, string | undefined>;
}

const EnvSchema = z.object({
  UPDATE_GOLDEN: z.string().optional(),

  GOLDEN_WINDOW_BYTES: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('GOLDEN_WINDOW_BYTES must be an integer')
        .positive('GOLDEN_WINDOW_BYTES must be positive')
        .default(DEFAULT_WINDOW_BYTES)
    ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export function loadGoldenConfig(options: LoadGoldenConfigOptions): Result<GoldenConfig, ConfigInvalidError> {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data));
}

function buildConfig(env: ParsedEnv): GoldenConfig {
  // Only the exact value "1" turns update mode on.
  const mode: GoldenMode = env.UPDATE_GOLDEN === '1' ? { kind: 'update' } : { kind: 'verify' };
  return { mode, windowBytes: env.GOLDEN_WINDOW_BYTES };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

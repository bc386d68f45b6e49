import DiffMatchPatch from 'diff-match-patch';

// diff-match-patch operation codes.
const DIFF_DELETE = -1;
const DIFF_INSERT = 1;

export type ChunkOp = 'equal' | 'delete' | 'insert';

/** One contiguous run of the alignment between old and new text. */
export interface DiffChunk {
  readonly op: ChunkOp;
  readonly text: string;
}

const dmp = new DiffMatchPatch();
// Windows are small; never trade accuracy for time.
dmp.Diff_Timeout = 0;

function toChunkOp(code: number): ChunkOp {
  if (code === DIFF_DELETE) return 'delete';
  if (code === DIFF_INSERT) return 'insert';
  return 'equal';
}

/**
 * Ordered equal/delete/insert chunks turning `oldText` into `newText`.
 * Concatenating equal+delete texts yields `oldText`; equal+insert yields `newText`.
 */
export function computeChunks(oldText: string, newText: string): readonly DiffChunk[] {
  const diffs = dmp.diff_main(oldText, newText);
  dmp.diff_cleanupSemantic(diffs);
  return diffs.map((d) => ({ op: toChunkOp(d[0]), text: d[1] }));
}

export type FsErrorCode =
  | 'FS_IO_ERROR'
  | 'FS_NOT_FOUND'
  | 'FS_ALREADY_EXISTS'
  | 'FS_PERMISSION_DENIED'
  | 'FS_IS_DIRECTORY';

export type FsError = { readonly code: FsErrorCode; readonly message: string };

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  // Node errors expose a string `code` property; treat it as best-effort.
  const code = (e as { readonly code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'EISDIR') return { code: 'FS_IS_DIRECTORY', message: `Is a directory: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

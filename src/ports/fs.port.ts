import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

/**
 * Port: the handful of file operations the boundary layer needs
 * (wordlists in, preferences in/out, generated batches out).
 */
export interface FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;
  writeFileUtf8(filePath: string, content: string): ResultAsync<void, FsError>;
  /** Succeeds when the file is already gone. */
  removeFile(filePath: string): ResultAsync<void, FsError>;
}

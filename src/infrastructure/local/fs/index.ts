import * as fs from 'fs/promises';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  writeFileUtf8(filePath: string, content: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.writeFile(filePath, content, 'utf8'), (e) => mapFsError(e, filePath));
  }

  removeFile(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rm(filePath, { force: true }), (e) => mapFsError(e, filePath));
  }
}

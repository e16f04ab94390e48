import type { FsError } from '../../../ports/fs.port.js';
import type { FileAccessCode, FileAccessError } from '../../../errors/app-error.js';
import { Err } from '../../../errors/factories.js';

const CODES: Readonly<Record<FsError['code'], FileAccessCode>> = {
  FS_NOT_FOUND: 'not_found',
  FS_PERMISSION_DENIED: 'permission_denied',
  FS_IO_ERROR: 'io_error',
};

export function toFileAccessError(error: FsError, filePath: string): FileAccessError {
  return Err.fileAccess(filePath, CODES[error.code], error.message);
}

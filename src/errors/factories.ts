import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  FileAccessCode,
  FileAccessError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (source: string, issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    source,
    issues,
    message: `Invalid configuration (${source})`,
  }),

  fileAccess: (path: string, code: FileAccessCode, message: string): FileAccessError => ({
    _tag: 'FileAccess',
    path,
    code,
    message,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  /** Where the bad values came from, e.g. `environment` or a settings file path. */
  readonly source: string;
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type FileAccessCode = 'not_found' | 'permission_denied' | 'io_error';

export type FileAccessError = Readonly<{
  readonly _tag: 'FileAccess';
  readonly path: string;
  readonly code: FileAccessCode;
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | FileAccessError | UnexpectedError;

/**
 * Branded config type: only the parser hands these out.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;

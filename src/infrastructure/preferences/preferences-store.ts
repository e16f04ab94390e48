import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { Result, errAsync, okAsync, type ResultAsync } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { FileSystemPort } from '../../ports/fs.port.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import { toConfigIssues } from '../../config/app-config.js';
import type { ConfigInvalidError, FileAccessError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import { toFileAccessError } from '../local/fs/errors.js';
import { PreferencesSchema, defaultPreferences, type Preferences } from './preferences.js';

export const SETTINGS_FILE = 'settings.json';

export type PreferencesError = ConfigInvalidError | FileAccessError;

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e) => (e instanceof Error ? e.message : String(e))
);

/**
 * Key/value preferences in a JSON file under the config directory.
 *
 * Lifecycle is explicit: `load` once at startup, `save` only when the user
 * asks for it. A missing file means defaults.
 */
@singleton()
export class PreferencesStore {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Ports.FileSystem) private readonly fs: FileSystemPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('PreferencesStore');
  }

  path(): string {
    return path.join(this.config.paths.configDir, SETTINGS_FILE);
  }

  load(): ResultAsync<Preferences, PreferencesError> {
    const file = this.path();

    return this.fs
      .readFileUtf8(file)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(toFileAccessError(e, file))))
      .andThen((text) => {
        if (text === null) {
          this.logger.debug({ path: file }, 'No settings file, using defaults');
          return okAsync(defaultPreferences());
        }
        return this.parse(text, file);
      });
  }

  save(prefs: Preferences): ResultAsync<void, PreferencesError> {
    const file = this.path();
    const checked = PreferencesSchema.safeParse(prefs);
    if (!checked.success) {
      return errAsync(Err.configInvalid(file, toConfigIssues(checked.error)));
    }
    const content = `${JSON.stringify(checked.data, null, 2)}\n`;

    return this.fs
      .mkdirp(path.dirname(file))
      .andThen(() => this.fs.writeFileUtf8(file, content))
      .mapErr((e): PreferencesError => toFileAccessError(e, file))
      .map(() => {
        this.logger.info({ path: file }, 'Saved settings');
      });
  }

  reset(): ResultAsync<void, PreferencesError> {
    const file = this.path();
    return this.fs.removeFile(file).mapErr((e): PreferencesError => toFileAccessError(e, file));
  }

  private parse(text: string, file: string): ResultAsync<Preferences, PreferencesError> {
    const json = parseJson(text);
    if (json.isErr()) {
      return errAsync(Err.configInvalid(file, [{ path: '(root)', message: `Not valid JSON: ${json.error}` }]));
    }

    const parsed = PreferencesSchema.safeParse(json.value);
    if (!parsed.success) {
      return errAsync(Err.configInvalid(file, toConfigIssues(parsed.error)));
    }
    return okAsync(parsed.data);
  }
}

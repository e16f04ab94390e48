import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import type { ResultAsync } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { FileSystemPort } from '../../ports/fs.port.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { FileAccessError } from '../../errors/app-error.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import { toFileAccessError } from '../local/fs/errors.js';
import { formatOutput, resolveOutputTarget, type OutputFormat, type OutputTarget } from './output-format.js';

export const DEFAULT_OUTPUT_FILE = 'passwords.txt';

export interface SavedOutput extends OutputTarget {
  readonly count: number;
}

/**
 * Writes a generated batch to a caller-chosen file. The generation core has
 * no file-system dependency; this is the only place batches touch disk.
 */
@singleton()
export class OutputWriter {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Ports.FileSystem) private readonly fs: FileSystemPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('OutputWriter');
  }

  defaultPath(): string {
    return path.join(this.config.paths.outputDir, DEFAULT_OUTPUT_FILE);
  }

  save(values: readonly string[], filePath: string, format?: OutputFormat): ResultAsync<SavedOutput, FileAccessError> {
    const target = resolveOutputTarget(path.resolve(filePath), format);
    const content = formatOutput(values, target.format);

    return this.fs
      .mkdirp(path.dirname(target.path))
      .andThen(() => this.fs.writeFileUtf8(target.path, content))
      .mapErr((e) => toFileAccessError(e, target.path))
      .map(() => {
        this.logger.info({ path: target.path, format: target.format, count: values.length }, 'Saved output');
        return { ...target, count: values.length };
      });
  }
}

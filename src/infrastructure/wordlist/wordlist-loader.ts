import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { FileSystemPort } from '../../ports/fs.port.js';
import type { FileAccessError } from '../../errors/app-error.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import { GenErr, type EmptyVocabularyError } from '../../domain/generation/errors.js';
import { analyzeWordlist, parseWordlist, type WordlistStats } from '../../domain/wordlist/index.js';
import { toFileAccessError } from '../local/fs/errors.js';
import { loadFallbackWords } from './fallback-words.js';

export type WordlistSource =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'fallback' };

export interface LoadedWordlist {
  readonly words: readonly string[];
  readonly source: WordlistSource;
  readonly stats: WordlistStats;
}

export type WordlistLoadError = FileAccessError | EmptyVocabularyError;

export function describeWordlistSource(wordlist: LoadedWordlist): string {
  return wordlist.source.kind === 'file'
    ? `${wordlist.words.length} words from: ${path.basename(wordlist.source.path)}`
    : `${wordlist.words.length} words (fallback list)`;
}

@singleton()
export class WordlistLoader {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Ports.FileSystem) private readonly fs: FileSystemPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('WordlistLoader');
  }

  /**
   * Reads one word per line. A file with no usable word is an EmptyVocabulary error.
   */
  load(filePath: string): ResultAsync<LoadedWordlist, WordlistLoadError> {
    const resolved = path.resolve(filePath);

    return this.fs
      .readFileUtf8(resolved)
      .mapErr((e): WordlistLoadError => toFileAccessError(e, resolved))
      .andThen((text) => {
        const words = parseWordlist(text);
        if (words.length === 0) {
          return errAsync(GenErr.emptyVocabulary());
        }
        const stats = analyzeWordlist(words);
        this.logger.debug({ path: resolved, size: stats.size, duplicates: stats.duplicates }, 'Loaded wordlist');
        return okAsync<LoadedWordlist>({ words, source: { kind: 'file', path: resolved }, stats });
      });
  }

  fallback(): LoadedWordlist {
    const words = loadFallbackWords();
    return { words, source: { kind: 'fallback' }, stats: analyzeWordlist(words) };
  }

  /**
   * The named file when there is one, the built-in list otherwise.
   */
  loadOrFallback(filePath: string | null): ResultAsync<LoadedWordlist, WordlistLoadError> {
    return filePath === null ? okAsync(this.fallback()) : this.load(filePath);
  }
}

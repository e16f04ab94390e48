#!/usr/bin/env node
/**
 * keysmith CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command, Option } from 'commander';

import { initializeContainer, container, ContainerConfigError } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { GenerationService } from './application/services/generation-service.js';
import type { PreferencesStore } from './infrastructure/preferences/preferences-store.js';
import type { WordlistLoader } from './infrastructure/wordlist/wordlist-loader.js';
import type { OutputWriter } from './infrastructure/output/output-writer.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';
import { createBootstrapLogger } from './core/logging/bootstrap.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import { parseNonNegativeInt, parseOutputFormat, parsePositiveInt, parsePreset } from './cli/arg-parsers.js';
import {
  executeGenerateCommand,
  executePassphraseCommand,
  executeEntropyCommand,
  executePresetsCommand,
  executeWordlistCommand,
  executeSettingsCommand,
  type GenerateCommandOptions,
  type PassphraseCommandOptions,
  type PasswordOverrides,
  type PassphraseOverrides,
} from './cli/commands/index.js';

const log = createBootstrapLogger('cli');

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface Wiring {
  readonly terminator: ProcessTerminator;
  readonly config: ValidatedConfig;
  readonly generation: GenerationService;
  readonly preferences: PreferencesStore;
  readonly wordlists: WordlistLoader;
  readonly output: OutputWriter;
}

async function wire(): Promise<Wiring> {
  try {
    await initializeContainer({ runtimeMode: { kind: 'cli' } });
  } catch (error) {
    const appError =
      error instanceof ContainerConfigError ? error.error : Err.unexpected('Failed to start', error);
    log.error({ err: error }, 'Container initialization failed');
    interpretCliResultWithoutDI(failure(formatAppError(appError)));
    throw error;
  }

  return {
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    generation: container.resolve<GenerationService>(DI.Services.Generation),
    preferences: container.resolve<PreferencesStore>(DI.Infra.PreferencesStore),
    wordlists: container.resolve<WordlistLoader>(DI.Infra.WordlistLoader),
    output: container.resolve<OutputWriter>(DI.Infra.OutputWriter),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// SHARED OPTIONS
// ═══════════════════════════════════════════════════════════════════════════

function addPasswordOptions(cmd: Command): Command {
  return cmd
    .option('-l, --length <n>', 'Password length', parsePositiveInt)
    .option('--lower', 'Include lowercase letters')
    .option('--no-lower', 'Exclude lowercase letters')
    .option('--upper', 'Include uppercase letters')
    .option('--no-upper', 'Exclude uppercase letters')
    .option('--digits', 'Include digits')
    .option('--no-digits', 'Exclude digits')
    .option('--symbols', 'Include symbols')
    .option('--no-symbols', 'Exclude symbols')
    .option('--min-lower <n>', 'Minimum lowercase letters', parseNonNegativeInt)
    .option('--min-upper <n>', 'Minimum uppercase letters', parseNonNegativeInt)
    .option('--min-digits <n>', 'Minimum digits', parseNonNegativeInt)
    .option('--min-symbols <n>', 'Minimum symbols', parseNonNegativeInt)
    .option('--custom-symbols <chars>', 'Symbol alphabet to use instead of the default')
    .option('-a, --exclude-ambiguous', 'Drop look-alike characters (Il1O0B8S5Z2QG6)')
    .option('--no-exclude-ambiguous', 'Keep look-alike characters')
    .option('-p, --preset <name>', 'Start from a preset (custom, memorable, strong, pin)', parsePreset);
}

function addPassphraseOptions(cmd: Command): Command {
  return cmd
    .option('-w, --words <n>', 'Words per passphrase', parsePositiveInt)
    .option('-s, --separator <text>', 'Text between words (may be empty)')
    .option('--capitalize', 'Capitalize the first letter of each word')
    .option('--no-capitalize', 'Leave words as they are in the wordlist')
    .option('--wordlist <file>', 'Wordlist file, one word per line');
}

function addOutputOptions(cmd: Command): Command {
  return cmd
    .option('-n, --count <n>', 'How many values to generate', parsePositiveInt)
    .option('-o, --output [file]', 'Also save the values to a file (default: <output dir>/passwords.txt)')
    .option('-f, --format <format>', 'File format: txt or csv (default: from extension)', parseOutputFormat)
    .option('--save', 'Remember these settings as the new defaults')
    .option('-q, --quiet', 'Print only the generated values');
}

/** `-o` with no value means the configured output directory. */
type RawOutputOptions<T> = Omit<T, 'output'> & { output?: string | true };

function outputPath(output: string | true | undefined, w: Wiring): string | undefined {
  return output === true ? w.output.defaultPath() : output;
}

function passwordOverrides(opts: GenerateCommandOptions): PasswordOverrides {
  return {
    preset: opts.preset,
    length: opts.length,
    count: opts.count,
    lower: opts.lower,
    upper: opts.upper,
    digits: opts.digits,
    symbols: opts.symbols,
    minLower: opts.minLower,
    minUpper: opts.minUpper,
    minDigits: opts.minDigits,
    minSymbols: opts.minSymbols,
    customSymbols: opts.customSymbols,
    excludeAmbiguous: opts.excludeAmbiguous,
  };
}

function passphraseOverrides(opts: PassphraseCommandOptions): PassphraseOverrides {
  return {
    words: opts.words,
    separator: opts.separator,
    capitalize: opts.capitalize,
    wordlist: opts.wordlist,
    count: opts.count,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('keysmith')
  .description('Generate random passwords and wordlist passphrases with entropy estimates')
  .version('1.0.0');

addOutputOptions(
  addPasswordOptions(
    program.command('generate').alias('password').description('Generate character-based passwords')
  )
).action(async (raw: RawOutputOptions<GenerateCommandOptions>) => {
  const w = await wire();
  const options: GenerateCommandOptions = { ...raw, output: outputPath(raw.output, w) };
  const result = await executeGenerateCommand(
    {
      settingsPath: w.preferences.path(),
      loadPreferences: () => w.preferences.load(),
      savePreferences: (prefs) => w.preferences.save(prefs),
      generatePasswords: (config) => w.generation.generatePasswords(config),
      saveOutput: (values, filePath, format) => w.output.save(values, filePath, format),
    },
    options
  );
  interpretCliResult(result, w.terminator);
});

addOutputOptions(
  addPassphraseOptions(program.command('passphrase').description('Generate wordlist passphrases'))
).action(async (raw: RawOutputOptions<PassphraseCommandOptions>) => {
  const w = await wire();
  const options: PassphraseCommandOptions = { ...raw, output: outputPath(raw.output, w) };
  const result = await executePassphraseCommand(
    {
      settingsPath: w.preferences.path(),
      defaultWordlist: w.config.paths.defaultWordlist,
      loadPreferences: () => w.preferences.load(),
      savePreferences: (prefs) => w.preferences.save(prefs),
      loadWordlist: (filePath) => w.wordlists.loadOrFallback(filePath),
      generatePassphrases: (config) => w.generation.generatePassphrases(config),
      saveOutput: (values, filePath, format) => w.output.save(values, filePath, format),
    },
    options
  );
  interpretCliResult(result, w.terminator);
});

addPassphraseOptions(
  addPasswordOptions(
    program
      .command('entropy')
      .description('Show the entropy estimate for the current settings')
      .addOption(new Option('-m, --mode <mode>', 'Estimate for this mode').choices(['password', 'passphrase']))
  )
).action(async (options: GenerateCommandOptions & PassphraseCommandOptions & { mode?: 'password' | 'passphrase' }) => {
  const w = await wire();
  const result = await executeEntropyCommand(
    {
      settingsPath: w.preferences.path(),
      defaultWordlist: w.config.paths.defaultWordlist,
      loadPreferences: () => w.preferences.load(),
      loadWordlist: (filePath) => w.wordlists.loadOrFallback(filePath),
    },
    {
      mode: options.mode,
      password: passwordOverrides(options),
      passphrase: passphraseOverrides(options),
    }
  );
  interpretCliResult(result, w.terminator);
});

program
  .command('presets')
  .description('List the built-in presets')
  .action(() => {
    interpretCliResultWithoutDI(executePresetsCommand());
  });

program
  .command('wordlist <file>')
  .description('Inspect a wordlist file')
  .action(async (filePath: string) => {
    const w = await wire();
    const result = await executeWordlistCommand({ loadWordlist: (p) => w.wordlists.load(p) }, filePath);
    interpretCliResult(result, w.terminator);
  });

program
  .command('settings [action]')
  .description('Show, locate or reset saved settings (show | path | reset)')
  .action(async (action: string | undefined) => {
    const w = await wire();
    const result = await executeSettingsCommand(
      {
        settingsPath: w.preferences.path(),
        loadPreferences: () => w.preferences.load(),
        resetPreferences: () => w.preferences.reset(),
      },
      action
    );
    interpretCliResult(result, w.terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  log.fatal({ err: error }, 'Command failed');
  process.exitCode = 1;
});

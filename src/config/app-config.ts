/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the environment surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';

// =============================================================================
// Branded primitives (prove parsing happened)
// =============================================================================

export type ConfigDir = Brand<string, 'ConfigDir'>;
export type OutputDir = Brand<string, 'OutputDir'>;
export type WordlistPath = Brand<string, 'WordlistPath'>;

export interface AppConfig {
  readonly paths: {
    /** Holds settings.json */
    readonly configDir: ConfigDir;
    /** Default destination for saved batches */
    readonly outputDir: OutputDir;
    /** Wordlist used when neither a flag nor the saved settings name one */
    readonly defaultWordlist: WordlistPath | null;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
  readonly homedir?: string;
}

// =============================================================================
// Schema
// =============================================================================

const nonBlankPath = (name: string) =>
  z
    .string()
    .trim()
    .min(1, `${name} cannot be blank when set`)
    .optional();

const EnvSchema = z.object({
  KEYSMITH_CONFIG_DIR: nonBlankPath('KEYSMITH_CONFIG_DIR'),
  KEYSMITH_OUTPUT_DIR: nonBlankPath('KEYSMITH_OUTPUT_DIR'),
  KEYSMITH_WORDLIST: nonBlankPath('KEYSMITH_WORDLIST'),
  // Read by the logging layer; validated here so a typo is reported instead of silently ignored.
  KEYSMITH_LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']))
    .optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid('environment', toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data, options)));
}

/**
 * Tests and local construction only: marks a hand-built config as validated.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, options: LoadConfigOptions): AppConfig {
  const home = options.homedir ?? os.homedir();
  const resolve = (p: string) => path.resolve(options.cwd, p);

  return {
    paths: {
      configDir: (env.KEYSMITH_CONFIG_DIR ? resolve(env.KEYSMITH_CONFIG_DIR) : path.join(home, '.keysmith')) as ConfigDir,
      outputDir: (env.KEYSMITH_OUTPUT_DIR
        ? resolve(env.KEYSMITH_OUTPUT_DIR)
        : path.join(options.cwd, 'generated_passwords')) as OutputDir,
      defaultWordlist: env.KEYSMITH_WORDLIST ? (resolve(env.KEYSMITH_WORDLIST) as WordlistPath) : null,
    },
  };
}

export function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

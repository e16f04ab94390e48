/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these types; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured status output. Printed to stderr on failure, and on success
 * whenever the command also produced `values`, so stdout stays pipeable.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * Result of a CLI command execution.
 * `values` are generated secrets, written to stdout one per line with no styling.
 */
export type CliResult =
  | { kind: 'success'; output?: CliOutput; values?: readonly string[] }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function successMessage(message: string): CliResult {
  return { kind: 'success', output: { message } };
}

/**
 * Success that carries generated values for stdout.
 */
export function generated(values: readonly string[], output?: CliOutput): CliResult {
  return { kind: 'success', output, values };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Failure caused by bad arguments.
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}

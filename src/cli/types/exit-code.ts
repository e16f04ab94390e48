import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes for CLI commands, following Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0 - successful execution
  | { kind: 'general_error' }  // 1 - I/O failures, unusable config
  | { kind: 'misuse' };        // 2 - bad arguments or a config that cannot generate

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}

/**
 * Numeric value for raw process.exit(). Only for code that runs before the container exists.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}

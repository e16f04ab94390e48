/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

/**
 * Where printed lines go. Defaults to the console; tests pass a collector.
 */
export interface CliSink {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export const consoleSink: CliSink = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

/**
 * Format a CliOutput structure to a styled string.
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  if (isError) {
    lines.push(chalk.red(`❌ ${output.message}`));
  } else {
    lines.push(chalk.green(`✅ ${output.message}`));
  }

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠️  Warnings:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

/**
 * Format the status part of a CliResult. Generated values are never styled
 * and are not part of this string.
 */
export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

/**
 * Print a CliResult.
 *
 * Generated values go to stdout, one per line. Status goes to stderr when it
 * would otherwise mix with those values, and always on failure.
 */
export function printResult(result: CliResult, sink: CliSink = consoleSink): void {
  const formatted = formatResult(result);

  if (result.kind === 'failure') {
    sink.stderr(formatted);
    return;
  }

  const values = result.values ?? [];
  values.forEach((value) => sink.stdout(value));

  if (formatted) {
    if (values.length > 0) {
      sink.stderr(formatted);
    } else {
      sink.stdout(formatted);
    }
  }
}

/**
 * Bits with one decimal, as shown next to generated values.
 */
export function formatBits(bits: number): string {
  return bits > 0 ? `${bits.toFixed(1)} bits` : '0 bits';
}

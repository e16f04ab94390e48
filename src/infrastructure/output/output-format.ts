import * as path from 'path';
import Papa from 'papaparse';

export type OutputFormat = 'txt' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['txt', 'csv'];

export const CSV_HEADER = 'password';

const CSV_LINE_END = '\r\n';

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * One value per line, each terminated by `\n`.
 */
export function formatTxt(values: Iterable<string>): string {
  let out = '';
  for (const value of values) out += `${value}\n`;
  return out;
}

/**
 * Single-column CSV with a `password` header row and CRLF row endings. Papa
 * quotes a field only when it holds a quote, comma, line break or an edge space.
 */
export function formatCsv(values: Iterable<string>): string {
  const rows: string[][] = [[CSV_HEADER]];
  for (const value of values) rows.push([value]);
  const csv = Papa.unparse(rows, { newline: CSV_LINE_END });
  return `${csv}${CSV_LINE_END}`;
}

export function formatOutput(values: Iterable<string>, format: OutputFormat): string {
  return format === 'csv' ? formatCsv(values) : formatTxt(values);
}

/**
 * Reads a TXT batch back: one value per line, the final terminator dropped.
 */
export function parseTxt(content: string): string[] {
  if (content.length === 0) return [];
  const body = content.endsWith('\n') ? content.slice(0, -1) : content;
  return body.split('\n');
}

export interface OutputTarget {
  readonly path: string;
  readonly format: OutputFormat;
}

/**
 * An explicit format wins; otherwise a `.csv` extension selects CSV and
 * anything else TXT. The matching extension is appended when missing.
 */
export function resolveOutputTarget(filePath: string, format?: OutputFormat): OutputTarget {
  const ext = path.extname(filePath).toLowerCase();
  const chosen: OutputFormat = format ?? (ext === '.csv' ? 'csv' : 'txt');
  const resolvedPath = ext === `.${chosen}` ? filePath : `${filePath}.${chosen}`;
  return { path: resolvedPath, format: chosen };
}

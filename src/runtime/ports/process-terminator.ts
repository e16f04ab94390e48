/**
 * Port for terminating the current process.
 * Only the CLI composition root and the result interpreter call it.
 */
export type ExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' }
  | { readonly kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}

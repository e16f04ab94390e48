/**
 * Runtime mode of the current process.
 * Injected through DI; services never sniff env vars to find it.
 */
export type RuntimeMode =
  | { readonly kind: 'cli' }
  | { readonly kind: 'library' }
  | { readonly kind: 'test' };

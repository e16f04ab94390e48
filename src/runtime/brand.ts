/**
 * Nominal marker for values that went through a parser.
 *
 * A string-keyed marker keeps exported zod transforms nameable (TS4023).
 * Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Exhaustiveness helper for discriminated unions.
 * Placed in the `default` branch of a `switch`, it stops compiling when a union gains a member.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}

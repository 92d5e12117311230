/**
 * Hard invariant assertion.
 * Use for "this should never happen" and for guarding internal assumptions.
 */
export function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(`ASSERT: ${message}`);
  }
}

export function assertNever(x: never, message = "unexpected value"): never {
  throw new Error(`ASSERT: ${message}: ${JSON.stringify(x)}`);
}

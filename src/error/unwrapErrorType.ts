/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Cyclic cause chains are walked once.
 */
export function unwrapErrorType<T extends Error>(errorClass: new (...args: never[]) => T, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}

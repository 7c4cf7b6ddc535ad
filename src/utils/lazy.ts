export interface Lazy<T> {
  readonly value: T;
  readonly isResolved: boolean;
}

/**
 * Single-resolve wrapper. The factory runs on first access only; if it throws,
 * nothing is cached and the next access retries.
 */
export function lazy<T>(factory: () => T): Lazy<T> {
  let resolved: { value: T } | null = null;
  let resolving = false;

  return {
    get value(): T {
      if (resolved) return resolved.value;
      if (resolving) throw new Error("Lazy value re-entered during resolution");
      resolving = true;
      try {
        resolved = { value: factory() };
      } finally {
        resolving = false;
      }
      return resolved.value;
    },
    get isResolved(): boolean {
      return resolved !== null;
    },
  };
}

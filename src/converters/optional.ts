export type Optional<T> =
  | { readonly hasValue: true; readonly value: T }
  | { readonly hasValue: false };

const NONE: Optional<never> = { hasValue: false };

export const Optional = {
  of<T>(value: T): Optional<T> {
    return { hasValue: true, value };
  },

  none<T = never>(): Optional<T> {
    return NONE;
  },

  /**
   * Wraps a nullable value; `null` and `undefined` become none.
   */
  from<T>(value: T | null | undefined): Optional<T> {
    return value === null || value === undefined ? NONE : { hasValue: true, value };
  },
};

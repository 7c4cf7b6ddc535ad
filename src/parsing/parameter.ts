import { Optional } from "../converters/optional";
import type { ValueType } from "../types/valueType";

export interface ParameterAttribute {
  readonly kind: string;
}

/**
 * Marks a parameter that collects every remaining argument into an array.
 * Array-typed parameters carry it implicitly.
 */
export const remainderAttribute: ParameterAttribute = Object.freeze({ kind: "remainder" });

export interface ParameterDescriptor<T = unknown> {
  readonly name: string;
  readonly type: ValueType<T>;
  readonly defaultValue: Optional<unknown>;
  readonly attributes: readonly ParameterAttribute[];
  readonly description?: string;
}

interface ParameterOptions<T> {
  name: string;
  type: ValueType<T>;
  defaultValue?: Optional<unknown>;
  variadic?: boolean;
  attributes?: ParameterAttribute[];
  description?: string;
}

export function defineParameter<T>(options: ParameterOptions<T>): ParameterDescriptor<T> {
  const attributes = [...(options.attributes ?? [])];
  const collects = options.variadic === true || options.type.kind === "array";
  if (collects && !attributes.includes(remainderAttribute)) {
    attributes.push(remainderAttribute);
  }

  const parameter: ParameterDescriptor<T> = {
    name: options.name,
    type: options.type,
    defaultValue: options.defaultValue ?? Optional.none(),
    attributes: Object.freeze(attributes),
    description: options.description,
  };
  return Object.freeze(parameter);
}

export function isVariadic(parameter: ParameterDescriptor): boolean {
  return parameter.attributes.some((attribute) => attribute.kind === remainderAttribute.kind);
}

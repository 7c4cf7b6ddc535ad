import type { ConverterContext } from "./context";
import type { Optional } from "./optional";
import type { ServiceToken } from "../services/resolver";
import { isValueType, type ValueType } from "../types/valueType";

export interface ArgumentConverter<T = unknown, TEvent = unknown> {
  /**
   * Human readable name of the produced type, used in failure messages
   */
  readonly readableName: string;

  /**
   * Converts the token the cursor is positioned on.
   * Returns none when the token is not a value of this type.
   */
  convert(context: ConverterContext<TEvent>, event: TEvent): Promise<Optional<T>>;
}

/**
 * A converter class. The static `targetType` is its capability signature;
 * `inject` lists the services its constructor receives, in order.
 */
export interface ConverterClass<T = unknown, TEvent = unknown> {
  new (...services: unknown[]): ArgumentConverter<T, TEvent>;
  readonly name: string;
  readonly targetType?: ValueType<T>;
  readonly inject?: readonly ServiceToken[];
}

/**
 * Type-erased entry point for one value type.
 */
export type DispatchFunction<TEvent = unknown> = (
  context: ConverterContext<TEvent>,
  event: TEvent
) => Promise<Optional<unknown>>;

export function isConverterInstance(value: unknown): value is ArgumentConverter {
  return typeof value === "object" && value !== null && "convert" in value && typeof value.convert === "function";
}

/**
 * A class whose prototype implements `convert`. Abstract classes fail this
 * check because abstract members do not exist at run time.
 */
export function isConverterClass(value: unknown): value is ConverterClass {
  if (typeof value !== "function") return false;
  const prototype: unknown = value.prototype;
  return isConverterInstance(prototype);
}

/**
 * Reads the capability signature of a converter class, or null if it has none.
 */
export function getTargetType(type: ConverterClass): ValueType | null {
  const targetType: unknown = type.targetType;
  return isValueType(targetType) ? targetType : null;
}

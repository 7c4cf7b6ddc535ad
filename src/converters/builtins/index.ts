import type { ConverterRegistry } from "../registry";
import { EnumConverter } from "./enum";
import { BigIntConverter, BooleanConverter, IntegerConverter, NumberConverter, StringConverter } from "./primitives";

export { EnumConverter, BigIntConverter, BooleanConverter, IntegerConverter, NumberConverter, StringConverter };

export const builtinConverterTypes = [
  StringConverter,
  IntegerConverter,
  NumberConverter,
  BooleanConverter,
  BigIntConverter,
  EnumConverter,
] as const;

export function registerBuiltinConverters<TEvent>(registry: ConverterRegistry<TEvent>): ConverterRegistry<TEvent> {
  return registry.registerFromTypes(builtinConverterTypes);
}

import { TypeHandleError } from "../commands/errors";
import { ValueTypes, type ValueType } from "./valueType";

/**
 * Maps a declared parameter type to the key its converter is registered under.
 * - enums share one converter
 * - arrays use the element converter (the parser repeats it)
 * - nullable types use the converter of the wrapped type
 */
export function normalizeType(type: ValueType | null | undefined): ValueType {
  if (type === null || type === undefined) {
    throw new TypeHandleError("Cannot normalize a missing type handle");
  }

  switch (type.kind) {
    case "enum":
      return ValueTypes.Enum;
    case "array":
      return normalizeType(type.element);
    case "nullable":
      return normalizeType(type.inner);
    case "scalar":
      return type;
    default:
      throw new TypeHandleError(`Malformed type handle: ${JSON.stringify(type)}`);
  }
}

/**
 * Finds the enum handle behind array and nullable wrappers, if any.
 */
export function findEnumType(type: ValueType): Extract<ValueType, { kind: "enum" }> | null {
  switch (type.kind) {
    case "enum":
      return type;
    case "array":
      return findEnumType(type.element);
    case "nullable":
      return findEnumType(type.inner);
    default:
      return null;
  }
}

import { describe, expect, test } from "vitest";
import { TypeHandleError } from "../src/commands/errors";
import { findEnumType, normalizeType } from "../src/types/normalizer";
import { arrayOf, defineValueType, describeType, enumType, nullable, ValueTypes } from "../src/types/valueType";

const Color = enumType("Color", { Red: "red", Green: "green" });
const Size = enumType("Size", { Small: 1, Large: 2 });
const Point = defineValueType<{ x: number; y: number }>("Point");

describe("normalizeType", () => {
  test("maps every enum to the shared enum key", () => {
    expect(normalizeType(Color)).toBe(ValueTypes.Enum);
    expect(normalizeType(Size)).toBe(ValueTypes.Enum);
  });

  test("unwraps arrays and nullable types", () => {
    expect(normalizeType(arrayOf(ValueTypes.Integer))).toBe(ValueTypes.Integer);
    expect(normalizeType(nullable(ValueTypes.Boolean))).toBe(ValueTypes.Boolean);
    expect(normalizeType(arrayOf(nullable(Color)))).toBe(ValueTypes.Enum);
  });

  test("keeps scalar types as they are", () => {
    expect(normalizeType(Point)).toBe(Point);
    expect(normalizeType(ValueTypes.String)).toBe(ValueTypes.String);
  });

  test("is idempotent", () => {
    for (const type of [Color, arrayOf(Point), nullable(ValueTypes.Number), ValueTypes.BigInt]) {
      expect(normalizeType(normalizeType(type))).toBe(normalizeType(type));
    }
  });

  test("fails fast on a missing handle", () => {
    expect(() => normalizeType(undefined)).toThrow(TypeHandleError);
    expect(() => normalizeType(null)).toThrowError("Cannot normalize a missing type handle");
  });
});

describe("type handles", () => {
  test("describe wrappers", () => {
    expect(describeType(arrayOf(nullable(ValueTypes.Integer)))).toBe("Integer?[]");
    expect(describeType(Color)).toBe("Color");
  });

  test("find the enum behind wrappers", () => {
    expect(findEnumType(arrayOf(Color))).toBe(Color);
    expect(findEnumType(nullable(Size))).toBe(Size);
    expect(findEnumType(ValueTypes.String)).toBeNull();
  });
});

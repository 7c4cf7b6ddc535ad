import { z } from "zod";
import type { ConverterContext } from "../context";
import type { ArgumentConverter } from "../converter";
import type { Optional } from "../optional";
import { ValueTypes } from "../../types/valueType";
import { convertWith } from "./schema";

const integerSchema = z
  .string()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .refine((value) => Number.isSafeInteger(value));

const numberSchema = z
  .string()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i)
  .transform(Number)
  .refine((value) => Number.isFinite(value));

const booleanSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(["true", "false", "yes", "no", "on", "off", "1", "0"]))
  .transform((value) => value === "true" || value === "yes" || value === "on" || value === "1");

const bigintSchema = z
  .string()
  .regex(/^[+-]?\d+$/)
  .transform((value) => BigInt(value));

export class StringConverter implements ArgumentConverter<string> {
  static readonly targetType = ValueTypes.String;
  readonly readableName = "Text";

  async convert(context: ConverterContext): Promise<Optional<string>> {
    return convertWith(z.string(), context.argument);
  }
}

export class IntegerConverter implements ArgumentConverter<number> {
  static readonly targetType = ValueTypes.Integer;
  readonly readableName = "Integer";

  async convert(context: ConverterContext): Promise<Optional<number>> {
    return convertWith(integerSchema, context.argument);
  }
}

export class NumberConverter implements ArgumentConverter<number> {
  static readonly targetType = ValueTypes.Number;
  readonly readableName = "Decimal Number";

  async convert(context: ConverterContext): Promise<Optional<number>> {
    return convertWith(numberSchema, context.argument);
  }
}

export class BooleanConverter implements ArgumentConverter<boolean> {
  static readonly targetType = ValueTypes.Boolean;
  readonly readableName = "Boolean (true/false)";

  async convert(context: ConverterContext): Promise<Optional<boolean>> {
    return convertWith(booleanSchema, context.argument);
  }
}

export class BigIntConverter implements ArgumentConverter<bigint> {
  static readonly targetType = ValueTypes.BigInt;
  readonly readableName = "Big Integer";

  async convert(context: ConverterContext): Promise<Optional<bigint>> {
    return convertWith(bigintSchema, context.argument);
  }
}

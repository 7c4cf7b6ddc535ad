import { TypeHandleError } from "../../commands/errors";
import { findEnumType } from "../../types/normalizer";
import { describeType, ValueTypes } from "../../types/valueType";
import type { ConverterContext } from "../context";
import type { ArgumentConverter } from "../converter";
import { Optional } from "../optional";

/**
 * One converter for every enum: the concrete members come from the
 * declared type of the parameter being parsed.
 */
export class EnumConverter implements ArgumentConverter<string | number> {
  static readonly targetType = ValueTypes.Enum;
  readonly readableName = "Multiple Choice";

  async convert(context: ConverterContext): Promise<Optional<string | number>> {
    const parameter = context.parameter;
    const enumType = findEnumType(parameter.type);
    if (!enumType) {
      throw new TypeHandleError(
        `Parameter \`${parameter.name}\` of type ${describeType(parameter.type)} was routed to the enum converter`
      );
    }

    const token = context.argument;
    const lowered = token.toLowerCase();
    for (const [name, value] of Object.entries(enumType.members)) {
      if (name.toLowerCase() === lowered) return Optional.of(value);
    }

    for (const value of Object.values(enumType.members)) {
      if (typeof value === "number" ? String(value) === token : value === token) {
        return Optional.of(value);
      }
    }

    return Optional.none();
  }
}

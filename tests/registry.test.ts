import { describe, expect, test } from "vitest";
import { ConfigurationError, UnregisteredConverterError } from "../src/commands/errors";
import { IntegerConverter, StringConverter } from "../src/converters/builtins";
import type { ConverterContext } from "../src/converters/context";
import type { ArgumentConverter, DispatchFunction } from "../src/converters/converter";
import { Optional } from "../src/converters/optional";
import { emptyResolver, ServiceContainer } from "../src/services/resolver";
import { arrayOf, defineValueType, nullable, ValueTypes } from "../src/types/valueType";
import { newRegistry, type TestEvent } from "./helpers";

const Temperature = defineValueType<number>("Temperature");

abstract class AbstractTemperatureConverter implements ArgumentConverter<number> {
  static readonly targetType = Temperature;
  readonly readableName = "Temperature";
  abstract convert(context: ConverterContext): Promise<Optional<number>>;
}

class CelsiusConverter extends AbstractTemperatureConverter {
  async convert(context: ConverterContext): Promise<Optional<number>> {
    const match = /^(-?\d+)C$/.exec(context.argument);
    return match ? Optional.of(Number(match[1])) : Optional.none();
  }
}

class UntypedConverter {
  readonly readableName = "Untyped";

  async convert(): Promise<Optional<string>> {
    return Optional.none();
  }
}

class PrefixedConverter implements ArgumentConverter<string> {
  static readonly targetType = ValueTypes.String;
  static readonly inject = ["prefix"];
  readonly readableName = "Prefixed";
  readonly prefix: string;

  constructor(prefix: unknown) {
    this.prefix = typeof prefix === "string" ? prefix : "";
  }

  async convert(context: ConverterContext): Promise<Optional<string>> {
    return Optional.of(`${this.prefix}${context.argument}`);
  }
}

describe("ConverterRegistry", () => {
  test("keeps the first of two conflicting converters and reports the second", () => {
    const registry = newRegistry();
    const first = new StringConverter();
    const second = new StringConverter();

    registry.addConverter(ValueTypes.String, first);
    expect(() => registry.addConverter(ValueTypes.String, second)).not.toThrow();

    const source = registry.registrationFor(ValueTypes.String)?.source;
    expect(source?.kind).toBe("instance");
    expect(source?.kind === "instance" ? source.converter : null).toBe(first);
    expect(registry.diagnostics).toEqual([
      {
        kind: "duplicate-converter",
        valueType: "String",
        existing: "StringConverter instance",
        rejected: "StringConverter instance",
      },
    ]);
  });

  test("ignores an equal registration without a diagnostic", () => {
    const registry = newRegistry();
    const converter = new IntegerConverter();

    registry.addConverter(ValueTypes.Integer, converter);
    registry.addConverter(ValueTypes.Integer, converter);
    registry.addConverterType(ValueTypes.String, StringConverter);
    registry.addConverterType(ValueTypes.String, StringConverter);

    expect(registry.diagnostics).toEqual([]);
  });

  test("treats different source kinds for one type as a conflict", () => {
    const registry = newRegistry();

    registry.addConverterType(ValueTypes.String, StringConverter);
    registry.addConverter(ValueTypes.String, new StringConverter());

    expect(registry.diagnostics.map((diagnostic) => diagnostic.kind)).toEqual(["duplicate-converter"]);
  });

  test("registers only concrete converter classes from a candidate list", () => {
    const registry = newRegistry();

    registry.registerFromTypes([
      AbstractTemperatureConverter,
      CelsiusConverter,
      UntypedConverter,
      { convert: () => Optional.none() },
      () => Optional.none(),
      function helper() {
        return 1;
      },
      42,
    ]);

    expect(registry.registrationFor(Temperature)?.toString()).toBe("type CelsiusConverter");
    expect(registry.diagnostics).toEqual([{ kind: "invalid-converter", type: "UntypedConverter" }]);
  });

  test("publishes converters and dispatch functions with the same keys", () => {
    const registry = newRegistry();
    registry.registerFromTypes([CelsiusConverter, StringConverter]).addConverter(ValueTypes.Integer, new IntegerConverter());

    registry.finalize(emptyResolver);

    expect(registry.isFinalized).toBe(true);
    expect([...registry.converters.keys()]).toEqual([Temperature, ValueTypes.String, ValueTypes.Integer]);
    expect([...registry.dispatchers.keys()]).toEqual([Temperature, ValueTypes.String, ValueTypes.Integer]);
    expect(registry.converters.get(Temperature)).toBeInstanceOf(CelsiusConverter);
  });

  test("builds converter classes through the service resolver", () => {
    const registry = newRegistry();
    registry.addConverterType(ValueTypes.String, PrefixedConverter);

    registry.finalize(new ServiceContainer().addSingleton("prefix", "#"));

    const converter = registry.converters.get(ValueTypes.String);
    expect(converter).toBeInstanceOf(PrefixedConverter);
    expect(converter instanceof PrefixedConverter && converter.prefix).toBe("#");
  });

  test("aborts finalize without publishing when a service is missing", () => {
    const registry = newRegistry();
    registry.addConverter(ValueTypes.Integer, new IntegerConverter());
    registry.addConverterType(ValueTypes.String, PrefixedConverter);

    expect(() => registry.finalize(new ServiceContainer())).toThrow(ConfigurationError);
    expect(registry.isFinalized).toBe(false);
    expect(registry.converters.size).toBe(0);
    expect(registry.dispatchers.size).toBe(0);
  });

  test("rejects a dispatch function that has no declaring converter", () => {
    const registry = newRegistry();
    const dispatch: DispatchFunction<TestEvent> = async () => Optional.none();
    registry.addConverterFunction(Temperature, dispatch);

    expect(() => registry.finalize(emptyResolver)).toThrowError(
      "No converter instance or type was provided for Temperature and the dispatch function declares none"
    );
  });

  test("uses a provided dispatch function as is", () => {
    const registry = newRegistry();
    const dispatch: DispatchFunction<TestEvent> = async () => Optional.of(21);
    registry.addConverterFunction(Temperature, dispatch, CelsiusConverter);

    registry.finalize(emptyResolver);

    expect(registry.dispatchers.get(Temperature)).toBe(dispatch);
    expect(registry.converters.get(Temperature)).toBeInstanceOf(CelsiusConverter);
  });

  test("refuses a second finalize", () => {
    const registry = newRegistry().finalize(emptyResolver);

    expect(() => registry.finalize(emptyResolver)).toThrowError("Converter registry is already finalized");
  });

  test("ignores registrations after finalization", () => {
    const registry = newRegistry().finalize(emptyResolver);

    registry.addConverter(ValueTypes.String, new StringConverter());

    expect(registry.converters.has(ValueTypes.String)).toBe(false);
    expect(registry.diagnostics).toEqual([
      { kind: "registry-finalized", valueType: "String", rejected: "StringConverter instance" },
    ]);
  });

  test("published maps never hand out their backing store", () => {
    const registry = newRegistry().addConverter(ValueTypes.String, new StringConverter()).finalize(emptyResolver);
    const views: unknown[] = [];

    registry.converters.forEach((_converter, _type, map) => views.push(map));
    registry.dispatchers.forEach((_dispatch, _type, map) => views.push(map));

    expect(views).toHaveLength(2);
    expect(views[0]).toBe(registry.converters);
    expect(views[1]).toBe(registry.dispatchers);
    expect(views.some((view) => view instanceof Map)).toBe(false);
    expect(Object.isFrozen(registry.converters)).toBe(true);
    expect(Object.isFrozen(registry.dispatchers)).toBe(true);
  });

  test("looks up dispatch functions by normalized type", () => {
    const registry = newRegistry().addConverter(ValueTypes.Integer, new IntegerConverter());

    expect(() => registry.getDispatch(ValueTypes.Integer)).toThrow(UnregisteredConverterError);
    registry.finalize(emptyResolver);

    const dispatch = registry.dispatchers.get(ValueTypes.Integer);
    expect(registry.getDispatch(arrayOf(ValueTypes.Integer))).toBe(dispatch);
    expect(registry.getDispatch(nullable(ValueTypes.Integer))).toBe(dispatch);
    expect(() => registry.getDispatch(Temperature)).toThrowError("No converter is registered for type `Temperature`");
  });
});

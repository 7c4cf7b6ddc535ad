import type { Logger } from "pino";
import { ConfigurationError, UnregisteredConverterError } from "../commands/errors";
import type { ServiceResolver } from "../services/resolver";
import { normalizeType } from "../types/normalizer";
import { describeType, type ValueType } from "../types/valueType";
import {
  getTargetType,
  isConverterClass,
  type ArgumentConverter,
  type ConverterClass,
  type DispatchFunction,
} from "./converter";
import type { GenericDispatcher } from "./dispatcher";
import { ConverterRegistration } from "./registration";

export type RegistryDiagnostic =
  | { kind: "duplicate-converter"; valueType: string; existing: string; rejected: string }
  | { kind: "invalid-converter"; type: string }
  | { kind: "registry-finalized"; valueType: string; rejected: string };

interface FinalizedConverters<TEvent> {
  converters: ReadonlyMap<ValueType, ArgumentConverter<unknown, TEvent>>;
  dispatchers: ReadonlyMap<ValueType, DispatchFunction<TEvent>>;
}

/**
 * Value type → converter. Filled at startup, then finalized once into two
 * frozen maps that every parse reads without locking.
 */
export class ConverterRegistry<TEvent = unknown> {
  private readonly logger: Logger;
  private readonly dispatcher: GenericDispatcher<TEvent>;

  /**
   * Maps value type → registration, first insertion wins
   */
  private registrations = new Map<ValueType, ConverterRegistration<TEvent>>();
  private finalized: FinalizedConverters<TEvent> | null = null;
  private readonly emitted: RegistryDiagnostic[] = [];

  constructor(dispatcher: GenericDispatcher<TEvent>, logger: Logger) {
    this.dispatcher = dispatcher;
    this.logger = logger.child({ component: "converter-registry" });
  }

  get isFinalized(): boolean {
    return this.finalized !== null;
  }

  get diagnostics(): readonly RegistryDiagnostic[] {
    return this.emitted;
  }

  /**
   * Frozen value type → converter instance map.
   * Empty until finalize() succeeds.
   */
  get converters(): ReadonlyMap<ValueType, ArgumentConverter<unknown, TEvent>> {
    return this.finalized?.converters ?? new Map<ValueType, ArgumentConverter<unknown, TEvent>>();
  }

  get dispatchers(): ReadonlyMap<ValueType, DispatchFunction<TEvent>> {
    return this.finalized?.dispatchers ?? new Map<ValueType, DispatchFunction<TEvent>>();
  }

  registrationFor(type: ValueType): ConverterRegistration<TEvent> | null {
    return this.registrations.get(type) ?? null;
  }

  /**
   * Inserts under the registration's target type if absent.
   * A conflicting registration is reported and dropped, never thrown.
   */
  register(registration: ConverterRegistration<TEvent>): void {
    if (this.finalized) {
      this.report({
        kind: "registry-finalized",
        valueType: describeType(registration.targetType),
        rejected: registration.toString(),
      });
      return;
    }

    const existing = this.registrations.get(registration.targetType);
    if (!existing) {
      this.registrations.set(registration.targetType, registration);
      return;
    }

    if (!registration.equals(existing)) {
      this.report({
        kind: "duplicate-converter",
        valueType: describeType(existing.targetType),
        existing: existing.toString(),
        rejected: registration.toString(),
      });
    }
  }

  addConverter<T>(type: ValueType<T>, converter: ArgumentConverter<T, TEvent>): this {
    this.register(ConverterRegistration.fromInstance(type, converter));
    return this;
  }

  addConverterType<T>(type: ValueType<T>, converterType: ConverterClass<T, TEvent>): this {
    this.register(ConverterRegistration.fromType(type, converterType));
    return this;
  }

  addConverterFunction(
    type: ValueType,
    dispatch: DispatchFunction<TEvent>,
    declaringType?: ConverterClass<unknown, TEvent>
  ): this {
    this.register(ConverterRegistration.fromFunction(type, dispatch, declaringType));
    return this;
  }

  /**
   * Registers every converter class among `candidates`, e.g. the values of a
   * module namespace. Non-classes and classes without a concrete convert()
   * are skipped; classes missing a targetType are reported and skipped.
   */
  registerFromTypes(candidates: Iterable<unknown>): this {
    for (const candidate of candidates) {
      if (!isConverterClass(candidate)) continue;

      const targetType = getTargetType(candidate);
      if (!targetType) {
        this.report({ kind: "invalid-converter", type: candidate.name || "<anonymous class>" });
        continue;
      }

      this.register(new ConverterRegistration<TEvent>(targetType, { kind: "type", type: candidate }));
    }
    return this;
  }

  /**
   * Resolves every registration and publishes both maps together.
   * Any failure is a ConfigurationError and leaves the registry open.
   */
  finalize(resolver: ServiceResolver): this {
    if (this.finalized) throw new ConfigurationError("Converter registry is already finalized");

    const converters = new Map<ValueType, ArgumentConverter<unknown, TEvent>>();
    const dispatchers = new Map<ValueType, DispatchFunction<TEvent>>();
    for (const registration of this.registrations.values()) {
      try {
        converters.set(registration.targetType, registration.resolveConverter(resolver));
        dispatchers.set(registration.targetType, registration.resolveDispatch(resolver, this.dispatcher));
      } catch (error) {
        if (error instanceof ConfigurationError) throw error;
        throw new ConfigurationError(
          `Failed to resolve converter ${registration.toString()} for ${describeType(registration.targetType)}`,
          { valueType: describeType(registration.targetType), registration: registration.toString() },
          { cause: error }
        );
      }
    }

    this.finalized = Object.freeze({
      converters: freezeMap(converters),
      dispatchers: freezeMap(dispatchers),
    });
    this.logger.debug({ converters: converters.size }, "converter registry finalized");
    return this;
  }

  /**
   * Looks up the entry point for a declared parameter type.
   * Missing entries mean the command metadata and registry disagree.
   */
  getDispatch(type: ValueType): DispatchFunction<TEvent> {
    const key = normalizeType(type);
    const dispatch = this.finalized?.dispatchers.get(key);
    if (!dispatch) throw new UnregisteredConverterError(describeType(key));
    return dispatch;
  }

  private report(diagnostic: RegistryDiagnostic): void {
    this.emitted.push(diagnostic);
    switch (diagnostic.kind) {
      case "duplicate-converter":
        this.logger.warn(
          diagnostic,
          `Failed to add converter ${diagnostic.rejected} because a converter for type ${diagnostic.valueType} already exists: ${diagnostic.existing}`
        );
        break;
      case "invalid-converter":
        this.logger.warn(diagnostic, `Converter ${diagnostic.type} does not declare a static targetType and was skipped`);
        break;
      case "registry-finalized":
        this.logger.warn(diagnostic, `Converter ${diagnostic.rejected} was registered after finalization and was ignored`);
        break;
    }
  }
}

function freezeMap<K, V>(source: Map<K, V>): ReadonlyMap<K, V> {
  const entries = new Map(source);
  const frozen: ReadonlyMap<K, V> = Object.freeze({
    get size() {
      return entries.size;
    },
    get: (key: K) => entries.get(key),
    has: (key: K) => entries.has(key),
    forEach: (callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown) =>
      entries.forEach((value, key) => callback.call(thisArg, value, key, frozen)),
    entries: () => entries.entries(),
    keys: () => entries.keys(),
    values: () => entries.values(),
    [Symbol.iterator]: () => entries[Symbol.iterator](),
  });
  return frozen;
}

import { ConfigurationError } from "../commands/errors";
import { createInstance, type ServiceResolver } from "../services/resolver";
import { describeType, type ValueType } from "../types/valueType";
import { lazy, type Lazy } from "../utils/lazy";
import {
  getTargetType,
  isConverterClass,
  isConverterInstance,
  type ArgumentConverter,
  type ConverterClass,
  type DispatchFunction,
} from "./converter";
import type { GenericDispatcher } from "./dispatcher";

export type ConverterSource<TEvent = unknown> =
  | { readonly kind: "instance"; readonly converter: ArgumentConverter<unknown, TEvent> }
  | { readonly kind: "type"; readonly type: ConverterClass<unknown, TEvent> }
  | {
      readonly kind: "function";
      readonly dispatch: DispatchFunction<TEvent>;
      readonly declaringType?: ConverterClass<unknown, TEvent>;
    };

/**
 * Binds a value type to a converter source. The converter instance and the
 * dispatch function are each resolved at most once and cached here.
 */
export class ConverterRegistration<TEvent = unknown> {
  readonly targetType: ValueType;
  readonly source: ConverterSource<TEvent>;

  private converter: Lazy<ArgumentConverter<unknown, TEvent>> | null = null;
  private dispatch: Lazy<DispatchFunction<TEvent>> | null = null;

  constructor(targetType: ValueType, source: ConverterSource<TEvent>) {
    this.targetType = targetType;
    this.source = Object.freeze({ ...source });
  }

  static fromInstance<T, TEvent>(
    targetType: ValueType<T>,
    converter: ArgumentConverter<T, TEvent>
  ): ConverterRegistration<TEvent> {
    return new ConverterRegistration<TEvent>(targetType, { kind: "instance", converter });
  }

  static fromType<T, TEvent>(
    targetType: ValueType<T>,
    type: ConverterClass<T, TEvent>
  ): ConverterRegistration<TEvent> {
    return new ConverterRegistration<TEvent>(targetType, { kind: "type", type });
  }

  static fromFunction<TEvent>(
    targetType: ValueType,
    dispatch: DispatchFunction<TEvent>,
    declaringType?: ConverterClass<unknown, TEvent>
  ): ConverterRegistration<TEvent> {
    return new ConverterRegistration<TEvent>(targetType, { kind: "function", dispatch, declaringType });
  }

  get isResolved(): boolean {
    return (this.converter?.isResolved ?? false) && (this.dispatch?.isResolved ?? false);
  }

  /**
   * Existing instance first, then the declared class, then the class that
   * declares the dispatch function.
   */
  resolveConverter(resolver: ServiceResolver): ArgumentConverter<unknown, TEvent> {
    if (!this.converter?.isResolved) this.converter = lazy(() => this.createConverter(resolver));
    return this.converter.value;
  }

  resolveDispatch(resolver: ServiceResolver, dispatcher: GenericDispatcher<TEvent>): DispatchFunction<TEvent> {
    if (!this.dispatch?.isResolved) this.dispatch = lazy(() => {
      if (this.source.kind === "function") return this.source.dispatch;
      return dispatcher.dispatchFor(this.targetType, this.resolveConverter(resolver));
    });
    return this.dispatch.value;
  }

  /**
   * Same target type and the same source of the same kind.
   */
  equals(other: ConverterRegistration<TEvent>): boolean {
    if (this.targetType !== other.targetType) return false;

    const mine = this.source;
    const theirs = other.source;
    if (mine.kind === "function" && theirs.kind === "function") return mine.dispatch === theirs.dispatch;
    if (mine.kind === "instance" && theirs.kind === "instance") return mine.converter === theirs.converter;
    if (mine.kind === "type" && theirs.kind === "type") return mine.type === theirs.type;
    return false;
  }

  toString(): string {
    switch (this.source.kind) {
      case "instance":
        return `${this.source.converter.constructor.name} instance`;
      case "type":
        return `type ${this.source.type.name}`;
      case "function":
        return `function ${this.source.dispatch.name || "<anonymous>"}`;
    }
  }

  private createConverter(resolver: ServiceResolver): ArgumentConverter<unknown, TEvent> {
    switch (this.source.kind) {
      case "instance":
        if (!isConverterInstance(this.source.converter)) {
          throw new ConfigurationError(`Converter ${this.toString()} does not implement convert()`, {
            registration: this.toString(),
          });
        }
        return this.source.converter;
      case "type":
        return this.instantiate(this.source.type, resolver);
      case "function":
        if (!this.source.declaringType) {
          throw new ConfigurationError(
            `No converter instance or type was provided for ${describeType(this.targetType)} and the dispatch function declares none`,
            { valueType: describeType(this.targetType), registration: this.toString() }
          );
        }
        return this.instantiate(this.source.declaringType, resolver);
    }
  }

  private instantiate(
    type: ConverterClass<unknown, TEvent>,
    resolver: ServiceResolver
  ): ArgumentConverter<unknown, TEvent> {
    const typeName = type.name;
    const meta = { valueType: describeType(this.targetType), registration: this.toString() };
    if (!isConverterClass(type)) {
      throw new ConfigurationError(`Type ${typeName} does not implement convert()`, meta);
    }
    if (getTargetType(type) === null) {
      throw new ConfigurationError(`Type ${typeName} does not declare a static targetType`, meta);
    }

    try {
      return createInstance(resolver, type);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to create instance of converter '${typeName}': its services could not be resolved or its constructor threw`,
        meta,
        { cause: error }
      );
    }
  }
}

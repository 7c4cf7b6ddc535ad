import { ConfigurationError } from "../commands/errors";
import { describeType, type ValueType } from "../types/valueType";
import type { ConverterContext } from "./context";
import { isConverterInstance, type ArgumentConverter, type DispatchFunction } from "./converter";
import type { Optional } from "./optional";

/**
 * The strongly typed conversion routine the dispatcher bridges to.
 */
export type ExecuteConverter<TEvent> = <T>(
  converter: ArgumentConverter<T, TEvent>,
  context: ConverterContext<TEvent>,
  event: TEvent
) => Promise<Optional<unknown>>;

interface DispatchEntry<TEvent> {
  converter: ArgumentConverter<unknown, TEvent>;
  dispatch: DispatchFunction<TEvent>;
}

/**
 * Builds one type-erased entry point per target type and caches it.
 * An entry point stays bound to the converter it was built for.
 */
export class GenericDispatcher<TEvent = unknown> {
  private readonly execute: ExecuteConverter<TEvent>;
  private entries = new Map<ValueType, DispatchEntry<TEvent>>();

  constructor(execute: ExecuteConverter<TEvent>) {
    this.execute = execute;
  }

  get size(): number {
    return this.entries.size;
  }

  dispatchFor<T>(type: ValueType<T>, converter: ArgumentConverter<T, TEvent>): DispatchFunction<TEvent> {
    const existing = this.entries.get(type);
    if (existing) {
      if (existing.converter !== converter) {
        throw new ConfigurationError(
          `A dispatch function for ${describeType(type)} is already bound to ${existing.converter.readableName}`,
          { valueType: describeType(type) }
        );
      }
      return existing.dispatch;
    }

    if (!isConverterInstance(converter)) {
      throw new ConfigurationError(`Converter for ${describeType(type)} does not implement convert()`, {
        valueType: describeType(type),
      });
    }

    const execute = this.execute;
    const dispatch: DispatchFunction<TEvent> = (context, event) => execute(converter, context, event);
    this.entries.set(type, { converter, dispatch });
    return dispatch;
  }
}

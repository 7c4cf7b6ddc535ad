import type { Logger } from "pino";
import { ArgumentParseError, isProgrammingError } from "../commands/errors";
import type { ConverterContext } from "../converters/context";
import type { ArgumentConverter } from "../converters/converter";
import { Optional } from "../converters/optional";
import type { ConverterRegistry } from "../converters/registry";
import type { CommandErroredEvent, ErrorChannel } from "../events/channel";
import { describeType } from "../types/valueType";
import { isVariadic, type ParameterDescriptor } from "./parameter";

export type ParsedArguments = ReadonlyMap<ParameterDescriptor, unknown>;

export type CreateCommandContext<TEvent, TCommandContext> = (
  context: ConverterContext<TEvent>,
  event: TEvent,
  parsed: ParsedArguments
) => TCommandContext;

interface ArgumentParserOptions<TEvent, TCommandContext> {
  registry: ConverterRegistry<TEvent>;
  errorChannel: ErrorChannel<CommandErroredEvent<TCommandContext>>;
  createContext: CreateCommandContext<TEvent, TCommandContext>;
  logger: Logger;
}

/**
 * Typed conversion for the parameter the cursor is on. Handed to the
 * GenericDispatcher, which binds it to each registered converter.
 */
export async function executeConverter<T, TEvent>(
  converter: ArgumentConverter<T, TEvent>,
  context: ConverterContext<TEvent>,
  event: TEvent
): Promise<Optional<unknown>> {
  const parameter = context.parameter;
  if (!context.nextArgument()) {
    if (parameter.defaultValue.hasValue) return parameter.defaultValue;
    if (isVariadic(parameter)) return Optional.of([]);
    throw new ArgumentParseError(parameter, undefined, `Missing argument for \`${parameter.name}\`.`);
  }

  if (!isVariadic(parameter)) {
    return converter.convert(context, event);
  }

  const values: T[] = [];
  do {
    context.signal?.throwIfAborted();
    const result = await converter.convert(context, event);
    if (!result.hasValue) break;
    values.push(result.value);
  } while (context.nextArgument());
  return Optional.of(values);
}

/**
 * Walks the cursor over a command's parameters and turns raw tokens into
 * typed values. Stateless between calls: every parse owns its cursor and map.
 */
export class ArgumentParser<TEvent, TCommandContext> {
  private readonly registry: ConverterRegistry<TEvent>;
  private readonly errorChannel: ErrorChannel<CommandErroredEvent<TCommandContext>>;
  private readonly createContext: CreateCommandContext<TEvent, TCommandContext>;
  private readonly logger: Logger;

  constructor(options: ArgumentParserOptions<TEvent, TCommandContext>) {
    this.registry = options.registry;
    this.errorChannel = options.errorChannel;
    this.createContext = options.createContext;
    this.logger = options.logger.child({ component: "argument-parser" });
  }

  /**
   * Returns the built context, or null after pushing exactly one failure
   * to the error channel. Only programming errors are thrown.
   */
  async parse(context: ConverterContext<TEvent>): Promise<TCommandContext | null> {
    const parsed = new Map<ParameterDescriptor, unknown>();
    const cursor: { active: ParameterDescriptor | null } = { active: null };

    let failure: ArgumentParseError | null;
    try {
      failure = await this.populate(context, parsed, cursor);
    } catch (error) {
      if (isProgrammingError(error)) throw error;
      failure = error instanceof ArgumentParseError ? error : new ArgumentParseError(cursor.active, error);
    }

    const ordered = orderByDeclaration(context.command.parameters, parsed);
    if (failure) {
      this.logger.debug(
        { command: context.command.name, parameter: failure.parameter?.name, err: failure },
        "argument parsing failed"
      );
      await this.errorChannel.notify({
        context: this.createContext(context, context.event, ordered),
        error: failure,
      });
      return null;
    }

    return this.createContext(context, context.event, ordered);
  }

  private async populate(
    context: ConverterContext<TEvent>,
    parsed: Map<ParameterDescriptor, unknown>,
    cursor: { active: ParameterDescriptor | null }
  ): Promise<ArgumentParseError | null> {
    while (context.nextParameter()) {
      const parameter = context.parameter;
      cursor.active = parameter;
      context.signal?.throwIfAborted();

      const dispatch = this.registry.getDispatch(parameter.type);
      const result = await dispatch(context, context.event);
      if (!result.hasValue) {
        return new ArgumentParseError(
          parameter,
          undefined,
          `Argument converter for type \`${describeType(parameter.type)}\` was unable to parse the argument.`
        );
      }
      parsed.set(parameter, result.value);
    }

    // The cursor may stop before the declared list ends; fill the rest from defaults.
    for (const parameter of context.command.parameters) {
      if (parsed.has(parameter)) continue;
      cursor.active = parameter;
      if (!parameter.defaultValue.hasValue) {
        return new ArgumentParseError(parameter, undefined, `No value was provided for \`${parameter.name}\`.`);
      }
      parsed.set(parameter, parameter.defaultValue.value);
    }

    return null;
  }
}

function orderByDeclaration(
  parameters: readonly ParameterDescriptor[],
  parsed: Map<ParameterDescriptor, unknown>
): ParsedArguments {
  const ordered = new Map<ParameterDescriptor, unknown>();
  for (const parameter of parameters) {
    if (parsed.has(parameter)) ordered.set(parameter, parsed.get(parameter));
  }
  return ordered;
}

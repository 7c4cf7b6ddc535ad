import { Command } from "../src/commands/command";
import { CommandContext, createCommandContext } from "../src/commands/context";
import { TokenConverterContext } from "../src/converters/context";
import { registerBuiltinConverters } from "../src/converters/builtins";
import { GenericDispatcher } from "../src/converters/dispatcher";
import { ConverterRegistry } from "../src/converters/registry";
import { AsyncEventChannel, type CommandErroredEvent } from "../src/events/channel";
import { silentLogger } from "../src/logging/logger";
import { ArgumentParser, executeConverter, type ParsedArguments } from "../src/parsing/parser";
import { defineParameter, type ParameterDescriptor } from "../src/parsing/parameter";
import { emptyResolver } from "../src/services/resolver";
import { ValueTypes, type ValueType } from "../src/types/valueType";

export type TestEvent = { user: string };

export const testEvent: TestEvent = { user: "tester" };

export class TestCommand extends Command<Record<string, unknown>, TestEvent> {
  readonly name: string;
  readonly parameters: readonly ParameterDescriptor[];

  constructor(name: string, parameters: ParameterDescriptor[]) {
    super();
    this.name = name;
    this.parameters = parameters;
  }

  execute(context: CommandContext<TestEvent>): Record<string, unknown> {
    return toRecord(context.arguments);
  }
}

export function toRecord(parsed: ParsedArguments): Record<string, unknown> {
  return Object.fromEntries([...parsed].map(([parameter, value]) => [parameter.name, value]));
}

export function parsedValues(context: CommandContext<TestEvent> | null): Record<string, unknown> | null {
  return context ? toRecord(context.arguments) : null;
}

export function newRegistry(): ConverterRegistry<TestEvent> {
  return new ConverterRegistry<TestEvent>(new GenericDispatcher<TestEvent>(executeConverter), silentLogger());
}

interface ParserHarnessOptions {
  builtins?: boolean;
  configure?: (registry: ConverterRegistry<TestEvent>) => void;
}

export function createHarness(options: ParserHarnessOptions = {}) {
  const logger = silentLogger();
  const registry = newRegistry();
  if (options.builtins ?? true) registerBuiltinConverters(registry);
  options.configure?.(registry);
  registry.finalize(emptyResolver);

  const failures: CommandErroredEvent<CommandContext<TestEvent>>[] = [];
  const created: ParsedArguments[] = [];
  const channel = new AsyncEventChannel<CommandErroredEvent<CommandContext<TestEvent>>>("command-errored", logger);
  channel.subscribe((failure) => {
    failures.push(failure);
  });

  const parser = new ArgumentParser<TestEvent, CommandContext<TestEvent>>({
    registry,
    errorChannel: channel,
    createContext: (context, event, parsed) => {
      created.push(parsed);
      return createCommandContext(context, event, parsed);
    },
    logger,
  });

  return { registry, channel, parser, failures, created };
}

export function cursorFor(
  command: Command<unknown, TestEvent>,
  tokens: string[],
  signal?: AbortSignal
): TokenConverterContext<TestEvent> {
  return new TokenConverterContext({ command, event: testEvent, tokens, signal });
}

/**
 * Cursor positioned on a single token of a single parameter, for calling a
 * converter directly.
 */
export function positionedOn(token: string, type: ValueType = ValueTypes.String): TokenConverterContext<TestEvent> {
  const command = new TestCommand("sample", [defineParameter({ name: "value", type })]);
  const context = cursorFor(command, [token]);
  context.nextParameter();
  context.nextArgument();
  return context;
}

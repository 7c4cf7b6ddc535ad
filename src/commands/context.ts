import type { Command } from "./command";
import type { ParameterDescriptor } from "../parsing/parameter";
import type { ConverterContext } from "../converters/context";

interface CommandContextProps<TEvent> {
  command: Command<unknown, TEvent>;
  event: TEvent;
  arguments?: ReadonlyMap<ParameterDescriptor, unknown>;
}

export class CommandContext<TEvent = unknown> {
  readonly command: Command<unknown, TEvent>;

  /**
   * Host payload that triggered the invocation
   * e.g. a chat message, a socket frame
   */
  readonly event: TEvent;

  /**
   * Parsed values keyed by parameter, in declaration order.
   * Partial when the context is attached to a parse failure.
   */
  readonly arguments: ReadonlyMap<ParameterDescriptor, unknown>;

  constructor(params: CommandContextProps<TEvent>) {
    this.command = params.command;
    this.event = params.event;
    this.arguments = new Map<ParameterDescriptor, unknown>(params.arguments ?? []);
  }

  /**
   * Looks up a parsed value by parameter name.
   * Returns undefined if the parameter was not populated.
   */
  argument(name: string): unknown {
    for (const [parameter, value] of this.arguments) {
      if (parameter.name === name) return value;
    }
    return undefined;
  }
}

/**
 * Default context factory handed to the argument parser
 */
export function createCommandContext<TEvent>(
  context: ConverterContext<TEvent>,
  event: TEvent,
  parsed: ReadonlyMap<ParameterDescriptor, unknown>
): CommandContext<TEvent> {
  return new CommandContext({ command: context.command, event, arguments: parsed });
}

import type { CommandRegistry } from "./registry";
import type { CommandContext } from "./context";
import { UnknownCommandError } from "./errors";
import { TokenConverterContext } from "../converters/context";
import type { ArgumentParser } from "../parsing/parser";
import { tokenize } from "../text/tokenizer";

export type DispatchOutcome =
  | { status: "executed"; command: string; result: unknown }
  | { status: "failed"; command: string };

interface DispatchOptions {
  signal?: AbortSignal;
}

export class CommandDispatcher<TEvent = unknown> {
  private readonly registry: CommandRegistry<TEvent>;
  private readonly parser: ArgumentParser<TEvent, CommandContext<TEvent>>;
  constructor(
    registry: CommandRegistry<TEvent>,
    parser: ArgumentParser<TEvent, CommandContext<TEvent>>
  ) {
    this.registry = registry;
    this.parser = parser;
  }

  /**
   * Dispatches a line of command text
   * Orchestrates:
   * - tokenizing
   * - lookup
   * - argument parsing
   * - execution
   * Parse failures were already reported to the error channel
   * when this resolves with status "failed".
   */
  async dispatch(input: string, event: TEvent, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const [commandName, ...tokens] = tokenize(input);
    if (commandName === undefined) throw new UnknownCommandError("");

    const command = this.registry.get(commandName);
    if (!command) throw new UnknownCommandError(commandName);

    // Argument parsing
    const context = await this.parser.parse(
      new TokenConverterContext({ command, event, tokens, signal: options.signal })
    );
    if (!context) return { status: "failed", command: command.name };

    // Execute command logic
    return { status: "executed", command: command.name, result: await command.execute(context) };
  }
}

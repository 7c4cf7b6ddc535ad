import type { CommandContext } from "./context";
import type { ParameterDescriptor } from "../parsing/parameter";

export abstract class Command<TResult = unknown, TEvent = unknown> {
  /**
   * Canonical command name (e.g. ECHO, ROLL)
   */
  abstract readonly name: string;

  /**
   * Alternative names resolved by the registry
   */
  readonly aliases: readonly string[] = [];

  readonly description: string = "";

  /**
   * Declared parameters, in the order arguments are consumed.
   * Read-only metadata: the parser never mutates it.
   */
  abstract readonly parameters: readonly ParameterDescriptor[];

  /**
   * Execute command logic with fully parsed arguments.
   * May suspend.
   */
  abstract execute(context: CommandContext<TEvent>): Promise<TResult> | TResult;
}

import type { Command } from "./command";
import { CommandError } from "./errors";

export class CommandRegistry<TEvent = unknown> {
  /**
   * Maps upper-cased name or alias → Command instance
   */
  private commands = new Map<string, Command<unknown, TEvent>>();

  /**
   * Registers a command at startup
   * Must throw on duplicate names or aliases
   */
  register(command: Command<unknown, TEvent>): this {
    const names = [command.name, ...command.aliases].map((name) => name.toUpperCase());
    for (const name of names) {
      if (this.commands.has(name)) throw new CommandError(`Command '${name}' is already registered`, { command: name });
    }
    for (const name of names) this.commands.set(name, command);
    return this;
  }

  /**
   * Resolves a command by name or alias
   * Returns null if not found
   */
  get(name: string): Command<unknown, TEvent> | null {
    return this.commands.get(name.toUpperCase()) || null;
  }

  /**
   * Returns all registered commands once each
   * Used for introspection / help
   */
  list(): Command<unknown, TEvent>[] {
    return Array.from(new Set(this.commands.values()));
  }
}

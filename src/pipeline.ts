import type { Logger } from "pino";
import { loadConfig, type CommandArgsConfig, type EnvSource } from "./configs";
import type { Command } from "./commands/command";
import { createCommandContext, type CommandContext } from "./commands/context";
import { CommandDispatcher } from "./commands/dispatcher";
import { CommandRegistry } from "./commands/registry";
import { registerBuiltinConverters } from "./converters/builtins";
import { GenericDispatcher } from "./converters/dispatcher";
import { ConverterRegistry } from "./converters/registry";
import { AsyncEventChannel, type CommandErroredEvent } from "./events/channel";
import { createLogger } from "./logging/logger";
import { ArgumentParser, executeConverter } from "./parsing/parser";
import { emptyResolver, type ServiceResolver } from "./services/resolver";

interface ArgumentPipelineOptions<TEvent> {
  env?: EnvSource;
  logger?: Logger;
  resolver?: ServiceResolver;
  /**
   * Extra registrations, applied after the built-ins and before finalize
   */
  configure?: (registry: ConverterRegistry<TEvent>) => void;
  commands?: Command<unknown, TEvent>[];
}

export interface ArgumentPipeline<TEvent> {
  config: CommandArgsConfig;
  logger: Logger;
  converters: ConverterRegistry<TEvent>;
  commands: CommandRegistry<TEvent>;
  errors: AsyncEventChannel<CommandErroredEvent<CommandContext<TEvent>>>;
  parser: ArgumentParser<TEvent, CommandContext<TEvent>>;
  dispatcher: CommandDispatcher<TEvent>;
}

/**
 * Startup wiring. Throws ConfigError or ConfigurationError; once it returns,
 * the converter maps are frozen and the parser is safe to share.
 */
export function createArgumentPipeline<TEvent = unknown>(
  options: ArgumentPipelineOptions<TEvent> = {}
): ArgumentPipeline<TEvent> {
  const config = loadConfig(options.env);
  const logger = options.logger ?? createLogger(config.logLevel);

  const converters = new ConverterRegistry<TEvent>(new GenericDispatcher<TEvent>(executeConverter), logger);
  if (config.registerBuiltins) registerBuiltinConverters(converters);
  options.configure?.(converters);
  converters.finalize(options.resolver ?? emptyResolver);

  const commands = new CommandRegistry<TEvent>();
  for (const command of options.commands ?? []) commands.register(command);

  const errors = new AsyncEventChannel<CommandErroredEvent<CommandContext<TEvent>>>("command-errored", logger);
  const parser = new ArgumentParser<TEvent, CommandContext<TEvent>>({
    registry: converters,
    errorChannel: errors,
    createContext: createCommandContext,
    logger,
  });

  return {
    config,
    logger,
    converters,
    commands,
    errors,
    parser,
    dispatcher: new CommandDispatcher(commands, parser),
  };
}

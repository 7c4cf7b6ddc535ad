export { loadConfig, ConfigError } from "./configs";
export type { CommandArgsConfig, EnvSource } from "./configs";
export { createLogger, silentLogger } from "./logging/logger";
export type { Logger } from "./logging/logger";

export { Command } from "./commands/command";
export { CommandContext, createCommandContext } from "./commands/context";
export { CommandDispatcher } from "./commands/dispatcher";
export type { DispatchOutcome } from "./commands/dispatcher";
export { CommandRegistry } from "./commands/registry";
export {
  ArgumentParseError,
  CommandError,
  ConfigurationError,
  ServiceResolutionError,
  TokenizeError,
  TypeHandleError,
  UnknownCommandError,
  UnregisteredConverterError,
} from "./commands/errors";

export { ConverterContext, TokenConverterContext } from "./converters/context";
export type { ArgumentConverter, ConverterClass, DispatchFunction } from "./converters/converter";
export { GenericDispatcher } from "./converters/dispatcher";
export type { ExecuteConverter } from "./converters/dispatcher";
export { Optional } from "./converters/optional";
export { ConverterRegistration } from "./converters/registration";
export type { ConverterSource } from "./converters/registration";
export { ConverterRegistry } from "./converters/registry";
export type { RegistryDiagnostic } from "./converters/registry";
export * from "./converters/builtins";

export { AsyncEventChannel } from "./events/channel";
export type { CommandErroredEvent, ErrorChannel, EventHandler } from "./events/channel";

export { defineParameter, isVariadic, remainderAttribute } from "./parsing/parameter";
export type { ParameterAttribute, ParameterDescriptor } from "./parsing/parameter";
export { ArgumentParser, executeConverter } from "./parsing/parser";
export type { CreateCommandContext, ParsedArguments } from "./parsing/parser";

export { ServiceContainer, createInstance, emptyResolver } from "./services/resolver";
export type { ServiceResolver, ServiceToken } from "./services/resolver";

export { tokenize } from "./text/tokenizer";
export { arrayOf, defineValueType, describeType, enumType, isValueType, nullable, ValueTypes } from "./types/valueType";
export type { EnumMembers, ValueType } from "./types/valueType";
export { findEnumType, normalizeType } from "./types/normalizer";

export { createArgumentPipeline } from "./pipeline";
export type { ArgumentPipeline } from "./pipeline";

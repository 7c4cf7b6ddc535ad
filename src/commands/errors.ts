import type { ParameterDescriptor } from "../parsing/parameter";

type Meta = {
  command?: string;
  parameter?: string;
  valueType?: string;
  registration?: string;
};

export class CommandError extends Error {
  readonly meta: Meta;

  constructor(message: string, meta: Meta = {}, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.meta = Object.freeze(meta);
  }
}

export class UnknownCommandError extends CommandError {
  constructor(command: string) {
    super(`Unknown command '${command}'`, { command });
  }
}

/**
 * Per-invocation failure. Never escapes the parser: it is delivered
 * through the error channel instead.
 */
export class ArgumentParseError extends CommandError {
  /**
   * Null only when the cursor failed before reaching any parameter
   */
  readonly parameter: ParameterDescriptor | null;

  constructor(parameter: ParameterDescriptor | null, cause?: unknown, message?: string) {
    super(
      message ?? `Failed to parse argument \`${parameter?.name ?? "<none>"}\`: ${describeCause(cause)}`,
      parameter ? { parameter: parameter.name } : {},
      cause === undefined ? undefined : { cause }
    );
    this.parameter = parameter;
  }
}

/**
 * Startup failure raised while building or finalizing the converter registry.
 */
export class ConfigurationError extends CommandError {
  constructor(message: string, meta: Meta = {}, options?: ErrorOptions) {
    super(message, meta, options);
  }
}

export class TypeHandleError extends CommandError {
  constructor(message: string) {
    super(message);
  }
}

export class UnregisteredConverterError extends CommandError {
  constructor(valueType: string) {
    super(`No converter is registered for type \`${valueType}\``, { valueType });
  }
}

export class ServiceResolutionError extends CommandError {
  constructor(service: string, options?: ErrorOptions) {
    super(`Unable to resolve service '${service}'`, {}, options);
  }
}

export class TokenizeError extends CommandError {
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.position = position;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}

/**
 * Errors that indicate a registry/metadata mismatch in the host.
 * These are the only ones allowed to propagate out of the parser.
 */
export function isProgrammingError(error: unknown): boolean {
  return error instanceof TypeHandleError || error instanceof UnregisteredConverterError;
}

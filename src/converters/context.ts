import type { Command } from "../commands/command";
import type { ParameterDescriptor } from "../parsing/parameter";

/**
 * Cursor over the raw arguments of one invocation.
 * Owned by a single parse; never shared between invocations.
 */
export abstract class ConverterContext<TEvent = unknown> {
  abstract readonly command: Command<unknown, TEvent>;
  abstract readonly event: TEvent;

  /**
   * Cancellation for slow conversions; checked between parameters
   * and handed to converters that call out
   */
  abstract readonly signal?: AbortSignal;

  /**
   * Parameter the cursor is positioned on.
   * Throws before the first nextParameter() call.
   */
  abstract get parameter(): ParameterDescriptor;

  /**
   * Raw token the cursor is positioned on.
   * Throws before the first successful nextArgument() call.
   */
  abstract get argument(): string;

  /**
   * Moves to the next declared parameter.
   * Returns false once every parameter has been visited.
   */
  abstract nextParameter(): boolean;

  /**
   * Moves to the next raw token.
   * Returns false once the tokens are exhausted.
   */
  abstract nextArgument(): boolean;
}

interface TokenConverterContextProps<TEvent> {
  command: Command<unknown, TEvent>;
  event: TEvent;
  tokens: readonly string[];
  signal?: AbortSignal;
}

export class TokenConverterContext<TEvent = unknown> extends ConverterContext<TEvent> {
  readonly command: Command<unknown, TEvent>;
  readonly event: TEvent;
  readonly signal?: AbortSignal;
  readonly tokens: readonly string[];

  private parameterIndex = -1;
  private tokenIndex = -1;

  constructor(params: TokenConverterContextProps<TEvent>) {
    super();
    this.command = params.command;
    this.event = params.event;
    this.tokens = [...params.tokens];
    this.signal = params.signal;
  }

  get parameter(): ParameterDescriptor {
    const parameter = this.command.parameters[this.parameterIndex];
    if (!parameter) throw new Error("Cursor is not positioned on a parameter");
    return parameter;
  }

  get argument(): string {
    const token = this.tokens[this.tokenIndex];
    if (token === undefined) throw new Error("Cursor is not positioned on an argument");
    return token;
  }

  /**
   * Tokens not yet consumed by any parameter
   */
  get remainingTokens(): string[] {
    return this.tokens.slice(this.tokenIndex + 1);
  }

  nextParameter(): boolean {
    const count = this.command.parameters.length;
    this.parameterIndex = Math.min(this.parameterIndex + 1, count);
    return this.parameterIndex < count;
  }

  nextArgument(): boolean {
    const count = this.tokens.length;
    this.tokenIndex = Math.min(this.tokenIndex + 1, count);
    return this.tokenIndex < count;
  }
}

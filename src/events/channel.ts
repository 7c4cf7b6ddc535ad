import type { Logger } from "pino";
import type { ArgumentParseError } from "../commands/errors";

export type EventHandler<TPayload> = (payload: TPayload) => Promise<void> | void;

/**
 * Where the parser pushes failures. The parser awaits notify() but does not
 * care how, or whether, the failure reaches a user.
 */
export interface ErrorChannel<TPayload> {
  notify(payload: TPayload): Promise<void>;
}

export interface CommandErroredEvent<TCommandContext> {
  /**
   * Context built from whatever was parsed before the failure
   */
  context: TCommandContext;
  error: ArgumentParseError;
}

export class AsyncEventChannel<TPayload> implements ErrorChannel<TPayload> {
  readonly name: string;
  private readonly logger: Logger;
  private handlers: EventHandler<TPayload>[] = [];

  constructor(name: string, logger: Logger) {
    this.name = name;
    this.logger = logger.child({ component: "event-channel", event: name });
  }

  get handlerCount(): number {
    return this.handlers.length;
  }

  /**
   * Returns a function that removes the handler again
   */
  subscribe(handler: EventHandler<TPayload>): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((registered) => registered !== handler);
    };
  }

  /**
   * Runs handlers one after another in subscription order.
   * A failing handler is logged and the rest still run.
   */
  async notify(payload: TPayload): Promise<void> {
    for (const handler of [...this.handlers]) {
      try {
        await handler(payload);
      } catch (error) {
        this.logger.error({ err: error }, `Handler for event ${this.name} failed`);
      }
    }
  }
}

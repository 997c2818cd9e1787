import { toError } from "./errors";
import type { Logger } from "./logger";
import type { Receive, Send } from "./protocol";

export interface LifespanHooks {
  onStartup?: () => Promise<void> | void;
  onShutdown?: () => Promise<void> | void;
}

/**
 * Answers the host's lifespan protocol: one startup, any number of ignored
 * unknown events, then one shutdown.
 */
export class LifespanHandler {
  constructor(
    private readonly logger: Logger,
    private readonly hooks: LifespanHooks = {},
  ) {}

  async run(receive: Receive, send: Send): Promise<void> {
    while (true) {
      const event = await receive();
      switch (event.type) {
        case "lifespan.startup": {
          this.logger.info("Server is starting up");
          const failure = await this.runHook(this.hooks.onStartup, "startup");
          await send(
            failure === null
              ? { type: "lifespan.startup.complete" }
              : { type: "lifespan.startup.failed", message: failure },
          );
          break;
        }
        case "lifespan.shutdown": {
          this.logger.info("Server is shutting down");
          const failure = await this.runHook(this.hooks.onShutdown, "shutdown");
          await send(
            failure === null
              ? { type: "lifespan.shutdown.complete" }
              : { type: "lifespan.shutdown.failed", message: failure },
          );
          return;
        }
        default:
          this.logger.warn(`Unknown lifespan event "${event.type}"`);
      }
    }
  }

  /** Returns the failure message, or null when the hook succeeded. */
  private async runHook(hook: (() => Promise<void> | void) | undefined, stage: string): Promise<string | null> {
    if (!hook) return null;
    try {
      await hook();
      return null;
    } catch (err) {
      const error = toError(err);
      this.logger.error(`Error in ${stage} hook: ${error.message}`, error);
      return error.message;
    }
  }
}

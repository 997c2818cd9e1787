import { toError } from "@slipway/core";
import type { App, InboundEvent, Logger, OutboundEvent } from "@slipway/core";
import { EventQueue } from "./event-queue";

/**
 * Drives the lifespan protocol of an app: one long-running call that gets
 * `lifespan.startup` on start and `lifespan.shutdown` on stop.
 */
export class LifespanDriver {
  private readonly inbound = new EventQueue<InboundEvent>();
  /** `null` means the app returned */
  private readonly replies = new EventQueue<OutboundEvent | null>();
  private task: Promise<void> | null = null;
  private supported = true;

  constructor(
    private readonly app: App,
    private readonly logger: Logger,
  ) {}

  /** Resolves once the app completed startup; throws if it reported a failure. */
  async startup(): Promise<void> {
    this.task = this.app(
      { type: "lifespan" },
      () => this.inbound.next(),
      async (event) => this.replies.push(event),
    )
      .catch((err: unknown) => {
        const error = toError(err);
        this.logger.error(`Lifespan handler failed: ${error.message}`, error);
      })
      .finally(() => this.replies.end(null));

    this.inbound.push({ type: "lifespan.startup" });
    const reply = await this.replies.next();

    if (reply === null) {
      this.supported = false;
      this.logger.debug("App does not handle lifespan events");
      return;
    }
    if (reply.type === "lifespan.startup.failed") {
      throw new Error(`Startup failed: ${reply.message}`);
    }
    if (reply.type !== "lifespan.startup.complete") {
      throw new Error(`Unexpected ${reply.type} event during startup`);
    }
  }

  /** Sends `lifespan.shutdown` and waits for the app to finish. Failures are logged. */
  async shutdown(): Promise<void> {
    if (!this.task) return;
    const task = this.task;
    this.task = null;

    if (this.supported) {
      this.inbound.push({ type: "lifespan.shutdown" });
      const reply = await this.replies.next();
      if (reply?.type === "lifespan.shutdown.failed") {
        this.logger.error(`Shutdown failed: ${reply.message}`);
      }
    }
    await task;
  }
}

import { PeerDisconnected } from "@slipway/core";
import type { InboundEvent, OutboundEvent, Receive, Send } from "@slipway/core";

/** The writable half of an HTTP exchange; `http.ServerResponse` fits. */
export interface ResponseSink {
  readonly writableEnded: boolean;
  /** `headers` is a flat `[name, value, name, value, ...]` list */
  writeHead(statusCode: number, headers: string[]): unknown;
  write(chunk: Buffer): boolean;
  end(): unknown;
  once(event: "close" | "drain", listener: () => void): unknown;
  removeListener(event: "close" | "drain", listener: () => void): unknown;
}

/**
 * Maps one node:http request/response pair onto the host protocol.
 * `receive` pulls the request body; `send` writes the response.
 */
export class HttpExchange {
  private readonly body: AsyncIterator<unknown>;
  private bodyDone = false;
  private started = false;
  private ended = false;
  private closed = false;
  private readonly whenClosed: Promise<void>;

  constructor(
    request: AsyncIterable<unknown>,
    private readonly response: ResponseSink,
  ) {
    this.body = request[Symbol.asyncIterator]();
    this.whenClosed = new Promise((resolve) => {
      response.once("close", () => {
        this.closed = true;
        resolve();
      });
    });
  }

  /** True when the client went away before the response was complete. */
  get clientGone(): boolean {
    return this.closed && !this.ended;
  }

  get responseStarted(): boolean {
    return this.started;
  }

  get responseEnded(): boolean {
    return this.ended;
  }

  readonly receive: Receive = async (): Promise<InboundEvent> => {
    if (!this.bodyDone) {
      if (this.clientGone) return { type: "http.disconnect" };
      let result: IteratorResult<unknown>;
      try {
        result = await this.body.next();
      } catch {
        // aborted mid-body
        this.bodyDone = true;
        return { type: "http.disconnect" };
      }
      if (!result.done) {
        return { type: "http.request", body: toBuffer(result.value), moreBody: true };
      }
      this.bodyDone = true;
      return { type: "http.request", body: Buffer.alloc(0), moreBody: false };
    }
    await this.whenClosed;
    return { type: "http.disconnect" };
  };

  readonly send: Send = async (event: OutboundEvent): Promise<void> => {
    switch (event.type) {
      case "http.response.start":
        this.assertOpen();
        this.started = true;
        this.response.writeHead(event.status, event.headers.flat());
        return;
      case "http.response.body":
        this.assertOpen();
        if (event.body.length > 0 && !this.response.write(event.body)) {
          await this.drained();
        }
        if (!event.moreBody) {
          this.ended = true;
          this.response.end();
        }
        return;
      default:
        throw new Error(`Cannot send a ${event.type} event on an HTTP connection`);
    }
  };

  /**
   * End a response the app left open. Returns false when there was nothing
   * to do.
   */
  finish(): boolean {
    if (this.ended || this.response.writableEnded || this.closed) return false;
    if (!this.started) {
      this.started = true;
      this.response.writeHead(500, ["content-length", "0"]);
    }
    this.ended = true;
    this.response.end();
    return true;
  }

  private assertOpen(): void {
    if (this.clientGone) throw new PeerDisconnected("Client disconnected");
    if (this.ended) throw new Error("The response was already completed");
  }

  private drained(): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        this.response.removeListener("drain", done);
        this.response.removeListener("close", done);
        resolve();
      };
      this.response.once("drain", done);
      this.response.once("close", done);
    });
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk, "utf-8");
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError(`Unexpected request body chunk of type ${typeof chunk}`);
}

import { collectBody, decodeJson, encodeChunk, type Chunk } from "../body-codec";
import { DEFAULT_MAX_BODY_SIZE } from "../config";
import { ConnectionStateName } from "../connection-state";
import { PeerDisconnected, ProtocolStateError } from "../errors";
import type { HttpScope, Receive, Send } from "../protocol";
import { checkStatus, type ResponseHeaders } from "../response";
import { BaseRequest } from "./base-request";

const EMPTY = Buffer.alloc(0);

/** Request object handed to handlers for `http` scopes. */
export class HttpRequest extends BaseRequest<HttpScope> {
  readonly kind = "http";

  private readonly maxBodySize: number;
  private bodyTaken = false;
  private body: Buffer | null = null;
  private peerGone = false;

  constructor(scope: HttpScope, receive: Receive, send: Send, maxBodySize = DEFAULT_MAX_BODY_SIZE) {
    super(scope, receive, send);
    this.maxBodySize = maxBodySize;
  }

  get method(): string {
    return this.scope.method;
  }

  /** True once the client went away. */
  get disconnected(): boolean {
    return this.peerGone;
  }

  /**
   * Iterate over the raw body chunks. Single pass: every call after the first
   * returns an already-finished sequence. A client disconnect ends the
   * sequence early.
   */
  iterBody(): AsyncIterable<Buffer> {
    if (this.bodyTaken) return emptyBody();
    this.bodyTaken = true;
    return this.pullBody();
  }

  /**
   * Assemble the full body. Fails with `PayloadTooLarge` once more than
   * `limit` bytes arrived; the result is cached for later calls.
   */
  async getBody(limit: number = this.maxBodySize): Promise<Buffer> {
    if (this.body !== null) return this.body;
    if (this.bodyTaken) {
      throw new ProtocolStateError("Request body was already consumed", this.state);
    }
    const body = await collectBody(this.iterBody(), limit);
    if (this.peerGone) {
      throw new PeerDisconnected("Client disconnected before the request body was complete");
    }
    this.body = body;
    return body;
  }

  /** Assemble the body and parse it as JSON. */
  async getJson(limit: number = this.maxBodySize): Promise<unknown> {
    return decodeJson(await this.getBody(limit));
  }

  /** Send the status line and headers. Allowed once, before any body chunk. */
  async accept(status = 200, headers: ResponseHeaders = {}): Promise<void> {
    checkStatus(status);
    this.connection.transition("accept", "accept the response");
    await this.emit({ type: "http.response.start", status, headers: Object.entries(headers) });
  }

  /**
   * Send one body chunk, accepting with 200 first when needed. `send(null)`
   * or `more = false` ends the body.
   */
  async send(chunk: Chunk | null, more = true): Promise<void> {
    if (this.connection.is(ConnectionStateName.INIT)) {
      await this.accept(200, {});
    }
    const final = chunk === null || !more;
    this.connection.assert(final ? "close" : "stream", "send a response chunk");
    const body = chunk === null ? EMPTY : encodeChunk(chunk);
    this.connection.transition(final ? "close" : "stream", "send a response chunk");
    await this.emit({ type: "http.response.body", body, moreBody: !final });
  }

  private async *pullBody(): AsyncGenerator<Buffer> {
    while (true) {
      const event = await this.receiveEvent();
      if (event.type === "http.request") {
        yield event.body;
        if (!event.moreBody) return;
      } else if (event.type === "http.disconnect") {
        this.peerGone = true;
        this.markDisconnected();
        return;
      } else {
        throw new ProtocolStateError(`Unexpected ${event.type} event while reading the request body`, this.state);
      }
    }
  }
}

async function* emptyBody(): AsyncGenerator<Buffer> {
  // finished on first pull
}

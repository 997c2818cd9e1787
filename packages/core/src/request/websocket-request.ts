import { classifyBody, decodeJson, encodeJson } from "../body-codec";
import { ConnectionStateName } from "../connection-state";
import { EncodingError, PeerDisconnected, ProtocolStateError } from "../errors";
import { CloseCodes, NORMAL_CLOSE_CODES } from "../protocol";
import type { WebSocketScope } from "../protocol";
import { BaseRequest } from "./base-request";

/** One inbound WebSocket message */
export type WebSocketMessage =
  | { readonly kind: "text"; readonly data: string }
  | { readonly kind: "binary"; readonly data: Buffer };

type InboundMessage = WebSocketMessage | { readonly kind: "close"; readonly code: number };

/** Request object handed to handlers for `websocket` scopes. */
export class WebSocketRequest extends BaseRequest<WebSocketScope> {
  readonly kind = "websocket";

  private connectSeen = false;

  get method(): string {
    return "GET";
  }

  /** Subprotocols the client offered, in preference order */
  get subprotocols(): readonly string[] {
    return this.scope.subprotocols ?? [];
  }

  /** Complete the handshake. Must come before any send or receive. */
  async accept(subprotocol?: string): Promise<void> {
    this.connection.assert("accept", "accept the websocket");
    if (!this.connectSeen) {
      await this.awaitConnect();
    }
    this.connection.transition("accept", "accept the websocket");
    await this.emit({ type: "websocket.accept", subprotocol });
  }

  /**
   * Wait for one message. A disconnect is raised as `PeerDisconnected`
   * carrying the close code.
   */
  async receive(): Promise<string | Buffer> {
    return (await this.receiveMessage()).data;
  }

  /** Like `receive()`, but tagged so text and binary frames can be told apart. */
  async receiveMessage(): Promise<WebSocketMessage> {
    const message = await this.nextMessage("receive");
    if (message.kind === "close") {
      throw new PeerDisconnected("Websocket disconnected", message.code);
    }
    return message;
  }

  /** Receive one message and parse it as JSON; works for text and binary frames. */
  async receiveJson(): Promise<unknown> {
    return decodeJson(await this.receive());
  }

  /**
   * Iterate over incoming messages. Ends when the peer closes normally and
   * throws `PeerDisconnected` on any other close code. Every call returns a
   * new iterator over the same connection.
   */
  async *receiveIter(): AsyncGenerator<string | Buffer> {
    while (true) {
      const message = await this.nextMessage("receive");
      if (message.kind === "close") {
        if (NORMAL_CLOSE_CODES.has(message.code)) return;
        throw new PeerDisconnected(`Websocket closed abnormally (code ${message.code})`, message.code);
      }
      yield message.data;
    }
  }

  /** Send text, bytes, or a plain object/array as JSON text. */
  async send(value: string | Uint8Array | Record<string, unknown> | unknown[]): Promise<void> {
    this.connection.require("send", ConnectionStateName.ACCEPTED);
    const body = classifyBody(value);
    switch (body.kind) {
      case "text":
        return this.emit({ type: "websocket.send", text: body.value });
      case "bytes":
        return this.emit({ type: "websocket.send", bytes: Buffer.from(body.value) });
      case "structured":
        return this.emit({ type: "websocket.send", text: encodeJson(body.value).toString("utf-8") });
      case "chunks":
        throw new EncodingError("Can only send text, bytes, or a plain object/array");
    }
  }

  /** Close the connection. Before `accept()` this rejects the handshake. */
  async close(code: number = CloseCodes.NORMAL, reason?: string): Promise<void> {
    this.connection.transition("close", "close the websocket");
    await this.emit({ type: "websocket.close", code, reason });
  }

  private async awaitConnect(): Promise<void> {
    const event = await this.receiveEvent();
    if (event.type === "websocket.connect") {
      this.connectSeen = true;
      return;
    }
    if (event.type === "websocket.disconnect") {
      this.markDisconnected();
      throw new PeerDisconnected("Websocket disconnected during the handshake", event.code);
    }
    throw new ProtocolStateError(`Unexpected ${event.type} event during the websocket handshake`, this.state);
  }

  private async nextMessage(operation: string): Promise<InboundMessage> {
    this.connection.require(operation, ConnectionStateName.ACCEPTED);
    const event = await this.receiveEvent();
    switch (event.type) {
      case "websocket.receive":
        if (event.bytes !== undefined) return { kind: "binary", data: event.bytes };
        return { kind: "text", data: event.text ?? "" };
      case "websocket.disconnect":
        this.markDisconnected();
        return { kind: "close", code: event.code };
      default:
        throw new ProtocolStateError(`Unexpected ${event.type} event on an open websocket`, this.state);
    }
  }
}

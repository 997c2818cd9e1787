// ---------------------------------------------------------------------------
// ProtocolAdapter: wraps one handler into the (scope, receive, send) shape
// ---------------------------------------------------------------------------

import { encodeBody, encodeChunk } from "./body-codec";
import { parseAppConfig, type AppConfig, type AppOptions } from "./config";
import { ConnectionStateName } from "./connection-state";
import { PeerDisconnected, toError } from "./errors";
import { FailurePolicy, type FailurePhase } from "./failure-policy";
import { LifespanHandler } from "./lifespan";
import { createLogger, type Logger } from "./logger";
import { CloseCodes } from "./protocol";
import type { App, Receive, Scope, Send } from "./protocol";
import { HttpRequest } from "./request/http-request";
import { WebSocketRequest } from "./request/websocket-request";
import { hasHeader, normalizeResponse, type ResponseHeaders } from "./response";

export type Request = HttpRequest | WebSocketRequest;

/**
 * Application logic for one request. HTTP handlers either return a response
 * (any shape `normalizeResponse` accepts) or drive `accept`/`send` themselves
 * and return nothing. WebSocket handlers always communicate through the
 * request and return nothing.
 */
export type Handler<R extends Request = Request> = (request: R) => Promise<unknown>;

/** A handler for plain HTTP, typically dispatched to from a combined handler */
export type HttpHandler = Handler<HttpRequest>;

export type WebSocketHandler = Handler<WebSocketRequest>;

/** A host-callable app that still exposes the handler it wraps */
export interface SlipwayApp extends App {
  readonly handler: Handler;
}

export class ProtocolAdapter {
  readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly policy: FailurePolicy;
  private readonly lifespan: LifespanHandler;

  constructor(
    private readonly handler: Handler,
    options: AppOptions = {},
  ) {
    this.config = parseAppConfig(options);
    this.logger =
      options.logger ?? createLogger({ prefix: this.config.logPrefix, level: this.config.logLevel });
    this.policy = new FailurePolicy(this.logger);
    this.lifespan = new LifespanHandler(this.logger, {
      onStartup: options.onStartup,
      onShutdown: options.onShutdown,
    });
  }

  /** Serve one connection. Never rejects. */
  async handle(scope: Scope, receive: Receive, send: Send): Promise<void> {
    const kind: string = scope.type;
    try {
      switch (scope.type) {
        case "http":
          await this.handleHttp(new HttpRequest(scope, receive, send, this.config.maxBodySize));
          break;
        case "websocket":
          await this.handleWebSocket(new WebSocketRequest(scope, receive, send));
          break;
        case "lifespan":
          await this.lifespan.run(receive, send);
          break;
        default:
          this.logger.warn(`Unknown scope type "${kind}"`);
      }
    } catch (err) {
      const error = toError(err);
      this.logger.error(`Unhandled ${error.name} while serving a ${kind} connection: ${error.message}`, error);
    }
  }

  private async handleHttp(request: HttpRequest): Promise<void> {
    let phase: FailurePhase = "request handler";
    try {
      const result = await this.handler(request);

      if (request.state === ConnectionStateName.INIT) {
        phase = "processing handler output";
        const [status, headers, body] = normalizeResponse(result);
        const encoded = encodeBody(body);

        if (encoded.kind === "bytes") {
          phase = "sending response";
          if (encoded.contentType !== undefined && !hasHeader(headers, "content-type")) {
            headers["content-type"] = encoded.contentType;
          }
          if (!hasHeader(headers, "content-length")) {
            headers["content-length"] = String(encoded.bytes.byteLength);
          }
          await request.accept(status, headers);
          await request.send(encoded.bytes, false);
        } else {
          phase = "sending chunked response";
          await this.streamBody(request, status, headers, encoded.chunks);
        }
      } else if (request.closedByPeer) {
        this.logger.debug("Client disconnected before a response was sent");
      } else if (result !== undefined && result !== null) {
        this.policy.onUsageError("Handlers that call request.accept() or request.send() should return nothing");
      }

      if (request.state === ConnectionStateName.ACCEPTED || request.state === ConnectionStateName.STREAMING) {
        phase = "finalizing response";
        await request.send(null);
      }
    } catch (err) {
      await this.recoverHttp(request, err, phase);
    }
  }

  /**
   * Pull one chunk, send it, then pull the next. Headers go out right before
   * the first chunk so a sequence that fails early still gets a clean 500.
   */
  private async streamBody(
    request: HttpRequest,
    status: number,
    headers: ResponseHeaders,
    chunks: AsyncIterable<unknown>,
  ): Promise<void> {
    for await (const chunk of chunks) {
      const bytes = encodeChunk(chunk);
      if (request.state === ConnectionStateName.INIT) {
        await request.accept(status, headers);
      }
      await request.send(bytes);
    }
    if (request.state === ConnectionStateName.INIT) {
      await request.accept(status, headers);
    }
  }

  private async recoverHttp(request: HttpRequest, error: unknown, phase: FailurePhase): Promise<void> {
    const outcome = this.policy.onHttpFailure(error, phase, request.state);
    try {
      switch (outcome.action) {
        case "respond":
          await request.accept(outcome.status, outcome.headers);
          await request.send(outcome.body, false);
          break;
        case "terminate":
          await request.send(null);
          break;
        case "close":
        case "ignore":
          break;
      }
    } catch (err) {
      this.logCleanupFailure(`Could not complete the ${outcome.action} step after a failure`, err);
    }
  }

  private async handleWebSocket(request: WebSocketRequest): Promise<void> {
    let closeCode: number | null = CloseCodes.NORMAL;
    try {
      const result = await this.handler(request);
      if (result !== undefined && result !== null) {
        this.policy.onUsageError(
          "A websocket handler should return nothing; use request.send() and request.receive() to communicate",
        );
      }
    } catch (err) {
      const outcome = this.policy.onWebSocketFailure(err, request.state);
      closeCode = outcome.action === "close" ? outcome.code : null;
    }

    if (closeCode === null || request.state === ConnectionStateName.CLOSED) return;
    try {
      await request.close(closeCode);
    } catch (err) {
      this.logCleanupFailure("Could not close the websocket", err);
    }
  }

  /** A peer that already left is expected here; anything else is logged as an error. */
  private logCleanupFailure(message: string, err: unknown): void {
    const error = toError(err);
    if (error instanceof PeerDisconnected) {
      this.logger.debug(`${message}: ${error.message}`);
    } else {
      this.logger.error(`${message}: ${error.message}`, error);
    }
  }
}

/** Wrap a handler into an app a host can call once per connection. */
export function toApp(handler: Handler, options?: AppOptions): SlipwayApp {
  if (typeof handler !== "function") {
    throw new TypeError("toApp() expects a handler function");
  }
  const adapter = new ProtocolAdapter(handler, options);
  const app = (scope: Scope, receive: Receive, send: Send): Promise<void> => adapter.handle(scope, receive, send);
  return Object.assign(app, { handler });
}

import * as http from "node:http";
import type { AddressInfo } from "node:net";
import type { Duplex } from "node:stream";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { createLogger, PeerDisconnected, toError } from "@slipway/core";
import type { App, Logger } from "@slipway/core";
import { HostConfigSchema, type HostConfig } from "./host-config";
import { HttpExchange } from "./http-exchange";
import { LifespanDriver } from "./lifespan-driver";
import { buildHttpScope, buildWebSocketScope } from "./scope";
import { WebSocketExchange, type Handshake, type WebSocketPeer } from "./websocket-exchange";

export interface SlipwayServerOptions extends Partial<HostConfig> {
  logger?: Logger;
}

/**
 * Serves an app over node:http, with websocket upgrades handled by `ws`.
 * Every request and every websocket runs as its own call of the app.
 */
export class SlipwayServer {
  readonly config: HostConfig;
  private readonly logger: Logger;
  private readonly lifespan: LifespanDriver;
  private httpServer: http.Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly chosenProtocols = new WeakMap<http.IncomingMessage, string>();

  constructor(
    private readonly app: App,
    options: SlipwayServerOptions = {},
  ) {
    this.config = HostConfigSchema.parse({
      port: options.port,
      host: options.host,
      maxPayload: options.maxPayload,
      messageHighWaterMark: options.messageHighWaterMark,
    });
    this.logger = options.logger ?? createLogger({ prefix: "Slipway" });
    this.lifespan = new LifespanDriver(app, this.logger);
  }

  /** Address the server listens on, once started */
  get address(): AddressInfo | null {
    const address = this.httpServer?.address();
    return address && typeof address !== "string" ? address : null;
  }

  async start(): Promise<void> {
    await this.lifespan.startup();

    this.wss = new WebSocketServer({
      noServer: true,
      maxPayload: this.config.maxPayload,
      handleProtocols: (_offered, request) => this.chosenProtocols.get(request) ?? false,
    });

    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
      void this.handleUpgrade(req, socket, head);
    });
    this.httpServer = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, this.config.host, () => {
        server.removeListener("error", reject);
        resolve();
      });
    });
    this.logger.info(`Listening on http://${this.config.host}:${this.address?.port ?? this.config.port}`);
  }

  async stop(): Promise<void> {
    if (this.wss) {
      for (const client of this.wss.clients) {
        client.close(1001, "Server shutting down");
      }
      this.wss.close();
      this.wss = null;
    }

    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeIdleConnections();
      });
    }

    await this.lifespan.shutdown();
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const target = `${req.method ?? "GET"} ${req.url ?? "/"}`;
    const exchange = new HttpExchange(req, res);
    try {
      await this.app(buildHttpScope(req), exchange.receive, exchange.send);
    } catch (err) {
      const error = toError(err);
      this.logger.error(`App failed on ${target}: ${error.message}`, error);
    }
    if (exchange.finish()) {
      this.logger.warn(`App returned without completing the response to ${target}`);
    }
  }

  private async handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const wss = this.wss;
    if (!wss || req.headers.upgrade?.toLowerCase() !== "websocket") {
      refuseUpgrade(socket, 400);
      return;
    }

    const target = req.url ?? "/";
    const exchange = new WebSocketExchange(
      new UpgradeHandshake(wss, this.chosenProtocols, req, socket, head),
      this.config.messageHighWaterMark,
    );
    try {
      await this.app(buildWebSocketScope(req), exchange.receive, exchange.send);
    } catch (err) {
      const error = toError(err);
      this.logger.error(`App failed on websocket ${target}: ${error.message}`, error);
    }
    if (exchange.finish()) {
      this.logger.warn(`App returned without closing the websocket ${target}`);
    }
  }
}

/** Completes or refuses one upgrade request through the shared `WebSocketServer`. */
class UpgradeHandshake implements Handshake {
  private upgraded = false;

  constructor(
    private readonly wss: WebSocketServer,
    private readonly chosenProtocols: WeakMap<http.IncomingMessage, string>,
    private readonly req: http.IncomingMessage,
    private readonly socket: Duplex,
    private readonly head: Buffer,
  ) {}

  accept(subprotocol: string | undefined): Promise<WebSocketPeer> {
    if (this.socket.destroyed) {
      return Promise.reject(new PeerDisconnected("Client disconnected during the handshake"));
    }
    if (subprotocol !== undefined) this.chosenProtocols.set(this.req, subprotocol);
    return new Promise((resolve) => {
      this.wss.handleUpgrade(this.req, this.socket, this.head, (ws) => {
        this.upgraded = true;
        resolve(new WsPeer(ws));
      });
    });
  }

  reject(status: number): void {
    refuseUpgrade(this.socket, status);
  }

  onAbort(listener: () => void): void {
    this.socket.once("close", () => {
      // after the upgrade the peer reports the close
      if (!this.upgraded) listener();
    });
  }
}

class WsPeer implements WebSocketPeer {
  constructor(private readonly ws: WebSocket) {}

  send(data: string | Buffer): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new PeerDisconnected("Websocket closed"));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(data, (err) => (err ? reject(new PeerDisconnected(err.message)) : resolve()));
    });
  }

  close(code: number, reason?: string): void {
    this.ws.close(code, reason);
  }

  onMessage(listener: (data: string | Buffer) => void): void {
    this.ws.on("message", (data: RawData, isBinary: boolean) => {
      const bytes = rawToBuffer(data);
      listener(isBinary ? bytes : bytes.toString("utf-8"));
    });
  }

  onClose(listener: (code: number) => void): void {
    this.ws.once("close", (code: number) => listener(code));
  }

  pause(): void {
    this.ws.pause();
  }

  resume(): void {
    this.ws.resume();
  }
}

function rawToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function refuseUpgrade(socket: Duplex, status: number): void {
  if (!socket.destroyed) {
    socket.end(`HTTP/1.1 ${status} ${http.STATUS_CODES[status] ?? ""}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  }
}

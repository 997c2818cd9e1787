import { EventEmitter } from "node:events";
import type { Logger } from "@slipway/core";
import type { ResponseSink } from "../http-exchange";
import type { Handshake, WebSocketPeer } from "../websocket-exchange";

export function createMockLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  } satisfies Logger;
}

/** Stands in for `http.ServerResponse`; `end()` emits "close" like the real one. */
export class FakeSink extends EventEmitter implements ResponseSink {
  writableEnded = false;
  status: number | null = null;
  headers: string[] = [];
  readonly chunks: Buffer[] = [];
  /** Return values for upcoming `write` calls; `true` once exhausted */
  readonly writeResults: boolean[] = [];

  writeHead(statusCode: number, headers: string[]): this {
    this.status = statusCode;
    this.headers = headers;
    return this;
  }

  write(chunk: Buffer): boolean {
    this.chunks.push(chunk);
    return this.writeResults.shift() ?? true;
  }

  end(): this {
    this.writableEnded = true;
    this.emit("close");
    return this;
  }

  get text(): string {
    return Buffer.concat(this.chunks).toString("utf-8");
  }
}

/**
 * Stands in for an upgraded `ws` socket. Messages and a close delivered
 * before the exchange subscribed are held back until it does.
 */
export class FakePeer implements WebSocketPeer {
  readonly sent: Array<string | Buffer> = [];
  closedWith: { code: number; reason?: string } | null = null;
  paused = false;
  /** Every pause/resume call, in order */
  readonly flow: Array<"pause" | "resume"> = [];
  private messageListener: ((data: string | Buffer) => void) | null = null;
  private closeListener: ((code: number) => void) | null = null;
  private readonly heldMessages: Array<string | Buffer> = [];
  private heldClose: number | null = null;

  async send(data: string | Buffer): Promise<void> {
    this.sent.push(data);
  }

  close(code: number, reason?: string): void {
    this.closedWith = { code, reason };
  }

  onMessage(listener: (data: string | Buffer) => void): void {
    this.messageListener = listener;
    for (const data of this.heldMessages.splice(0)) listener(data);
  }

  onClose(listener: (code: number) => void): void {
    this.closeListener = listener;
    if (this.heldClose !== null) listener(this.heldClose);
  }

  pause(): void {
    this.paused = true;
    this.flow.push("pause");
  }

  resume(): void {
    this.paused = false;
    this.flow.push("resume");
  }

  deliver(data: string | Buffer): void {
    if (this.messageListener) {
      this.messageListener(data);
    } else {
      this.heldMessages.push(data);
    }
  }

  drop(code: number): void {
    if (this.closeListener) {
      this.closeListener(code);
    } else {
      this.heldClose = code;
    }
  }
}

export class FakeHandshake implements Handshake {
  readonly accepted: Array<string | undefined> = [];
  readonly rejected: number[] = [];
  private abortListener: (() => void) | null = null;

  constructor(readonly peer: FakePeer = new FakePeer()) {}

  async accept(subprotocol: string | undefined): Promise<WebSocketPeer> {
    this.accepted.push(subprotocol);
    return this.peer;
  }

  reject(status: number): void {
    this.rejected.push(status);
  }

  onAbort(listener: () => void): void {
    this.abortListener = listener;
  }

  abort(): void {
    this.abortListener?.();
  }
}

/** Resolves after pending promise callbacks ran */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

import { PeerDisconnected } from "@slipway/core";
import type { InboundEvent, OutboundEvent, Receive, Send } from "@slipway/core";
import { EventQueue } from "./event-queue";
import { DEFAULT_MESSAGE_HIGH_WATER_MARK } from "./host-config";

/** Close code reported when the connection dropped without a close frame */
export const ABNORMAL_CLOSURE = 1006;

/** An open websocket, as seen by the exchange */
export interface WebSocketPeer {
  send(data: string | Buffer): Promise<void>;
  close(code: number, reason?: string): void;
  onMessage(listener: (data: string | Buffer) => void): void;
  onClose(listener: (code: number) => void): void;
  /** Stop reading frames from the socket */
  pause(): void;
  resume(): void;
}

/** A pending upgrade request that can still be completed or refused */
export interface Handshake {
  accept(subprotocol: string | undefined): Promise<WebSocketPeer>;
  reject(status: number): void;
  /** Called if the client drops the connection before the upgrade completes */
  onAbort(listener: () => void): void;
}

type Phase = "pending" | "open" | "closed";

/**
 * Maps one websocket upgrade onto the host protocol: `websocket.connect`
 * first, then one `websocket.receive` per message, then a single
 * `websocket.disconnect` that repeats on every later `receive`.
 *
 * When `highWaterMark` messages are waiting unread the peer is paused; it
 * resumes once the app has read the backlog down to half of that.
 */
export class WebSocketExchange {
  private readonly inbound = new EventQueue<InboundEvent>();
  private peer: WebSocketPeer | null = null;
  private phase: Phase = "pending";
  private paused = false;

  constructor(
    private readonly handshake: Handshake,
    private readonly highWaterMark: number = DEFAULT_MESSAGE_HIGH_WATER_MARK,
  ) {
    this.inbound.push({ type: "websocket.connect" });
    handshake.onAbort(() => this.disconnected(ABNORMAL_CLOSURE));
  }

  get isOpen(): boolean {
    return this.phase === "open";
  }

  get isClosed(): boolean {
    return this.phase === "closed";
  }

  get isPaused(): boolean {
    return this.paused;
  }

  readonly receive: Receive = (): Promise<InboundEvent> => {
    const next = this.inbound.next();
    if (this.paused && this.peer && this.inbound.size <= this.highWaterMark / 2) {
      this.paused = false;
      this.peer.resume();
    }
    return next;
  };

  readonly send: Send = async (event: OutboundEvent): Promise<void> => {
    switch (event.type) {
      case "websocket.accept":
        return this.accept(event.subprotocol);
      case "websocket.send": {
        const peer = this.openPeer();
        await peer.send(event.bytes ?? event.text ?? "");
        return;
      }
      case "websocket.close":
        this.close(event.code, event.reason);
        return;
      default:
        throw new Error(`Cannot send a ${event.type} event on a websocket connection`);
    }
  };

  /**
   * Close whatever the app left open: a pending upgrade is refused with 500,
   * an open socket is closed normally. Returns false when already closed.
   */
  finish(): boolean {
    if (this.phase === "closed") return false;
    if (this.peer) {
      this.close(1000);
    } else {
      this.phase = "closed";
      this.handshake.reject(500);
      this.inbound.end({ type: "websocket.disconnect", code: ABNORMAL_CLOSURE });
    }
    return true;
  }

  private async accept(subprotocol: string | undefined): Promise<void> {
    if (this.phase === "closed") throw new PeerDisconnected("Client disconnected during the handshake");
    if (this.peer) throw new Error("The websocket was already accepted");

    const peer = await this.handshake.accept(subprotocol);
    this.peer = peer;
    this.phase = "open";
    peer.onMessage((data) => {
      this.inbound.push(
        typeof data === "string"
          ? { type: "websocket.receive", text: data }
          : { type: "websocket.receive", bytes: data },
      );
      if (!this.paused && this.inbound.size >= this.highWaterMark) {
        this.paused = true;
        peer.pause();
      }
    });
    peer.onClose((code) => this.disconnected(code));
  }

  private close(code: number, reason?: string): void {
    if (this.phase === "closed") throw new PeerDisconnected("Websocket already closed");
    this.phase = "closed";
    if (this.peer) {
      this.peer.close(code, reason);
    } else {
      // before accept, closing refuses the upgrade
      this.handshake.reject(403);
      this.inbound.end({ type: "websocket.disconnect", code });
    }
  }

  private openPeer(): WebSocketPeer {
    if (this.phase === "closed") throw new PeerDisconnected("Websocket closed");
    if (!this.peer) throw new Error("Cannot send on a websocket before it is accepted");
    return this.peer;
  }

  private disconnected(code: number): void {
    this.phase = "closed";
    this.inbound.end({ type: "websocket.disconnect", code });
  }
}

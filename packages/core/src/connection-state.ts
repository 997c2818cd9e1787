// ---------------------------------------------------------------------------
// Connection state machine: INIT → ACCEPTED → STREAMING → CLOSED
// ---------------------------------------------------------------------------

import { PeerDisconnected, ProtocolStateError } from "./errors";

export const ConnectionStateName = {
  INIT: "INIT",
  ACCEPTED: "ACCEPTED",
  STREAMING: "STREAMING",
  CLOSED: "CLOSED",
} as const;

export type ConnectionStateName = (typeof ConnectionStateName)[keyof typeof ConnectionStateName];

export type ConnectionTransition = "accept" | "stream" | "close" | "disconnect";

/** Who ended the connection, once it is closed */
export type ClosedBy = "app" | "peer";

const TRANSITIONS: Record<ConnectionTransition, Partial<Record<ConnectionStateName, ConnectionStateName>>> = {
  accept: { INIT: "ACCEPTED" },
  stream: { ACCEPTED: "STREAMING", STREAMING: "STREAMING" },
  close: { INIT: "CLOSED", ACCEPTED: "CLOSED", STREAMING: "CLOSED" },
  disconnect: { INIT: "CLOSED", ACCEPTED: "CLOSED", STREAMING: "CLOSED", CLOSED: "CLOSED" },
};

/**
 * Per-connection state value. Owned by one request and moved only through
 * `transition`; invalid moves throw and leave the state unchanged.
 */
export class ConnectionState {
  private current: ConnectionStateName = ConnectionStateName.INIT;
  private closer: ClosedBy | null = null;

  get name(): ConnectionStateName {
    return this.current;
  }

  /** Set once the connection is CLOSED */
  get closedBy(): ClosedBy | null {
    return this.closer;
  }

  is(...names: ConnectionStateName[]): boolean {
    return names.includes(this.current);
  }

  /** Throws unless the transition is allowed from the current state; does not move. */
  assert(transition: ConnectionTransition, operation: string): void {
    if (TRANSITIONS[transition][this.current] === undefined) this.reject(operation);
  }

  /** Throws unless the connection is in one of `allowed`. */
  require(operation: string, ...allowed: ConnectionStateName[]): void {
    if (!allowed.includes(this.current)) this.reject(operation);
  }

  private reject(operation: string): never {
    if (this.current === ConnectionStateName.CLOSED && this.closer === "peer") {
      throw new PeerDisconnected(`Cannot ${operation}: the peer disconnected`);
    }
    throw new ProtocolStateError(`Cannot ${operation} in state ${this.current}`, this.current);
  }

  transition(transition: ConnectionTransition, operation: string = transition): ConnectionStateName {
    this.assert(transition, operation);
    const next = TRANSITIONS[transition][this.current] ?? this.current;
    if (next === ConnectionStateName.CLOSED && this.closer === null) {
      this.closer = transition === "disconnect" ? "peer" : "app";
    }
    this.current = next;
    return next;
  }
}

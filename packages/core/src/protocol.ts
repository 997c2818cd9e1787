// ---------------------------------------------------------------------------
// Host protocol: connection scopes and the events exchanged with the host
// ---------------------------------------------------------------------------

/** `[host, port]` address pair as reported by the host */
export type Address = readonly [host: string, port: number];

/** Header list in wire order; names are lower-case as delivered by the host */
export type HeaderList = ReadonlyArray<readonly [name: string, value: string]>;

interface ConnectionScopeBase {
  readonly scheme: string;
  /** Percent-decoded path, without the root path */
  readonly path: string;
  readonly rootPath?: string;
  /** Raw query string without the leading `?`, not percent-decoded */
  readonly queryString: string;
  readonly headers: HeaderList;
  readonly client?: Address;
  readonly server?: Address;
}

export interface HttpScope extends ConnectionScopeBase {
  readonly type: "http";
  readonly method: string;
  readonly httpVersion?: string;
}

export interface WebSocketScope extends ConnectionScopeBase {
  readonly type: "websocket";
  readonly subprotocols?: readonly string[];
}

export interface LifespanScope {
  readonly type: "lifespan";
}

export type ConnectionScope = HttpScope | WebSocketScope;
export type Scope = ConnectionScope | LifespanScope;

// ---- Inbound (host → app) -------------------------------------------------

export type HttpInboundEvent =
  | { readonly type: "http.request"; readonly body: Buffer; readonly moreBody: boolean }
  | { readonly type: "http.disconnect" };

export type WebSocketInboundEvent =
  | { readonly type: "websocket.connect" }
  | { readonly type: "websocket.receive"; readonly text?: string; readonly bytes?: Buffer }
  | { readonly type: "websocket.disconnect"; readonly code: number };

export type LifespanInboundEvent =
  | { readonly type: "lifespan.startup" }
  | { readonly type: "lifespan.shutdown" };

export type InboundEvent = HttpInboundEvent | WebSocketInboundEvent | LifespanInboundEvent;

// ---- Outbound (app → host) ------------------------------------------------

export type HttpOutboundEvent =
  | {
      readonly type: "http.response.start";
      readonly status: number;
      readonly headers: Array<[string, string]>;
    }
  | { readonly type: "http.response.body"; readonly body: Buffer; readonly moreBody: boolean };

export type WebSocketOutboundEvent =
  | { readonly type: "websocket.accept"; readonly subprotocol?: string }
  | { readonly type: "websocket.send"; readonly text?: string; readonly bytes?: Buffer }
  | { readonly type: "websocket.close"; readonly code: number; readonly reason?: string };

export type LifespanOutboundEvent =
  | { readonly type: "lifespan.startup.complete" }
  | { readonly type: "lifespan.startup.failed"; readonly message: string }
  | { readonly type: "lifespan.shutdown.complete" }
  | { readonly type: "lifespan.shutdown.failed"; readonly message: string };

export type OutboundEvent = HttpOutboundEvent | WebSocketOutboundEvent | LifespanOutboundEvent;

/** Suspends until the host delivers the next inbound event */
export type Receive = () => Promise<InboundEvent>;

/** Hands one outbound event to the host; resolves once the host took it */
export type Send = (event: OutboundEvent) => Promise<void>;

/** The shape a host calls once per connection */
export type App = (scope: Scope, receive: Receive, send: Send) => Promise<void>;

/** WebSocket close codes that end a connection without signalling a failure */
export const NORMAL_CLOSE_CODES: ReadonlySet<number> = new Set([1000, 1001, 1005]);

export const CloseCodes = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INTERNAL_ERROR: 1011,
} as const;

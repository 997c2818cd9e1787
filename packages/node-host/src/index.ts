// ---------------------------------------------------------------------------
// @slipway/node-host: Public API
// ---------------------------------------------------------------------------

export { SlipwayServer } from "./server";
export type { SlipwayServerOptions } from "./server";
export { serve } from "./serve";
export type { ServeOptions } from "./serve";

export { HttpExchange } from "./http-exchange";
export type { ResponseSink } from "./http-exchange";
export { WebSocketExchange, ABNORMAL_CLOSURE } from "./websocket-exchange";
export type { Handshake, WebSocketPeer } from "./websocket-exchange";
export { LifespanDriver } from "./lifespan-driver";
export { EventQueue } from "./event-queue";

export { buildHttpScope, buildWebSocketScope, splitTarget } from "./scope";
export type { RequestHead } from "./scope";

export {
  HostConfigSchema,
  loadHostConfig,
  HOST_CONFIG_ENV,
  DEFAULT_MAX_PAYLOAD,
  DEFAULT_MESSAGE_HIGH_WATER_MARK,
} from "./host-config";
export type { HostConfig } from "./host-config";

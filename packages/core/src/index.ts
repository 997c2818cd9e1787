// ---------------------------------------------------------------------------
// @slipway/core: Public API
// ---------------------------------------------------------------------------

// Adapter
export { toApp, ProtocolAdapter } from "./app";
export type { Handler, HttpHandler, Request, SlipwayApp, WebSocketHandler } from "./app";

// Requests
export { BaseRequest, HttpRequest, WebSocketRequest } from "./request";
export type { WebSocketMessage } from "./request";

// Response shapes and body codec
export { normalizeResponse, checkStatus, findHeader, hasHeader, withoutHeaders } from "./response";
export type { HandlerResponse, ResponseHeaders, ResponseTriple } from "./response";
export {
  classifyBody,
  collectBody,
  decodeJson,
  encodeBody,
  encodeChunk,
  encodeJson,
  guessContentType,
  isAsyncIterable,
} from "./body-codec";
export type { BodyValue, Chunk, ChunkSequence, ClassifiedBody, EncodedBody, Structured } from "./body-codec";

// Connection state & failures
export { ConnectionState, ConnectionStateName } from "./connection-state";
export type { ClosedBy, ConnectionTransition } from "./connection-state";
export { FailurePolicy } from "./failure-policy";
export type { FailureOutcome, FailurePhase } from "./failure-policy";
export { LifespanHandler } from "./lifespan";
export type { LifespanHooks } from "./lifespan";

// Errors
export {
  SlipwayError,
  SlipwayErrorCode,
  ProtocolStateError,
  InvalidResponseShape,
  EncodingError,
  PayloadTooLarge,
  MalformedJSON,
  PeerDisconnected,
  HttpError,
  toError,
} from "./errors";

// Logging & configuration
export { createLogger, silentLogger } from "./logger";
export type { Logger, LoggerOptions, LogLevel } from "./logger";
export { AppConfigSchema, LogLevelSchema, DEFAULT_MAX_BODY_SIZE, parseAppConfig } from "./config";
export type { AppConfig, AppOptions } from "./config";

// Host protocol
export { CloseCodes, NORMAL_CLOSE_CODES } from "./protocol";
export type {
  Address,
  App,
  ConnectionScope,
  HeaderList,
  HttpInboundEvent,
  HttpOutboundEvent,
  HttpScope,
  InboundEvent,
  LifespanInboundEvent,
  LifespanOutboundEvent,
  LifespanScope,
  OutboundEvent,
  Receive,
  Scope,
  Send,
  WebSocketInboundEvent,
  WebSocketOutboundEvent,
  WebSocketScope,
} from "./protocol";

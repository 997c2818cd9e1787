// ---------------------------------------------------------------------------
// Slipway errors
// ---------------------------------------------------------------------------

import type { ConnectionStateName } from "./connection-state";

export const SlipwayErrorCode = {
  PROTOCOL_STATE: "PROTOCOL_STATE",
  INVALID_RESPONSE_SHAPE: "INVALID_RESPONSE_SHAPE",
  ENCODING: "ENCODING",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  MALFORMED_JSON: "MALFORMED_JSON",
  PEER_DISCONNECTED: "PEER_DISCONNECTED",
  HTTP_ERROR: "HTTP_ERROR",
} as const;

export type SlipwayErrorCode = (typeof SlipwayErrorCode)[keyof typeof SlipwayErrorCode];

/** Base class for every error raised by Slipway itself. */
export class SlipwayError extends Error {
  readonly code: SlipwayErrorCode;

  constructor(message: string, code: SlipwayErrorCode) {
    super(message);
    this.name = "SlipwayError";
    this.code = code;
  }
}

/** An operation was invalid for the connection's current state. */
export class ProtocolStateError extends SlipwayError {
  readonly state: ConnectionStateName | undefined;

  constructor(message: string, state?: ConnectionStateName) {
    super(message, SlipwayErrorCode.PROTOCOL_STATE);
    this.name = "ProtocolStateError";
    this.state = state;
  }
}

/** A handler returned something that matches none of the response shapes. */
export class InvalidResponseShape extends SlipwayError {
  constructor(message: string) {
    super(message, SlipwayErrorCode.INVALID_RESPONSE_SHAPE);
    this.name = "InvalidResponseShape";
  }
}

/** A body value could not be turned into bytes. */
export class EncodingError extends SlipwayError {
  constructor(message: string) {
    super(message, SlipwayErrorCode.ENCODING);
    this.name = "EncodingError";
  }
}

export class PayloadTooLarge extends SlipwayError {
  readonly status = 413;
  readonly limit: number;

  constructor(limit: number) {
    super(`Request body too large (limit is ${limit} bytes)`, SlipwayErrorCode.PAYLOAD_TOO_LARGE);
    this.name = "PayloadTooLarge";
    this.limit = limit;
  }
}

export class MalformedJSON extends SlipwayError {
  readonly status = 400;

  constructor(message: string) {
    super(message, SlipwayErrorCode.MALFORMED_JSON);
    this.name = "MalformedJSON";
  }
}

/**
 * The peer went away mid-operation. Not a failure: the adapter ends the
 * connection quietly when a handler lets this propagate.
 */
export class PeerDisconnected extends SlipwayError {
  /** WebSocket close code; 1000 for HTTP disconnects. */
  readonly closeCode: number;

  constructor(message = "Peer disconnected", closeCode = 1000) {
    super(message, SlipwayErrorCode.PEER_DISCONNECTED);
    this.name = "PeerDisconnected";
    this.closeCode = closeCode;
  }
}

/**
 * A deliberate rejection. Thrown before the response is accepted, it is
 * turned into a response with this status and the message as body.
 */
export class HttpError extends SlipwayError {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;

  constructor(status: number, message: string, headers: Record<string, string> = {}) {
    super(message, SlipwayErrorCode.HTTP_ERROR);
    this.name = "HttpError";
    this.status = status;
    this.headers = headers;
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ---------------------------------------------------------------------------
// FailurePolicy: decides what a caught failure turns into, and logs it once
// ---------------------------------------------------------------------------

import { ConnectionStateName } from "./connection-state";
import {
  EncodingError,
  HttpError,
  InvalidResponseShape,
  MalformedJSON,
  PayloadTooLarge,
  PeerDisconnected,
  toError,
} from "./errors";
import type { Logger } from "./logger";
import { CloseCodes } from "./protocol";
import { isValidStatus, withoutHeaders, type ResponseHeaders } from "./response";

export type FailurePhase =
  | "request handler"
  | "processing handler output"
  | "sending response"
  | "sending chunked response"
  | "finalizing response"
  | "websocket handler";

export type FailureOutcome =
  /** Nothing was sent yet: answer with this response */
  | { readonly action: "respond"; readonly status: number; readonly headers: ResponseHeaders; readonly body: string }
  /** Headers are on the wire: end the body if it is still open */
  | { readonly action: "terminate" }
  /** Close the websocket with this code */
  | { readonly action: "close"; readonly code: number }
  /** Nothing left to do */
  | { readonly action: "ignore" };

const PLAIN_TEXT = "text/plain";

export class FailurePolicy {
  constructor(private readonly logger: Logger) {}

  /**
   * Map a failure of an HTTP exchange. Before accept a response can still
   * be synthesized; after it the partial response stands.
   */
  onHttpFailure(error: unknown, phase: FailurePhase, state: ConnectionStateName): FailureOutcome {
    const err = toError(error);

    if (err instanceof PeerDisconnected) {
      this.logger.debug(`Client disconnected during ${phase}`);
      return { action: "ignore" };
    }

    const text = `${err.name} in ${phase}: ${err.message}`;

    if (state !== ConnectionStateName.INIT) {
      this.logger.error(text, err);
      return state === ConnectionStateName.CLOSED ? { action: "ignore" } : { action: "terminate" };
    }

    if (err instanceof HttpError) {
      if (!isValidStatus(err.status)) {
        this.logger.warn(`HttpError carries an invalid status ${err.status}, responding with 500: ${err.message}`);
        return respond(500, text);
      }
      this.logger.info(`Handler rejected the request with ${err.status}: ${err.message}`);
      return respond(err.status, err.message, err.headers);
    }

    if (err instanceof PayloadTooLarge || err instanceof MalformedJSON) {
      this.logger.info(`Rejected the request body with ${err.status}: ${err.message}`);
      return respond(err.status, err.message);
    }

    if (err instanceof InvalidResponseShape || err instanceof EncodingError) {
      this.logger.warn(text);
      return respond(500, text);
    }

    this.logger.error(text, err);
    return respond(500, text);
  }

  /** Map a failure of a websocket handler. Disconnects are not failures. */
  onWebSocketFailure(error: unknown, state: ConnectionStateName): FailureOutcome {
    const err = toError(error);

    if (err instanceof PeerDisconnected) {
      this.logger.debug(`Websocket peer disconnected (code ${err.closeCode})`);
      return { action: "ignore" };
    }

    this.logger.error(`${err.name} in websocket handler: ${err.message}`, err);
    return state === ConnectionStateName.CLOSED
      ? { action: "ignore" }
      : { action: "close", code: CloseCodes.INTERNAL_ERROR };
  }

  /** A handler broke the calling convention without failing outright. */
  onUsageError(message: string): void {
    this.logger.warn(message);
  }
}

function respond(status: number, body: string, headers: Readonly<ResponseHeaders> = {}): FailureOutcome {
  return {
    action: "respond",
    status,
    headers: {
      ...withoutHeaders(headers, "content-type", "content-length"),
      "content-type": PLAIN_TEXT,
      "content-length": String(Buffer.byteLength(body, "utf-8")),
    },
    body,
  };
}

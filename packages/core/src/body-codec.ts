// ---------------------------------------------------------------------------
// Body codec: handler body values to wire bytes, and inbound bytes back
// ---------------------------------------------------------------------------

import { EncodingError, MalformedJSON, PayloadTooLarge, toError } from "./errors";

export type Chunk = string | Uint8Array;
export type ChunkSequence = AsyncIterable<Chunk>;
export type Structured = { [key: string]: unknown } | unknown[];

/** Anything a handler may return as a body */
export type BodyValue = Uint8Array | string | Structured | ChunkSequence;

/** A body value sorted into exactly one of the supported kinds */
export type ClassifiedBody =
  | { readonly kind: "bytes"; readonly value: Uint8Array }
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "structured"; readonly value: Structured }
  | { readonly kind: "chunks"; readonly value: AsyncIterable<unknown> };

export type EncodedBody =
  | { readonly kind: "bytes"; readonly bytes: Buffer; readonly contentType: string | undefined }
  | { readonly kind: "stream"; readonly chunks: AsyncIterable<unknown> };

const HTML_PREFIXES = ["<!DOCTYPE html>", "<html>"];

export function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === "function"
  );
}

export function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  return value.constructor?.name ?? "object";
}

export function classifyBody(value: unknown): ClassifiedBody {
  if (value instanceof Uint8Array) return { kind: "bytes", value };
  if (typeof value === "string") return { kind: "text", value };
  if (Array.isArray(value) || isPlainObject(value)) return { kind: "structured", value };
  if (isAsyncIterable(value)) return { kind: "chunks", value };

  if (typeof value === "object" && value !== null) {
    if ("then" in value && typeof value.then === "function") {
      throw new EncodingError("Body cannot be a promise, forgot await?");
    }
    if (Symbol.iterator in value && "next" in value) {
      throw new EncodingError("Body cannot be a synchronous iterator, use an async generator.");
    }
  }
  throw new EncodingError(`Body cannot be ${describe(value)}.`);
}

/** Default content-type for a body, or undefined when none is inferred. */
export function guessContentType(body: unknown): string | undefined {
  if (typeof body === "string") {
    return HTML_PREFIXES.some((prefix) => body.startsWith(prefix)) ? "text/html" : "text/plain";
  }
  if (Array.isArray(body) || isPlainObject(body)) return "application/json";
  return undefined;
}

export function encodeJson(value: unknown): Buffer {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (err) {
    throw new EncodingError(`Could not JSON encode body: ${toError(err).message}`);
  }
  if (typeof text !== "string") {
    throw new EncodingError(`Could not JSON encode body: ${describe(value)} has no JSON form`);
  }
  return Buffer.from(text, "utf-8");
}

export function encodeBody(value: unknown): EncodedBody {
  const body = classifyBody(value);
  switch (body.kind) {
    case "bytes":
      return { kind: "bytes", bytes: toBuffer(body.value), contentType: undefined };
    case "text":
      return { kind: "bytes", bytes: Buffer.from(body.value, "utf-8"), contentType: guessContentType(body.value) };
    case "structured":
      return { kind: "bytes", bytes: encodeJson(body.value), contentType: "application/json" };
    case "chunks":
      return { kind: "stream", chunks: body.value };
    default: {
      const unreachable: never = body;
      throw new EncodingError(`Unhandled body kind: ${String(unreachable)}`);
    }
  }
}

/** Encode one chunk of a streamed body. */
export function encodeChunk(chunk: unknown): Buffer {
  if (typeof chunk === "string") return Buffer.from(chunk, "utf-8");
  if (chunk instanceof Uint8Array) return toBuffer(chunk);
  throw new EncodingError(`Response chunks must be string or bytes, not ${describe(chunk)}.`);
}

export function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// ---- Decode direction -----------------------------------------------------

/**
 * Concatenate inbound chunks until the sequence ends. Fails as soon as the
 * running total exceeds `limit`; exactly `limit` bytes is accepted.
 */
export async function collectBody(chunks: AsyncIterable<Uint8Array>, limit: number): Promise<Buffer> {
  const parts: Buffer[] = [];
  let total = 0;
  for await (const chunk of chunks) {
    total += chunk.byteLength;
    if (total > limit) {
      parts.length = 0;
      throw new PayloadTooLarge(limit);
    }
    parts.push(toBuffer(chunk));
  }
  return Buffer.concat(parts, total);
}

export function decodeJson(bytes: Uint8Array | string): unknown {
  const text = typeof bytes === "string" ? bytes : toBuffer(bytes).toString("utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new MalformedJSON(`Malformed JSON: ${toError(err).message}`);
  }
}

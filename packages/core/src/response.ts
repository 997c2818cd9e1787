// ---------------------------------------------------------------------------
// Response normalizer: any accepted handler return shape → [status, headers, body]
// ---------------------------------------------------------------------------

import { isPlainObject } from "./body-codec";
import { InvalidResponseShape } from "./errors";

export type ResponseHeaders = Record<string, string>;

/** Canonical response: status, headers, body */
export type ResponseTriple<B = unknown> = [status: number, headers: ResponseHeaders, body: B];

/** Every shape a handler may return */
export type HandlerResponse<B = unknown> =
  | B
  | [body: B]
  | [status: number, body: B]
  | [headers: ResponseHeaders, body: B]
  | ResponseTriple<B>;

type Slot = "status" | "headers" | "any";

interface Shape {
  readonly pattern: readonly Slot[];
  readonly status: boolean;
  readonly headers: boolean;
}

/** Tried in order; the first pattern matching (arity, kind at each position) wins. */
const SHAPES: readonly Shape[] = [
  { pattern: ["status", "headers", "any"], status: true, headers: true },
  { pattern: ["status", "any"], status: true, headers: false },
  { pattern: ["headers", "any"], status: false, headers: true },
];

function fits(slot: Slot, value: unknown): boolean {
  switch (slot) {
    case "status":
      return typeof value === "number";
    case "headers":
      return isPlainObject(value);
    case "any":
      return true;
  }
}

function matchShape(tuple: readonly unknown[]): Shape | undefined {
  return SHAPES.find(
    (shape) =>
      shape.pattern.length === tuple.length && shape.pattern.every((slot, i) => fits(slot, tuple[i])),
  );
}

export function isValidStatus(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 100 && value <= 999;
}

/** Returns the status unchanged, or throws `InvalidResponseShape`. */
export function checkStatus(value: unknown): number {
  if (!isValidStatus(value)) {
    throw new InvalidResponseShape(`Status code must be an integer between 100 and 999, not ${String(value)}`);
  }
  return value;
}

function checkHeaders(value: unknown): ResponseHeaders {
  if (!isPlainObject(value)) {
    throw new InvalidResponseShape("Headers must be a plain object");
  }
  const headers: ResponseHeaders = {};
  for (const [name, headerValue] of Object.entries(value)) {
    if (typeof headerValue !== "string") {
      throw new InvalidResponseShape(`Header "${name}" must be a string, not ${typeof headerValue}`);
    }
    headers[name] = headerValue;
  }
  return headers;
}

/**
 * Normalize a handler's return value into `[status, headers, body]`.
 * Status defaults to 200 and headers to `{}`. The body is returned as is,
 * so normalizing an already normalized triple yields an equal triple.
 * Top-level arrays are always read as tuples.
 */
export function normalizeResponse(value: unknown): ResponseTriple {
  if (!Array.isArray(value)) {
    return [200, {}, value];
  }
  if (value.length === 1) {
    return [200, {}, value[0]];
  }
  if (value.length < 1 || value.length > 3) {
    throw new InvalidResponseShape(`Handler returned a ${value.length}-tuple`);
  }

  const shape = matchShape(value);
  if (!shape) {
    const kinds = value.map((item) => (Array.isArray(item) ? "array" : typeof item)).join(", ");
    throw new InvalidResponseShape(`Handler returned an unrecognized response tuple (${kinds})`);
  }

  let index = 0;
  const status = shape.status ? checkStatus(value[index++]) : 200;
  const headers = shape.headers ? checkHeaders(value[index++]) : {};
  return [status, headers, value[index]];
}

/** Case-insensitive header lookup. */
export function findHeader(headers: ResponseHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export function hasHeader(headers: ResponseHeaders, name: string): boolean {
  return findHeader(headers, name) !== undefined;
}

/** Copy of `headers` without the given names, compared case-insensitively. */
export function withoutHeaders(headers: Readonly<ResponseHeaders>, ...names: string[]): ResponseHeaders {
  const dropped = new Set(names.map((name) => name.toLowerCase()));
  const kept: ResponseHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (!dropped.has(key.toLowerCase())) kept[key] = value;
  }
  return kept;
}

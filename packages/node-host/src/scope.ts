import type { HeaderList, HttpScope, WebSocketScope, Address } from "@slipway/core";

/** The parts of an incoming request a scope is built from; `http.IncomingMessage` fits. */
export interface RequestHead {
  readonly method?: string;
  readonly url?: string;
  readonly httpVersion?: string;
  /** Flat `[name, value, name, value, ...]` list in wire order */
  readonly rawHeaders: readonly string[];
  readonly socket: {
    readonly remoteAddress?: string;
    readonly remotePort?: number;
    readonly localAddress?: string;
    readonly localPort?: number;
    readonly encrypted?: boolean;
  };
}

export function buildHttpScope(head: RequestHead): HttpScope {
  const { path, queryString } = splitTarget(head.url);
  return {
    type: "http",
    method: (head.method ?? "GET").toUpperCase(),
    httpVersion: head.httpVersion,
    scheme: head.socket.encrypted ? "https" : "http",
    path,
    rootPath: "",
    queryString,
    headers: headerList(head.rawHeaders),
    client: address(head.socket.remoteAddress, head.socket.remotePort),
    server: address(head.socket.localAddress, head.socket.localPort),
  };
}

export function buildWebSocketScope(head: RequestHead): WebSocketScope {
  const { path, queryString } = splitTarget(head.url);
  const headers = headerList(head.rawHeaders);
  return {
    type: "websocket",
    scheme: head.socket.encrypted ? "wss" : "ws",
    path,
    rootPath: "",
    queryString,
    headers,
    client: address(head.socket.remoteAddress, head.socket.remotePort),
    server: address(head.socket.localAddress, head.socket.localPort),
    subprotocols: offeredSubprotocols(headers),
  };
}

/** Split a request target into a percent-decoded path and the raw query string. */
export function splitTarget(target: string | undefined): { path: string; queryString: string } {
  const raw = target && target.length > 0 ? target : "/";
  const mark = raw.indexOf("?");
  const rawPath = mark === -1 ? raw : raw.slice(0, mark);
  const queryString = mark === -1 ? "" : raw.slice(mark + 1);
  return { path: decodePath(rawPath), queryString };
}

function decodePath(rawPath: string): string {
  try {
    return decodeURIComponent(rawPath);
  } catch {
    // malformed escapes stay as sent
    return rawPath;
  }
}

function headerList(rawHeaders: readonly string[]): HeaderList {
  const headers: Array<[string, string]> = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    headers.push([rawHeaders[i].toLowerCase(), rawHeaders[i + 1]]);
  }
  return headers;
}

function offeredSubprotocols(headers: HeaderList): string[] {
  const offered: string[] = [];
  for (const [name, value] of headers) {
    if (name !== "sec-websocket-protocol") continue;
    for (const protocol of value.split(",")) {
      const trimmed = protocol.trim();
      if (trimmed) offered.push(trimmed);
    }
  }
  return offered;
}

function address(host: string | undefined, port: number | undefined): Address | undefined {
  return host === undefined || port === undefined ? undefined : [host, port];
}

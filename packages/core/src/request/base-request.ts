import { ConnectionState, type ConnectionStateName } from "../connection-state";
import { PeerDisconnected } from "../errors";
import type { ConnectionScope, OutboundEvent, Receive, Send } from "../protocol";

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443, ws: 80, wss: 443 };

/**
 * Read-only view over a connection scope, shared by the HTTP and WebSocket
 * requests. Derived values are computed on first access and cached.
 */
export abstract class BaseRequest<S extends ConnectionScope = ConnectionScope> {
  protected readonly connection = new ConnectionState();

  private cachedHeaders: ReadonlyMap<string, string> | undefined;
  private cachedQuerylist: ReadonlyArray<readonly [string, string]> | undefined;
  private cachedQuerydict: Readonly<Record<string, string>> | undefined;

  constructor(
    readonly scope: S,
    protected readonly receiveEvent: Receive,
    protected readonly sendEvent: Send,
  ) {}

  abstract get method(): string;

  /** Current state of the connection */
  get state(): ConnectionStateName {
    return this.connection.name;
  }

  /**
   * Request headers keyed by lower-case name. Repeated headers are joined
   * with ", ".
   */
  get headers(): ReadonlyMap<string, string> {
    if (!this.cachedHeaders) {
      const headers = new Map<string, string>();
      for (const [rawName, value] of this.scope.headers) {
        const name = rawName.toLowerCase();
        const previous = headers.get(name);
        headers.set(name, previous === undefined ? value : `${previous}, ${value}`);
      }
      this.cachedHeaders = headers;
    }
    return this.cachedHeaders;
  }

  get scheme(): string {
    return this.scope.scheme;
  }

  /** Host name from the Host header, falling back to the server address. */
  get host(): string {
    const raw = this.headers.get("host") ?? this.scope.server?.[0] ?? "localhost";
    if (raw.startsWith("[")) {
      const end = raw.indexOf("]");
      return end === -1 ? raw : raw.slice(0, end + 1);
    }
    return raw.split(":")[0];
  }

  get port(): number {
    if (this.scope.server) return this.scope.server[1];
    const hostHeader = this.headers.get("host") ?? "";
    const match = /:(\d+)$/.exec(hostHeader);
    if (match) return Number(match[1]);
    return DEFAULT_PORTS[this.scheme] ?? 80;
  }

  /** Percent-decoded path, including the root path the app is mounted at. */
  get path(): string {
    return (this.scope.rootPath ?? "") + this.scope.path;
  }

  /** Full url with decoded path and query parameters. */
  get url(): string {
    let url = `${this.scheme}://${this.host}:${this.port}${this.path}`;
    if (this.querylist.length > 0) {
      url += "?" + this.querylist.map(([key, value]) => `${key}=${value}`).join("&");
    }
    return url;
  }

  /** Query parameters in order, duplicates preserved. */
  get querylist(): ReadonlyArray<readonly [string, string]> {
    if (!this.cachedQuerylist) {
      this.cachedQuerylist = Array.from(new URLSearchParams(this.scope.queryString).entries());
    }
    return this.cachedQuerylist;
  }

  /** Query parameters as a record; the last value wins for repeated keys. */
  get querydict(): Readonly<Record<string, string>> {
    if (!this.cachedQuerydict) {
      this.cachedQuerydict = Object.fromEntries(this.querylist);
    }
    return this.cachedQuerydict;
  }

  /** True when the peer, not the app, closed the connection. */
  get closedByPeer(): boolean {
    return this.connection.closedBy === "peer";
  }

  /** Mark the connection as closed by the peer. */
  protected markDisconnected(): void {
    this.connection.transition("disconnect");
  }

  /** Hand an event to the host; a host-reported disconnect closes the connection. */
  protected async emit(event: OutboundEvent): Promise<void> {
    try {
      await this.sendEvent(event);
    } catch (err) {
      if (err instanceof PeerDisconnected) this.markDisconnected();
      throw err;
    }
  }
}

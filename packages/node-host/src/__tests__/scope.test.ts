import { buildHttpScope, buildWebSocketScope, splitTarget, type RequestHead } from "../scope";

function head(overrides: Partial<RequestHead> = {}): RequestHead {
  return {
    method: "post",
    url: "/caf%C3%A9/items?x=1&y=%20",
    httpVersion: "1.1",
    rawHeaders: ["Host", "example.test", "X-Multi", "a", "x-multi", "b"],
    socket: { remoteAddress: "10.0.0.2", remotePort: 50000, localAddress: "10.0.0.1", localPort: 8080 },
    ...overrides,
  };
}

describe("buildHttpScope", () => {
  it("maps a request head onto an http scope", () => {
    expect(buildHttpScope(head())).toEqual({
      type: "http",
      method: "POST",
      httpVersion: "1.1",
      scheme: "http",
      path: "/café/items",
      rootPath: "",
      queryString: "x=1&y=%20",
      headers: [
        ["host", "example.test"],
        ["x-multi", "a"],
        ["x-multi", "b"],
      ],
      client: ["10.0.0.2", 50000],
      server: ["10.0.0.1", 8080],
    });
  });

  it("uses https for encrypted sockets", () => {
    expect(buildHttpScope(head({ socket: { encrypted: true } })).scheme).toBe("https");
  });

  it("leaves out unknown addresses", () => {
    const scope = buildHttpScope(head({ socket: {} }));

    expect(scope.client).toBeUndefined();
    expect(scope.server).toBeUndefined();
  });

  it("defaults the method and target", () => {
    const scope = buildHttpScope(head({ method: undefined, url: undefined }));

    expect(scope.method).toBe("GET");
    expect(scope.path).toBe("/");
    expect(scope.queryString).toBe("");
  });
});

describe("buildWebSocketScope", () => {
  it("collects offered subprotocols", () => {
    const scope = buildWebSocketScope(
      head({
        url: "/ws?room=1",
        rawHeaders: ["Host", "example.test", "Sec-WebSocket-Protocol", "chat, superchat", "Sec-WebSocket-Protocol", "json"],
      }),
    );

    expect(scope.type).toBe("websocket");
    expect(scope.scheme).toBe("ws");
    expect(scope.path).toBe("/ws");
    expect(scope.queryString).toBe("room=1");
    expect(scope.subprotocols).toEqual(["chat", "superchat", "json"]);
  });

  it("uses wss for encrypted sockets", () => {
    expect(buildWebSocketScope(head({ socket: { encrypted: true } })).scheme).toBe("wss");
  });
});

describe("splitTarget", () => {
  it("keeps the query raw and only decodes the path", () => {
    expect(splitTarget("/a%2Fb?q=%2F")).toEqual({ path: "/a/b", queryString: "q=%2F" });
  });

  it("splits at the first question mark", () => {
    expect(splitTarget("/p?a=1?b")).toEqual({ path: "/p", queryString: "a=1?b" });
  });

  it("keeps a path with broken escapes as sent", () => {
    expect(splitTarget("/bad%E0%A4%A")).toEqual({ path: "/bad%E0%A4%A", queryString: "" });
  });
});

import { EncodingError, HttpError, InvalidResponseShape, PayloadTooLarge, PeerDisconnected } from "../errors";
import { FailurePolicy } from "../failure-policy";
import { createMockLogger } from "./fake-host";

describe("FailurePolicy", () => {
  let logger: ReturnType<typeof createMockLogger>;
  let policy: FailurePolicy;

  beforeEach(() => {
    logger = createMockLogger();
    policy = new FailurePolicy(logger);
  });

  describe("onHttpFailure", () => {
    it("synthesizes a 500 before accept", () => {
      const outcome = policy.onHttpFailure(new TypeError("nope"), "request handler", "INIT");

      expect(outcome).toEqual({
        action: "respond",
        status: 500,
        headers: { "content-type": "text/plain", "content-length": "34" },
        body: "TypeError in request handler: nope",
      });
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it("wraps thrown non-errors", () => {
      const outcome = policy.onHttpFailure("just a string", "request handler", "INIT");

      expect(outcome.action === "respond" && outcome.body).toBe("Error in request handler: just a string");
    });

    it("terminates an open body after accept", () => {
      expect(policy.onHttpFailure(new Error("x"), "request handler", "ACCEPTED")).toEqual({ action: "terminate" });
      expect(policy.onHttpFailure(new Error("x"), "sending chunked response", "STREAMING")).toEqual({
        action: "terminate",
      });
      expect(logger.error).toHaveBeenCalledTimes(2);
    });

    it("ignores a failure once the body is complete", () => {
      expect(policy.onHttpFailure(new Error("x"), "request handler", "CLOSED")).toEqual({ action: "ignore" });
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it("logs shape and encoding errors as warnings", () => {
      policy.onHttpFailure(new InvalidResponseShape("bad"), "processing handler output", "INIT");
      policy.onHttpFailure(new EncodingError("bad"), "processing handler output", "INIT");

      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it("honours HttpError status and headers", () => {
      const outcome = policy.onHttpFailure(
        new HttpError(401, "Login first", { "www-authenticate": "Bearer" }),
        "request handler",
        "INIT",
      );

      expect(outcome).toEqual({
        action: "respond",
        status: 401,
        headers: { "www-authenticate": "Bearer", "content-type": "text/plain", "content-length": "11" },
        body: "Login first",
      });
      expect(logger.info).toHaveBeenCalledTimes(1);
    });

    it("replaces content headers an HttpError carries, whatever their case", () => {
      const outcome = policy.onHttpFailure(
        new HttpError(409, "nope", { "Content-Type": "application/json", "CONTENT-LENGTH": "99", "x-a": "1" }),
        "request handler",
        "INIT",
      );

      expect(outcome).toEqual({
        action: "respond",
        status: 409,
        headers: { "x-a": "1", "content-type": "text/plain", "content-length": "4" },
        body: "nope",
      });
    });

    it.each([7, 1000, 404.5])("falls back to 500 for an HttpError with status %p", (status) => {
      const outcome = policy.onHttpFailure(new HttpError(status, "nope"), "request handler", "INIT");

      expect(outcome.action === "respond" && outcome.status).toBe(500);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.info).not.toHaveBeenCalled();
    });

    it("maps PayloadTooLarge to 413", () => {
      const outcome = policy.onHttpFailure(new PayloadTooLarge(8), "request handler", "INIT");

      expect(outcome.action === "respond" && outcome.status).toBe(413);
    });

    it("ignores a peer disconnect in any state", () => {
      expect(policy.onHttpFailure(new PeerDisconnected(), "sending response", "INIT")).toEqual({ action: "ignore" });
      expect(policy.onHttpFailure(new PeerDisconnected(), "sending response", "STREAMING")).toEqual({
        action: "ignore",
      });
      expect(logger.error).not.toHaveBeenCalled();
      expect(logger.debug).toHaveBeenCalledWith("Client disconnected during sending response");
    });
  });

  describe("onWebSocketFailure", () => {
    it("closes with 1011", () => {
      expect(policy.onWebSocketFailure(new Error("x"), "ACCEPTED")).toEqual({ action: "close", code: 1011 });
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it("does not close twice", () => {
      expect(policy.onWebSocketFailure(new Error("x"), "CLOSED")).toEqual({ action: "ignore" });
    });

    it("treats a disconnect as the normal end", () => {
      expect(policy.onWebSocketFailure(new PeerDisconnected("gone", 1001), "CLOSED")).toEqual({ action: "ignore" });
      expect(logger.error).not.toHaveBeenCalled();
    });
  });
});

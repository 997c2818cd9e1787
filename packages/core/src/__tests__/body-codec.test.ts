import {
  classifyBody,
  collectBody,
  decodeJson,
  encodeBody,
  encodeChunk,
  guessContentType,
} from "../body-codec";
import { EncodingError, MalformedJSON, PayloadTooLarge } from "../errors";

async function* chunksOf(...parts: Array<string | Uint8Array>): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) yield part;
}

async function* bytesOf(...parts: string[]): AsyncGenerator<Buffer> {
  for (const part of parts) yield Buffer.from(part);
}

describe("guessContentType", () => {
  it("returns text/html for text starting with <!DOCTYPE html>", () => {
    expect(guessContentType("<!DOCTYPE html><p>hi</p>")).toBe("text/html");
  });

  it("returns text/html for text starting with <html>", () => {
    expect(guessContentType("<html><body></body></html>")).toBe("text/html");
  });

  it("is case-sensitive about the html prefix", () => {
    expect(guessContentType("<HTML></HTML>")).toBe("text/plain");
  });

  it("does not look past leading whitespace", () => {
    expect(guessContentType("  <html>")).toBe("text/plain");
  });

  it("returns text/plain for other text", () => {
    expect(guessContentType("hello")).toBe("text/plain");
    expect(guessContentType("")).toBe("text/plain");
  });

  it("returns application/json for plain objects and arrays", () => {
    expect(guessContentType({ a: 1 })).toBe("application/json");
    expect(guessContentType([1, 2])).toBe("application/json");
  });

  it("infers nothing for bytes or chunk sequences", () => {
    expect(guessContentType(Buffer.from("x"))).toBeUndefined();
    expect(guessContentType(new Uint8Array([1]))).toBeUndefined();
    expect(guessContentType(chunksOf("a"))).toBeUndefined();
  });
});

describe("classifyBody", () => {
  it("sorts each supported value into its kind", () => {
    expect(classifyBody(Buffer.from("x")).kind).toBe("bytes");
    expect(classifyBody("x").kind).toBe("text");
    expect(classifyBody({ x: 1 }).kind).toBe("structured");
    expect(classifyBody([1]).kind).toBe("structured");
    expect(classifyBody(Object.create(null)).kind).toBe("structured");
    expect(classifyBody(chunksOf("x")).kind).toBe("chunks");
  });

  it("rejects a promise with a hint", () => {
    expect(() => classifyBody(Promise.resolve("x"))).toThrow("Body cannot be a promise, forgot await?");
  });

  it("rejects a synchronous generator", () => {
    function* gen(): Generator<string> {
      yield "x";
    }
    expect(() => classifyBody(gen())).toThrow(
      "Body cannot be a synchronous iterator, use an async generator.",
    );
  });

  it("rejects numbers, booleans, null and class instances", () => {
    expect(() => classifyBody(42)).toThrow("Body cannot be number.");
    expect(() => classifyBody(true)).toThrow("Body cannot be boolean.");
    expect(() => classifyBody(null)).toThrow("Body cannot be null.");
    expect(() => classifyBody(new Map())).toThrow("Body cannot be Map.");
  });

  it("throws EncodingError for unsupported values", () => {
    expect(() => classifyBody(undefined)).toThrow(EncodingError);
  });
});

describe("encodeBody", () => {
  it("passes bytes through without a content-type", () => {
    const bytes = Buffer.from([0, 1, 2]);
    const encoded = encodeBody(bytes);

    expect(encoded).toEqual({ kind: "bytes", bytes, contentType: undefined });
  });

  it("accepts a plain Uint8Array", () => {
    const encoded = encodeBody(new Uint8Array([104, 105]));

    expect(encoded.kind).toBe("bytes");
    if (encoded.kind === "bytes") {
      expect(encoded.bytes.toString()).toBe("hi");
      expect(Buffer.isBuffer(encoded.bytes)).toBe(true);
    }
  });

  it("encodes text as UTF-8", () => {
    const encoded = encodeBody("héllo");

    expect(encoded).toEqual({ kind: "bytes", bytes: Buffer.from("héllo", "utf-8"), contentType: "text/plain" });
  });

  it("encodes html text with text/html", () => {
    const encoded = encodeBody("<html></html>");

    expect(encoded.kind === "bytes" && encoded.contentType).toBe("text/html");
  });

  it("encodes a mapping as JSON", () => {
    const encoded = encodeBody({ path: "/api/x" });

    expect(encoded).toEqual({
      kind: "bytes",
      bytes: Buffer.from('{"path":"/api/x"}'),
      contentType: "application/json",
    });
  });

  it("fails with EncodingError for a circular mapping", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(() => encodeBody(circular)).toThrow(EncodingError);
  });

  it("fails with EncodingError for a BigInt member", () => {
    expect(() => encodeBody({ n: BigInt(1) })).toThrow(/Could not JSON encode body/);
  });

  it("leaves a chunk sequence unencoded", () => {
    const chunks = chunksOf("a", "b");
    const encoded = encodeBody(chunks);

    expect(encoded).toEqual({ kind: "stream", chunks });
  });
});

describe("encodeChunk", () => {
  it("encodes text and passes bytes through", () => {
    expect(encodeChunk("foo")).toEqual(Buffer.from("foo"));
    expect(encodeChunk(Buffer.from("bar"))).toEqual(Buffer.from("bar"));
  });

  it("rejects anything else", () => {
    expect(() => encodeChunk(12)).toThrow("Response chunks must be string or bytes, not number.");
  });
});

describe("collectBody", () => {
  it("concatenates chunks", async () => {
    const body = await collectBody(bytesOf("ab", "cd", "e"), 100);

    expect(body.toString()).toBe("abcde");
  });

  it("accepts a body of exactly the limit", async () => {
    const body = await collectBody(bytesOf("01234", "56789"), 10);

    expect(body.length).toBe(10);
    expect(body.toString()).toBe("0123456789");
  });

  it("fails with PayloadTooLarge one byte over the limit", async () => {
    await expect(collectBody(bytesOf("01234", "567890"), 10)).rejects.toThrow(PayloadTooLarge);
  });

  it("stops pulling once the limit is exceeded", async () => {
    const pulled: string[] = [];
    async function* source(): AsyncGenerator<Buffer> {
      for (const part of ["aaaa", "bbbb", "cccc"]) {
        pulled.push(part);
        yield Buffer.from(part);
      }
    }

    await expect(collectBody(source(), 5)).rejects.toThrow(PayloadTooLarge);
    expect(pulled).toEqual(["aaaa", "bbbb"]);
  });

  it("returns an empty buffer for an empty stream", async () => {
    const body = await collectBody(bytesOf(), 10);

    expect(body.length).toBe(0);
  });
});

describe("decodeJson", () => {
  it("parses UTF-8 JSON bytes", () => {
    expect(decodeJson(Buffer.from('{"a":[1,2]}'))).toEqual({ a: [1, 2] });
  });

  it("parses JSON text", () => {
    expect(decodeJson("[true]")).toEqual([true]);
  });

  it("fails with MalformedJSON", () => {
    expect(() => decodeJson(Buffer.from("{nope"))).toThrow(MalformedJSON);
  });
});

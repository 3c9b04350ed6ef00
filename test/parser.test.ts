import assert from "node:assert/strict";
import test from "node:test";

import { ParseError } from "../src/errors.ts";
import { HeadArena } from "../src/http/arena.ts";
import { encodeRequestHead } from "../src/http/encoder.ts";
import { RequestParser, ResponseParser, type ParseResult } from "../src/http/parser.ts";
import { createRequestHead, isRequestHead, type MessageHead, type RequestHead, type ResponseHead } from "../src/http/types.ts";

function feedAll<H extends MessageHead>(
  parser: { feed(chunk: Buffer): ParseResult<H> },
  pieces: string[],
): ParseResult<H> {
  let result: ParseResult<H> = { type: "need-more" };
  for (const piece of pieces) {
    result = parser.feed(Buffer.from(piece, "latin1"));
    if (result.type !== "need-more") return result;
  }
  return result;
}

function parsedRequest(result: ParseResult<RequestHead>) {
  assert.equal(result.type, "parsed");
  if (result.type !== "parsed") throw new Error("unreachable");
  return result;
}

function parseError(result: ParseResult<MessageHead>): ParseError {
  assert.equal(result.type, "error");
  if (result.type !== "error") throw new Error("unreachable");
  return result.error;
}

/** Start line, header entries and the bytes after the head, as one string */
function summarize<H extends MessageHead>(
  parser: { feed(chunk: Buffer): ParseResult<H> },
  pieces: Buffer[],
): string {
  for (let i = 0; i < pieces.length; i++) {
    const result = parser.feed(pieces[i]!);
    if (result.type === "error") return `error ${result.error.kind}`;
    if (result.type === "parsed") {
      const head: MessageHead = result.head;
      const start = isRequestHead(head) ? `${head.method} ${head.target}` : `${head.status} ${head.reason}`;
      const fields = Array.from(head.headers, ([name, value]) => `${name}=${value.toString("latin1")}`);
      const rest = Buffer.concat([result.leftover, ...pieces.slice(i + 1)]).toString("latin1");
      return [start, head.version, ...fields, rest].join("|");
    }
  }
  return "need-more";
}

const SIMPLE = "GET /index.html?q=1 HTTP/1.1\r\nHost: example.test\r\nAccept: */*\r\n\r\n";

test("parser: parses a request head and returns the leftover bytes", () => {
  const result = parsedRequest(new RequestParser().feed(Buffer.from(`${SIMPLE}BODY`, "latin1")));

  assert.equal(result.head.method, "GET");
  assert.equal(result.head.target, "/index.html?q=1");
  assert.equal(result.head.version, "HTTP/1.1");
  assert.equal(result.head.headers.text("host"), "example.test");
  assert.equal(result.head.headers.text("accept"), "*/*");
  assert.equal(result.leftover.toString("latin1"), "BODY");
});

test("parser: byte-at-a-time input gives the same head", () => {
  const parser = new RequestParser();
  const result = parsedRequest(feedAll(parser, SIMPLE.split("")));

  assert.equal(result.head.target, "/index.html?q=1");
  assert.deepEqual(result.head.headers.names(), ["Host", "Accept"]);
  assert.equal(result.leftover.length, 0);
  assert.equal(parser.state, "done");
});

test("parser: accepts bare LF line endings and trims optional whitespace", () => {
  const result = parsedRequest(
    new RequestParser().feed(Buffer.from("POST /x HTTP/1.0\nX-Pad: \t value \t\n\n", "latin1")),
  );
  assert.equal(result.head.version, "HTTP/1.0");
  assert.equal(result.head.headers.text("x-pad"), "value");
});

test("parser: skips empty lines before the request line", () => {
  const result = parsedRequest(new RequestParser().feed(Buffer.from(`\r\n\r\n${SIMPLE}`, "latin1")));
  assert.equal(result.head.method, "GET");
});

test("parser: header values survive later heads in the same arena", () => {
  const arena = new HeadArena(64);
  const first = parsedRequest(
    new RequestParser({}, arena).feed(Buffer.from("GET /a HTTP/1.1\r\nX-Id: first\r\n\r\n", "latin1")),
  );
  const second = parsedRequest(
    new RequestParser({}, arena).feed(
      Buffer.from(`GET /b HTTP/1.1\r\nX-Id: second\r\nX-Fill: ${"f".repeat(80)}\r\n\r\n`, "latin1"),
    ),
  );

  assert.equal(first.head.headers.text("x-id"), "first");
  assert.equal(second.head.headers.text("x-id"), "second");
  assert.equal(second.head.headers.text("x-fill"), "f".repeat(80));
});

test("parser: rejects malformed request lines", () => {
  for (const line of [
    "GET /\r\n\r\n",
    "GET  / HTTP/1.1\r\n\r\n",
    "G(T / HTTP/1.1\r\n\r\n",
    "GET /a b HTTP/1.1\r\n\r\n",
    "GET / HTTX/1.1\r\n\r\n",
  ]) {
    const error = parseError(new RequestParser().feed(Buffer.from(line, "latin1")));
    assert.equal(error.kind, "invalid-start-line", line);
    assert.equal(error.status, 400);
  }
});

test("parser: unknown versions get 505", () => {
  const error = parseError(new RequestParser().feed(Buffer.from("GET / HTTP/2.0\r\n\r\n", "latin1")));
  assert.equal(error.kind, "unsupported-version");
  assert.equal(error.status, 505);
  assert.equal(error.message, "unsupported http version: HTTP/2.0");
});

test("parser: rejects bad header lines", () => {
  const cases: Array<[string, string]> = [
    ["GET / HTTP/1.1\r\nNo colon here\r\n\r\n", "invalid-header-name"],
    ["GET / HTTP/1.1\r\nBad Name: x\r\n\r\n", "invalid-header-name"],
    ["GET / HTTP/1.1\r\n: empty\r\n\r\n", "invalid-header-name"],
    ["GET / HTTP/1.1\r\nX-A: one\r\n  folded\r\n\r\n", "invalid-header-value"],
    ["GET / HTTP/1.1\r\nX-A: a\x7fb\r\n\r\n", "invalid-header-value"],
    ["GET / HTTP/1.1\r\nX-A: a\rb\r\n\r\n", "invalid-header-value"],
  ];
  for (const [input, kind] of cases) {
    const error = parseError(new RequestParser().feed(Buffer.from(input, "latin1")));
    assert.equal(error.kind, kind, JSON.stringify(input));
  }
});

test("parser: enforces the head size limit with 431", () => {
  const parser = new RequestParser({ maxHeaderBytes: 64 });
  const error = parseError(
    feedAll(parser, ["GET / HTTP/1.1\r\n", `X-Long: ${"a".repeat(60)}\r\n`, "\r\n"]),
  );
  assert.equal(error.kind, "too-large");
  assert.equal(error.status, 431);
  assert.equal(error.message, "message head exceeds 64 bytes");
});

test("parser: enforces the header count limit", () => {
  const parser = new RequestParser({ maxHeaderCount: 2 });
  const error = parseError(
    parser.feed(Buffer.from("GET / HTTP/1.1\r\nA: 1\r\nB: 2\r\nC: 3\r\n\r\n", "latin1")),
  );
  assert.equal(error.kind, "too-large");
  assert.equal(error.message, "message head has more than 2 headers");
});

test("parser: errors are sticky", () => {
  const parser = new RequestParser();
  const first = parseError(parser.feed(Buffer.from("BAD\r\n", "latin1")));
  const second = parseError(parser.feed(Buffer.from("GET / HTTP/1.1\r\n\r\n", "latin1")));
  assert.equal(second, first);
  assert.equal(parser.state, "error");
});

test("parser: finish distinguishes a clean end from a truncated head", () => {
  assert.equal(new RequestParser().finish(), null);

  const parser = new RequestParser();
  assert.equal(parser.feed(Buffer.from("GET / HTTP/1.1\r\nHo", "latin1")).type, "need-more");
  assert.equal(parser.bufferedBytes, 18);
  const error = parser.finish();
  assert.ok(error instanceof ParseError);
  assert.equal(error.kind, "incomplete");
});

test("parser: response status line with and without a reason", () => {
  const ok = new ResponseParser().feed(
    Buffer.from("HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\n\r\n", "latin1"),
  );
  assert.equal(ok.type, "parsed");
  if (ok.type !== "parsed") return;
  const head: ResponseHead = ok.head;
  assert.equal(head.status, 404);
  assert.equal(head.reason, "Not Found");

  const bare = new ResponseParser().feed(Buffer.from("HTTP/1.0 204\r\n\r\n", "latin1"));
  assert.equal(bare.type, "parsed");
  if (bare.type !== "parsed") return;
  assert.equal(bare.head.status, 204);
  assert.equal(bare.head.reason, "");
  assert.equal(bare.head.version, "HTTP/1.0");
});

test("parser: rejects invalid status codes", () => {
  for (const line of ["HTTP/1.1 20 OK\r\n\r\n", "HTTP/1.1 099 X\r\n\r\n", "HTTP/1.1 2000\r\n\r\n"]) {
    const error = parseError(new ResponseParser().feed(Buffer.from(line, "latin1")));
    assert.equal(error.kind, "invalid-start-line", line);
  }
});

test("parser: responses do not skip leading empty lines", () => {
  const error = parseError(new ResponseParser().feed(Buffer.from("\r\nHTTP/1.1 200 OK\r\n\r\n", "latin1")));
  assert.equal(error.message, "empty start line");
});

test("parser: encoded request heads parse back to the same head", () => {
  const head = createRequestHead({
    method: "PATCH",
    target: "/items/7?dry=1",
    version: "HTTP/1.0",
    headers: [
      ["Host", "example.test"],
      ["Via", "1.0 first"],
      ["X-Trace", "a"],
      ["Via", "1.1 second"],
    ],
  });
  const result = parsedRequest(new RequestParser().feed(encodeRequestHead(head)));

  assert.equal(result.head.method, "PATCH");
  assert.equal(result.head.target, "/items/7?dry=1");
  assert.equal(result.head.version, "HTTP/1.0");
  assert.deepEqual(result.head.headers.textAll("via"), ["1.0 first", "1.1 second"]);
  assert.deepEqual(
    Array.from(result.head.headers, ([name]) => name),
    ["Host", "Via", "X-Trace", "Via"],
  );
  assert.equal(result.leftover.length, 0);
});

test("parser: a request split at any offset parses like the whole", () => {
  const input = Buffer.from(`${SIMPLE.replace("\r\n\r\n", "\r\nVia: a\r\nVia: b\r\n\r\n")}tail`, "latin1");
  const whole = summarize(new RequestParser(), [input]);
  assert.equal(
    whole,
    "GET /index.html?q=1|HTTP/1.1|Host=example.test|Accept=*/*|Via=a|Via=b|tail",
  );
  for (let at = 0; at <= input.length; at++) {
    const split = summarize(new RequestParser(), [input.subarray(0, at), input.subarray(at)]);
    assert.equal(split, whole, `split at ${at}`);
  }
});

test("parser: a response split at any offset parses like the whole", () => {
  const input = Buffer.from("HTTP/1.1 301 Moved Permanently\r\nLocation: /new\r\nSet-Cookie: a=1\r\nSet-Cookie: b=2\r\n\r\nbody", "latin1");
  const whole = summarize(new ResponseParser(), [input]);
  assert.equal(
    whole,
    "301 Moved Permanently|HTTP/1.1|Location=/new|Set-Cookie=a=1|Set-Cookie=b=2|body",
  );
  for (let at = 0; at <= input.length; at++) {
    const split = summarize(new ResponseParser(), [input.subarray(0, at), input.subarray(at)]);
    assert.equal(split, whole, `split at ${at}`);
  }
});

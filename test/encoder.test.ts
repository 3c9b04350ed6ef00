import assert from "node:assert/strict";
import test from "node:test";

import {
  bodyChunks,
  encodeRequestHead,
  encodeResponseHead,
  frameResponse,
  releaseBody,
  writeFramedBody,
  type FramedResponse,
  type FramingContext,
} from "../src/http/encoder.ts";
import { createRequestHead, createResponseHead } from "../src/http/types.ts";
import { gate } from "./helpers/connection.ts";

const HTTP11: FramingContext = { requestMethod: "GET", requestVersion: "HTTP/1.1" };
const HTTP10: FramingContext = { requestMethod: "GET", requestVersion: "HTTP/1.0" };

async function* stream(...chunks: Array<string | Buffer>): AsyncGenerator<string | Buffer> {
  for (const chunk of chunks) yield chunk;
}

async function wireOf(framed: FramedResponse): Promise<string> {
  const parts: Buffer[] = [encodeResponseHead(framed.head)];
  await writeFramedBody(framed, async (chunk) => {
    parts.push(chunk);
  });
  return Buffer.concat(parts).toString("latin1");
}

test("encoder: response head serialization", () => {
  const head = createResponseHead({ status: 201, headers: [["Location", "/items/1"]] });
  assert.equal(encodeResponseHead(head).toString("latin1"), "HTTP/1.1 201 Created\r\nLocation: /items/1\r\n\r\n");

  const custom = createResponseHead({ status: 599, reason: "" });
  assert.equal(encodeResponseHead(custom).toString("latin1"), "HTTP/1.1 599 \r\n\r\n");
});

test("encoder: response head validation", () => {
  assert.throws(() => encodeResponseHead(createResponseHead({ status: 99 })), RangeError);
  assert.throws(() => encodeResponseHead(createResponseHead({ status: 1000 })), RangeError);
  assert.throws(() => encodeResponseHead(createResponseHead({ status: 200, reason: "OK\r\nX: 1" })), TypeError);
});

test("encoder: request head serialization", () => {
  const head = createRequestHead({ method: "PUT", target: "/a?b=c", headers: { host: "example.test" } });
  assert.equal(encodeRequestHead(head).toString("latin1"), "PUT /a?b=c HTTP/1.1\r\nhost: example.test\r\n\r\n");
  assert.throws(() => encodeRequestHead(createRequestHead({ target: "/a b" })), TypeError);
});

test("encoder: string bodies get content-length", async () => {
  const framed = await frameResponse({ status: 200, body: "héllo" }, HTTP11);
  assert.deepEqual(framed.head.body, { kind: "fixed", length: 6 });
  assert.equal(await wireOf(framed), "HTTP/1.1 200 OK\r\ncontent-length: 6\r\n\r\nh\xc3\xa9llo");
});

test("encoder: a missing body is an explicit zero length", async () => {
  const framed = await frameResponse({ status: 404, headers: { "transfer-encoding": "chunked" } }, HTTP11);
  assert.equal(await wireOf(framed), "HTTP/1.1 404 Not Found\r\ncontent-length: 0\r\n\r\n");
});

test("encoder: no-body statuses drop body and framing headers", async () => {
  const framed = await frameResponse(
    { status: 204, headers: { "content-length": "5", "x-a": "1" }, body: "hello" },
    HTTP11,
  );
  assert.equal(framed.droppedBody, true);
  assert.equal(framed.body, null);
  assert.equal(await wireOf(framed), "HTTP/1.1 204 No Content\r\nx-a: 1\r\n\r\n");

  const notModified = await frameResponse({ status: 304, headers: { "content-length": "12" } }, HTTP11);
  assert.equal(notModified.droppedBody, false);
  assert.equal(await wireOf(notModified), "HTTP/1.1 304 Not Modified\r\ncontent-length: 12\r\n\r\n");
});

test("encoder: HEAD responses keep the length but send no body", async () => {
  const framed = await frameResponse({ status: 200, body: "hello" }, { ...HTTP11, requestMethod: "HEAD" });
  assert.equal(framed.droppedBody, false);
  assert.equal(await wireOf(framed), "HTTP/1.1 200 OK\r\ncontent-length: 5\r\n\r\n");
});

test("encoder: successful CONNECT responses carry no framing", async () => {
  const framed = await frameResponse(
    { status: 200, headers: { "content-length": "0" } },
    { ...HTTP11, requestMethod: "CONNECT" },
  );
  assert.equal(await wireOf(framed), "HTTP/1.1 200 OK\r\n\r\n");
});

test("encoder: small streams are buffered and get content-length", async () => {
  const framed = await frameResponse({ status: 200, body: stream("ab", "", Buffer.from("cd")) }, HTTP11);
  assert.equal(Buffer.isBuffer(framed.body), true);
  assert.equal(await wireOf(framed), "HTTP/1.1 200 OK\r\ncontent-length: 4\r\n\r\nabcd");
});

test("encoder: large streams switch to chunked framing", async () => {
  const framed = await frameResponse(
    { status: 200, body: stream("abc", "defg", "h") },
    { ...HTTP11, smallBodyLimit: 4 },
  );
  assert.deepEqual(framed.head.body, { kind: "chunked" });
  assert.equal(
    await wireOf(framed),
    "HTTP/1.1 200 OK\r\ntransfer-encoding: chunked\r\n\r\n3\r\nabc\r\n4\r\ndefg\r\n1\r\nh\r\n0\r\n\r\n",
  );
});

test("encoder: trailers force chunked framing", async () => {
  const framed = await frameResponse(
    { status: 200, body: stream("ok"), trailers: { "x-digest": "abc" } },
    HTTP11,
  );
  assert.equal(
    await wireOf(framed),
    "HTTP/1.1 200 OK\r\ntransfer-encoding: chunked\r\n\r\n2\r\nok\r\n0\r\nx-digest: abc\r\n\r\n",
  );
});

test("encoder: a producer still waiting on its next segment is framed at once", async () => {
  const next = gate();
  async function* events(): AsyncGenerator<string> {
    yield "data: 1\n\n";
    await next.promise;
    yield "data: 2\n\n";
  }

  const framed = await frameResponse({ status: 200, body: events() }, HTTP11);
  assert.deepEqual(framed.head.body, { kind: "chunked" });
  assert.equal(framed.head.headers.text("transfer-encoding"), "chunked");
  assert.equal(framed.head.headers.has("content-length"), false);

  next.open();
  assert.equal(
    await wireOf(framed),
    "HTTP/1.1 200 OK\r\ntransfer-encoding: chunked\r\n\r\n9\r\ndata: 1\n\n\r\n9\r\ndata: 2\n\n\r\n0\r\n\r\n",
  );
});

test("encoder: a waiting producer to an HTTP/1.0 peer is close-delimited", async () => {
  const next = gate();
  async function* late(): AsyncGenerator<string> {
    await next.promise;
    yield "late";
  }

  const framed = await frameResponse({ status: 200, body: late() }, HTTP10);
  assert.deepEqual(framed.head.body, { kind: "until-close" });
  next.open();
  assert.equal(await wireOf(framed), "HTTP/1.1 200 OK\r\n\r\nlate");
});

test("encoder: releaseBody runs the producer's cleanup", async () => {
  let released = false;
  async function* producer(): AsyncGenerator<string> {
    try {
      yield "never written";
      yield "nor this";
    } finally {
      released = true;
    }
  }
  await releaseBody(producer());
  assert.equal(released, true);
  await releaseBody("plain");
  await releaseBody(null);
});

test("encoder: HTTP/1.0 peers get close-delimited streams", async () => {
  const framed = await frameResponse({ status: 200, body: stream("abc", "def") }, { ...HTTP10, smallBodyLimit: 2 });
  assert.deepEqual(framed.head.body, { kind: "until-close" });
  assert.equal(await wireOf(framed), "HTTP/1.1 200 OK\r\n\r\nabcdef");
});

test("encoder: declared content-length is enforced on streams", async () => {
  const exact = await frameResponse(
    { status: 200, headers: { "content-length": "6" }, body: stream("abc", "def") },
    HTTP11,
  );
  assert.equal(await wireOf(exact), "HTTP/1.1 200 OK\r\ncontent-length: 6\r\n\r\nabcdef");

  const short = await frameResponse(
    { status: 200, headers: { "content-length": "10" }, body: stream("abc") },
    HTTP11,
  );
  await assert.rejects(wireOf(short), { message: "response body ended after 3 of 10 bytes" });

  const long = await frameResponse(
    { status: 200, headers: { "content-length": "2" }, body: stream("abc") },
    HTTP11,
  );
  await assert.rejects(wireOf(long), { message: "response body exceeds declared content-length 2" });
});

test("encoder: bodyChunks normalizes every body shape", async () => {
  const seen: string[] = [];
  for await (const chunk of bodyChunks(new Uint8Array([0x68, 0x69]))) seen.push(chunk.toString());
  for await (const chunk of bodyChunks("")) seen.push(chunk.toString());
  for await (const chunk of bodyChunks(stream("a", "", "b"))) seen.push(chunk.toString());
  assert.deepEqual(seen, ["hi", "a", "b"]);
});

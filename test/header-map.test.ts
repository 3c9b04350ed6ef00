import assert from "node:assert/strict";
import test from "node:test";

import { HeaderEncodingError } from "../src/errors.ts";
import { HeaderMap, isToken } from "../src/http/header-map.ts";

test("header-map: lookups are case-insensitive and keep insertion order", () => {
  const headers = new HeaderMap();
  headers.append("Content-Type", "text/plain");
  headers.append("X-Trace", "a");
  headers.append("x-trace", "b");

  assert.equal(headers.get("content-type")?.toString(), "text/plain");
  assert.deepEqual(
    headers.getAll("X-TRACE").map((v) => v.toString()),
    ["a", "b"],
  );
  assert.deepEqual(headers.names(), ["Content-Type", "X-Trace", "x-trace"]);
  assert.equal(headers.size, 3);
});

test("header-map: set replaces every value and moves the field to the end", () => {
  const headers = HeaderMap.from({ a: "1", b: ["2", "3"], c: 4 });
  headers.set("B", "x");

  assert.deepEqual(
    Array.from(headers, ([name, value]) => `${name}=${value.toString()}`),
    ["a=1", "c=4", "B=x"],
  );
});

test("header-map: delete reports how many values were removed", () => {
  const headers = HeaderMap.from([
    ["Set-Cookie", "a=1"],
    ["set-cookie", "b=2"],
    ["Vary", "accept"],
  ]);
  assert.equal(headers.delete("SET-COOKIE"), 2);
  assert.equal(headers.delete("missing"), 0);
  assert.equal(headers.has("set-cookie"), false);
  assert.equal(headers.size, 1);
});

test("header-map: tokens splits comma lists across values", () => {
  const headers = HeaderMap.from([
    ["Connection", "Keep-Alive, Upgrade"],
    ["connection", " close ,,"],
  ]);
  assert.deepEqual(headers.tokens("connection"), ["keep-alive", "upgrade", "close"]);
});

test("header-map: rejects invalid names and values", () => {
  const headers = new HeaderMap();
  assert.throws(() => headers.append("bad name", "x"), TypeError);
  assert.throws(() => headers.append("", "x"), TypeError);
  assert.throws(() => headers.append("x-ok", "a\r\nInjected: 1"), TypeError);
  assert.throws(() => headers.append("x-ok", "a\0b"), TypeError);
});

test("header-map: raw bytes round-trip and text() validates them", () => {
  const headers = new HeaderMap();
  headers.append("x-bin", Buffer.from([0x61, 0xff, 0x62]));

  assert.deepEqual(headers.get("x-bin"), Buffer.from([0x61, 0xff, 0x62]));
  assert.throws(() => headers.text("x-bin"), HeaderEncodingError);
  assert.throws(() => headers.textAll("x-bin"), { status: 400, message: "header x-bin is not representable as text" });
  assert.equal(headers.text("missing"), undefined);
});

test("header-map: appendSlice references the source without copying", () => {
  const source = Buffer.from("Host: example.test", "latin1");
  const headers = new HeaderMap().appendSlice("Host", source, 6, source.length);

  assert.equal(headers.text("host"), "example.test");
  source[6] = 0x45; // "E"
  assert.equal(headers.text("host"), "Example.test");
});

test("header-map: toRecord joins repeats and keeps cookies apart", () => {
  const headers = HeaderMap.from([
    ["Accept", "text/html"],
    ["accept", "application/json"],
    ["Set-Cookie", "a=1"],
    ["Set-Cookie", "b=2"],
  ]);
  assert.deepEqual(headers.toRecord(), {
    accept: "text/html, application/json",
    "set-cookie": "a=1\nb=2",
  });
});

test("header-map: clone is independent of the original", () => {
  const original = HeaderMap.from({ a: "1" });
  const copy = original.clone();
  copy.append("b", "2");
  original.delete("a");

  assert.equal(original.size, 0);
  assert.deepEqual(copy.names(), ["a", "b"]);
});

test("header-map: isToken follows tchar", () => {
  assert.equal(isToken("X-Custom_Header.1"), true);
  assert.equal(isToken("a b"), false);
  assert.equal(isToken("a:b"), false);
  assert.equal(isToken(""), false);
});

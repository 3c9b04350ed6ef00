import { ParseError } from "../../src/errors.ts";
import { RequestParser, ResponseParser, type ParseResult } from "../../src/http/parser.ts";
import { isRequestHead, type MessageHead } from "../../src/http/types.ts";
import type { Outcome, SplitTarget } from "./types.ts";

function describeHead(head: MessageHead): string {
  const start = isRequestHead(head)
    ? `${head.method} ${head.target} ${head.version}`
    : `${head.version} ${head.status} ${head.reason}`;
  const fields = Array.from(head.headers, ([name, value]) => `${name}=${value.toString("hex")}`);
  return [start, ...fields].join("|");
}

function runParser<H extends MessageHead>(
  parser: { feed(chunk: Buffer): ParseResult<H> },
  pieces: Buffer[],
): Outcome {
  for (let i = 0; i < pieces.length; i++) {
    const result = parser.feed(pieces[i]!);
    if (result.type === "error") {
      if (!(result.error instanceof ParseError)) {
        throw new Error("parser returned a non-ParseError failure");
      }
      return { label: `error:${result.error.kind}`, detail: result.error.message };
    }
    if (result.type === "parsed") {
      const leftover = Buffer.concat([result.leftover, ...pieces.slice(i + 1)]);
      return { label: "parsed", detail: `${describeHead(result.head)}#${leftover.toString("hex")}` };
    }
  }
  return { label: "need-more", detail: "" };
}

const limits = { maxHeaderBytes: 1024, maxHeaderCount: 16 };

export const requestParserTarget: SplitTarget = {
  name: "request-parser",
  description: "request heads parse the same however the input is split",
  maxLen: 1536,
  seeds: [
    Buffer.from("GET / HTTP/1.1\r\nHost: example.test\r\n\r\n"),
    Buffer.from("POST /upload HTTP/1.1\r\nHost: a\r\nContent-Length: 5\r\n\r\nhello"),
    Buffer.from("\r\nPUT /x HTTP/1.0\r\nTransfer-Encoding: chunked\r\nX-A:  b \r\n\r\n"),
  ],
  decode: (pieces) => runParser(new RequestParser(limits), pieces),
};

export const responseParserTarget: SplitTarget = {
  name: "response-parser",
  description: "response heads parse the same however the input is split",
  maxLen: 1536,
  seeds: [
    Buffer.from("HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok"),
    Buffer.from("HTTP/1.1 101 Switching Protocols\r\nUpgrade: websocket\r\nConnection: upgrade\r\n\r\n"),
    Buffer.from("HTTP/1.0 304 \r\nETag: \"abc\"\r\n\r\n"),
  ],
  decode: (pieces) => runParser(new ResponseParser(limits), pieces),
};

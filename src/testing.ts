/**
 * Helpers for exercising the engine without sockets
 */

import { HttpConnection, type ConnectionOptions } from "./connection/connection.ts";
import type { Handler } from "./connection/handler.ts";
import type { Transport } from "./connection/transport.ts";
import { ParseError } from "./errors.ts";
import { BodyDecoder, requestBodyLength, responseBodyLength } from "./http/body.ts";
import { encodeChunked } from "./http/chunked.ts";
import { encodeRequestHead } from "./http/encoder.ts";
import { HeaderMap, type HeaderInit } from "./http/header-map.ts";
import { RequestParser, ResponseParser, type ParserLimits } from "./http/parser.ts";
import {
  createRequestHead,
  createResponseHead,
  type HttpVersion,
  type RequestHead,
  type ResponseHead,
} from "./http/types.ts";

export { createRequestHead, createResponseHead };

/**
 * In-memory transport recording everything written
 *
 * With `holdWrites` set, `write()` promises stay pending until `release()`,
 * which lets tests observe output backpressure.
 */
export class MemoryTransport implements Transport {
  readonly chunks: Buffer[] = [];
  ended = false;
  destroyed = false;
  paused = false;
  pauseCount = 0;
  holdWrites = false;
  private held: Array<() => void> = [];

  write(chunk: Buffer): Promise<void> {
    if (this.destroyed) return Promise.reject(new Error("transport destroyed"));
    this.chunks.push(Buffer.from(chunk));
    if (!this.holdWrites) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.held.push(resolve);
    });
  }

  release() {
    this.holdWrites = false;
    const held = this.held;
    this.held = [];
    for (const resolve of held) resolve();
  }

  end() {
    this.ended = true;
  }

  destroy() {
    this.destroyed = true;
    this.release();
  }

  pause() {
    this.paused = true;
    this.pauseCount += 1;
  }

  resume() {
    this.paused = false;
  }

  output(): Buffer {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return this.output().toString("latin1");
  }
}

export type RawRequestInit = {
  method?: string;
  target?: string;
  version?: HttpVersion;
  headers?: HeaderInit;
  body?: string | Buffer;
  /** send the body with chunked framing instead of Content-Length */
  chunked?: boolean;
};

/** Serialize a request the way a well-behaved client would */
export function encodeRequest(init: RawRequestInit = {}): Buffer {
  const { body: rawBody, chunked, ...headInit } = init;
  const head = createRequestHead(headInit);
  const body = typeof rawBody === "string" ? Buffer.from(rawBody, "utf8") : rawBody;

  if (chunked) {
    head.headers.set("transfer-encoding", "chunked");
    return Buffer.concat([encodeRequestHead(head), encodeChunked(body ? [body] : [])]);
  }
  if (body !== undefined && !head.headers.has("content-length")) {
    head.headers.set("content-length", body.length);
  }
  return Buffer.concat([encodeRequestHead(head), body ?? Buffer.alloc(0)]);
}

export type ParsedMessage<H> = {
  head: H;
  body: Buffer;
  trailers: HeaderMap;
  /** bytes after the message */
  leftover: Buffer;
};

function decodeWholeBody(decoder: BodyDecoder, input: Buffer) {
  const output = decoder.feed(input);
  if (!output.done) decoder.finish();
  return {
    body: Buffer.concat(output.chunks),
    trailers: decoder.trailers ?? new HeaderMap(),
    leftover: output.leftover,
  };
}

/** Parse one complete request (head and body) from raw bytes */
export function parseRequestBytes(
  bytes: Buffer | string,
  limits: Partial<ParserLimits> = {},
): ParsedMessage<RequestHead> {
  const input = typeof bytes === "string" ? Buffer.from(bytes, "latin1") : bytes;
  const parser = new RequestParser(limits);
  const result = parser.feed(input);
  if (result.type === "error") throw result.error;
  if (result.type === "need-more") {
    throw new ParseError("incomplete", "request head is incomplete");
  }

  const head = result.head;
  head.body = requestBodyLength(head);
  return { head, ...decodeWholeBody(new BodyDecoder(head.body), result.leftover) };
}

/** Parse one complete response; `until-close` bodies take the rest of the input */
export function parseResponseBytes(
  bytes: Buffer | string,
  requestMethod = "GET",
): ParsedMessage<ResponseHead> {
  const input = typeof bytes === "string" ? Buffer.from(bytes, "latin1") : bytes;
  const parser = new ResponseParser();
  const result = parser.feed(input);
  if (result.type === "error") throw result.error;
  if (result.type === "need-more") {
    throw new ParseError("incomplete", "response head is incomplete");
  }

  const head = result.head;
  head.body = responseBodyLength(head, requestMethod);
  return { head, ...decodeWholeBody(new BodyDecoder(head.body), result.leftover) };
}

/**
 * Split a stream of responses (interim 1xx included) in order, stopping
 * after a 101. `methods` gives the request method per final response (GET
 * by default).
 */
export function parseResponses(
  bytes: Buffer | string,
  methods: string[] = [],
): Array<ParsedMessage<ResponseHead>> {
  let input = typeof bytes === "string" ? Buffer.from(bytes, "latin1") : bytes;
  const out: Array<ParsedMessage<ResponseHead>> = [];
  let finals = 0;
  while (input.length > 0) {
    const parsed = parseResponseBytes(input, methods[finals] ?? "GET");
    out.push(parsed);
    // the rest of the stream belongs to the upgraded protocol
    if (parsed.head.status === 101) break;
    if (parsed.head.status >= 200) finals += 1;
    input = parsed.leftover;
  }
  return out;
}

export type InjectResult = {
  connection: HttpConnection;
  transport: MemoryTransport;
  output: Buffer;
  responses: Array<ParsedMessage<ResponseHead>>;
};

/**
 * Run raw request bytes through a fresh connection, end the input and wait
 * for the connection to close.
 */
export async function injectRequests(
  handler: Handler,
  input: Buffer | string | Array<Buffer | string>,
  options: ConnectionOptions & { methods?: string[] } = {},
): Promise<InjectResult> {
  const { methods, ...connectionOptions } = options;
  const transport = new MemoryTransport();
  const connection = new HttpConnection(transport, handler, connectionOptions);

  const chunks = Array.isArray(input) ? input : [input];
  for (const chunk of chunks) {
    connection.receive(typeof chunk === "string" ? Buffer.from(chunk, "latin1") : chunk);
  }
  connection.receiveEnd();
  await connection.closed;

  const output = transport.output();
  return { connection, transport, output, responses: parseResponses(output, methods) };
}

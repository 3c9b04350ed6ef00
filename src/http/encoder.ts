import { encodeChunk, encodeLastChunk } from "./chunked.ts";
import { HeaderMap, type HeaderInit } from "./header-map.ts";
import {
  NO_BODY,
  isNoBodyStatus,
  reasonPhrase,
  type BodyLength,
  type HttpVersion,
  type RequestHead,
  type ResponseHead,
} from "./types.ts";

export const DEFAULT_SMALL_BODY_LIMIT = 64 * 1024;

const CRLF = "\r\n";

export type BodyChunk = Buffer | Uint8Array | string;

/** Anything a handler may hand back as a response body */
export type BodyInit = BodyChunk | AsyncIterable<BodyChunk>;

export type ResponseInit = {
  status: number;
  reason?: string;
  headers?: HeaderInit;
  body?: BodyInit | null;
  /** trailer fields, sent only with chunked framing */
  trailers?: HeaderInit;
};

export type FramedResponse = {
  head: ResponseHead;
  /** body bytes, already collected when the size was known up front */
  body: Buffer | AsyncIterable<Buffer> | null;
  trailers: HeaderMap | null;
  /** a body was supplied for a status/method that cannot carry one */
  droppedBody: boolean;
};

export type FramingContext = {
  requestMethod: string;
  requestVersion: HttpVersion;
  /** streamed bodies that end within this many bytes get Content-Length */
  smallBodyLimit?: number;
};

function toBuffer(chunk: BodyChunk): Buffer {
  if (typeof chunk === "string") return Buffer.from(chunk, "utf8");
  if (Buffer.isBuffer(chunk)) return chunk;
  return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

function isBodyChunk(body: BodyInit): body is BodyChunk {
  return typeof body === "string" || body instanceof Uint8Array;
}

function assertHeadText(value: string, what: string) {
  if (/[\r\n\0]/.test(value)) {
    throw new TypeError(`invalid ${what}: ${JSON.stringify(value)}`);
  }
}

function writeHeaderLines(parts: Buffer[], headers: HeaderMap) {
  for (const [name, value] of headers) {
    parts.push(Buffer.from(`${name}: `, "latin1"), value, Buffer.from(CRLF, "latin1"));
  }
  parts.push(Buffer.from(CRLF, "latin1"));
}

export function encodeResponseHead(head: ResponseHead): Buffer {
  if (!Number.isInteger(head.status) || head.status < 100 || head.status > 999) {
    throw new RangeError(`invalid status code: ${head.status}`);
  }
  assertHeadText(head.reason, "reason phrase");

  const parts: Buffer[] = [
    Buffer.from(`${head.version} ${head.status} ${head.reason}${CRLF}`, "latin1"),
  ];
  writeHeaderLines(parts, head.headers);
  return Buffer.concat(parts);
}

export function encodeRequestHead(head: RequestHead): Buffer {
  assertHeadText(head.method, "method");
  assertHeadText(head.target, "request target");
  if (/\s/.test(head.method) || /\s/.test(head.target)) {
    throw new TypeError("method and target must not contain whitespace");
  }

  const parts: Buffer[] = [
    Buffer.from(`${head.method} ${head.target} ${head.version}${CRLF}`, "latin1"),
  ];
  writeHeaderLines(parts, head.headers);
  return Buffer.concat(parts);
}

async function* normalizeChunks(source: AsyncIterable<BodyChunk>): AsyncGenerator<Buffer> {
  for await (const chunk of source) {
    const buf = toBuffer(chunk);
    if (buf.length > 0) yield buf;
  }
}

/** Any body as a stream of non-empty buffers */
export async function* bodyChunks(body: BodyInit): AsyncGenerator<Buffer> {
  if (isBodyChunk(body)) {
    const data = toBuffer(body);
    if (data.length > 0) yield data;
    return;
  }
  yield* normalizeChunks(body);
}

async function* prepend(
  first: Buffer[],
  pending: Promise<IteratorResult<Buffer>> | null,
  rest: AsyncIterator<Buffer>,
): AsyncGenerator<Buffer> {
  yield* first;
  if (pending) {
    const next = await pending;
    if (next.done) return;
    yield next.value;
  }
  while (true) {
    const next = await rest.next();
    if (next.done) return;
    yield next.value;
  }
}

const NOT_READY = Symbol("not-ready");

/** `next` if it settles within the current turn of the event loop */
function ifReady(
  next: Promise<IteratorResult<Buffer>>,
): Promise<IteratorResult<Buffer> | typeof NOT_READY> {
  const notReady = new Promise<typeof NOT_READY>((resolve) => setImmediate(() => resolve(NOT_READY)));
  return Promise.race([next, notReady]);
}

/**
 * Release a body that will not be written so its producer can clean up.
 * An async generator runs its `finally` only once started, so the first
 * step is taken before returning it.
 */
export async function releaseBody(body: BodyInit | null | undefined): Promise<void> {
  if (body === null || body === undefined || isBodyChunk(body)) return;
  const iterator = body[Symbol.asyncIterator]();
  const next = await iterator.next();
  if (!next.done) await iterator.return?.();
}

/**
 * Decide response framing and finalize framing headers.
 *
 * Known-size bodies get Content-Length. Streams are read ahead up to
 * `smallBodyLimit`, taking only segments the producer has ready: when they
 * end within it they are sent with Content-Length too. A stream that waits
 * or runs longer is sent at once with chunked framing (HTTP/1.1 peers) or
 * delimited by closing the connection (HTTP/1.0 peers).
 */
export async function frameResponse(
  init: ResponseInit,
  context: FramingContext,
): Promise<FramedResponse> {
  const headers = HeaderMap.from(init.headers);
  const head: ResponseHead = {
    status: init.status,
    reason: init.reason ?? reasonPhrase(init.status),
    version: "HTTP/1.1",
    headers,
    body: NO_BODY,
  };
  const trailers = init.trailers ? HeaderMap.from(init.trailers) : null;
  const body = init.body ?? null;

  if (isNoBodyStatus(init.status)) {
    headers.delete("transfer-encoding");
    if (init.status !== 304) headers.delete("content-length");
    return { head, body: null, trailers: null, droppedBody: body !== null };
  }

  // a successful CONNECT turns into a tunnel: no framing at all
  if (context.requestMethod === "CONNECT" && init.status >= 200 && init.status < 300) {
    headers.delete("transfer-encoding");
    headers.delete("content-length");
    return { head, body: null, trailers: null, droppedBody: body !== null };
  }

  if (context.requestMethod === "HEAD") {
    // keep declared Content-Length so HEAD mirrors GET
    headers.delete("transfer-encoding");
    if (body !== null && isBodyChunk(body) && !headers.has("content-length")) {
      headers.set("content-length", toBuffer(body).length);
    }
    return { head, body: null, trailers: null, droppedBody: false };
  }

  if (body === null) {
    headers.delete("transfer-encoding");
    headers.set("content-length", 0);
    return { head, body: null, trailers: null, droppedBody: false };
  }

  if (isBodyChunk(body)) {
    const data = toBuffer(body);
    headers.delete("transfer-encoding");
    headers.set("content-length", data.length);
    head.body = data.length > 0 ? { kind: "fixed", length: data.length } : NO_BODY;
    return { head, body: data, trailers: null, droppedBody: false };
  }

  const stream = normalizeChunks(body);

  // a producer that declares its own length is held to it while writing
  const declared = headers.get("content-length");
  if (declared !== undefined && /^\d+$/.test(declared.toString("latin1"))) {
    const length = Number(declared.toString("latin1"));
    headers.delete("transfer-encoding");
    head.body = length > 0 ? { kind: "fixed", length } : NO_BODY;
    return { head, body: stream, trailers: null, droppedBody: false };
  }
  headers.delete("content-length");

  const limit = context.smallBodyLimit ?? DEFAULT_SMALL_BODY_LIMIT;
  const iterator = stream[Symbol.asyncIterator]();
  const buffered: Buffer[] = [];
  let bufferedBytes = 0;
  let ended = false;
  let pending: Promise<IteratorResult<Buffer>> | null = null;
  while (bufferedBytes <= limit) {
    const step = iterator.next();
    const next = await ifReady(step);
    if (next === NOT_READY) {
      pending = step;
      break;
    }
    if (next.done) {
      ended = true;
      break;
    }
    buffered.push(next.value);
    bufferedBytes += next.value.length;
  }

  if (ended && trailers === null) {
    const data = Buffer.concat(buffered, bufferedBytes);
    headers.delete("transfer-encoding");
    headers.set("content-length", data.length);
    head.body = data.length > 0 ? { kind: "fixed", length: data.length } : NO_BODY;
    return { head, body: data, trailers: null, droppedBody: false };
  }

  const rest = prepend(buffered, pending, iterator);
  if (context.requestVersion === "HTTP/1.1") {
    headers.set("transfer-encoding", "chunked");
    head.body = { kind: "chunked" };
    return { head, body: rest, trailers, droppedBody: false };
  }

  headers.delete("transfer-encoding");
  head.body = { kind: "until-close" };
  return { head, body: rest, trailers: null, droppedBody: false };
}

/**
 * Write a framed body through `write`, which resolves once the transport
 * can take more data. Returns the number of payload bytes written.
 */
export async function writeFramedBody(
  framed: FramedResponse,
  write: (chunk: Buffer) => Promise<void>,
): Promise<number> {
  const { body } = framed;
  const framing: BodyLength = framed.head.body;
  if (body === null || framing.kind === "none") return 0;

  if (Buffer.isBuffer(body)) {
    await write(body);
    return body.length;
  }

  let total = 0;
  switch (framing.kind) {
    case "fixed": {
      for await (const chunk of body) {
        if (total + chunk.length > framing.length) {
          throw new Error(`response body exceeds declared content-length ${framing.length}`);
        }
        total += chunk.length;
        await write(chunk);
      }
      if (total !== framing.length) {
        throw new Error(`response body ended after ${total} of ${framing.length} bytes`);
      }
      return total;
    }

    case "chunked": {
      for await (const chunk of body) {
        total += chunk.length;
        await write(Buffer.concat(encodeChunk(chunk)));
      }
      await write(encodeLastChunk(framed.trailers ?? undefined));
      return total;
    }

    case "until-close": {
      for await (const chunk of body) {
        total += chunk.length;
        await write(chunk);
      }
      return total;
    }
  }
}

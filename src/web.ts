import type { ReadableStream } from "stream/web";
import { Headers, Request, Response } from "undici";

import type { Handler, IncomingRequest, OutgoingResponse } from "./connection/handler.ts";
import { HeaderMap } from "./http/header-map.ts";

export type FetchHandler = (request: Request) => Promise<Response>;

export type FetchHandlerOptions = {
  /** origin used to build absolute URLs when the request carries no Host */
  origin?: string;
};

const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "te",
  "trailer",
  "upgrade",
]);

function connectionTokens(headers: HeaderMap): Set<string> {
  return new Set(headers.tokens("connection"));
}

/** Build an undici Request for an incoming request (body stays lazy) */
export function toFetchRequest(request: IncomingRequest, options: FetchHandlerOptions = {}): Request {
  const { head } = request;
  const nominated = connectionTokens(head.headers);

  const headers = new Headers();
  for (const [name, value] of head.headers) {
    const key = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(key) || nominated.has(key)) continue;
    headers.append(key, value.toString("latin1"));
  }

  const host = head.headers.text("host");
  const origin = options.origin ?? `http://${host ?? "localhost"}`;
  const url = /^[a-z][a-z0-9+.-]*:\/\//i.test(head.target)
    ? new URL(head.target)
    : new URL(head.target, origin);

  const hasBody = head.body.kind !== "none" && head.method !== "GET" && head.method !== "HEAD";
  return new Request(url, {
    method: head.method,
    headers,
    body: hasBody ? request.body : null,
    duplex: "half",
  });
}

async function* readableChunks(stream: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  try {
    while (true) {
      const next = await reader.read();
      if (next.done) return;
      if (next.value.length > 0) yield next.value;
    }
  } finally {
    reader.releaseLock();
  }
}

/** Convert an undici Response into the engine's response shape */
export function fromFetchResponse(response: Response): OutgoingResponse {
  const headers = new HeaderMap();
  for (const [name, value] of response.headers) {
    if (name === "set-cookie" || HOP_BY_HOP_HEADERS.has(name)) continue;
    headers.append(name, value);
  }
  for (const cookie of response.headers.getSetCookie()) {
    headers.append("set-cookie", cookie);
  }

  return {
    status: response.status,
    reason: response.statusText || undefined,
    headers,
    body: response.body ? readableChunks(response.body) : null,
  };
}

/** Adapt a WHATWG-style `(Request) => Response` function to a connection handler */
export function fetchHandler(fn: FetchHandler, options: FetchHandlerOptions = {}): Handler {
  return async (request) => fromFetchResponse(await fn(toFetchRequest(request, options)));
}

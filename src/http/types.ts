import { HeaderMap, type HeaderInit } from "./header-map.ts";

export type HttpVersion = "HTTP/1.0" | "HTTP/1.1";

/** How a message body is delimited on the wire */
export type BodyLength =
  | { kind: "none" }
  | { kind: "fixed"; length: number }
  | { kind: "chunked" }
  | { kind: "until-close" };

export const NO_BODY: BodyLength = Object.freeze({ kind: "none" });

/** Opaque side channel for collaborators (router params, peer info, ...) */
export type Extensions = Map<string, unknown>;

export type RequestHead = {
  method: string;
  target: string;
  version: HttpVersion;
  headers: HeaderMap;
  /** derived framing, filled in by the body codec once the head is accepted */
  body: BodyLength;
  extensions: Extensions;
};

export type ResponseHead = {
  status: number;
  /** reason phrase (empty when the peer sent none) */
  reason: string;
  version: HttpVersion;
  headers: HeaderMap;
  body: BodyLength;
};

export type MessageHead = RequestHead | ResponseHead;

export function isRequestHead(head: MessageHead): head is RequestHead {
  return "method" in head;
}

export function createRequestHead(init: {
  method?: string;
  target?: string;
  version?: HttpVersion;
  headers?: HeaderInit;
  body?: BodyLength;
}): RequestHead {
  return {
    method: init.method ?? "GET",
    target: init.target ?? "/",
    version: init.version ?? "HTTP/1.1",
    headers: HeaderMap.from(init.headers),
    body: init.body ?? NO_BODY,
    extensions: new Map(),
  };
}

export function createResponseHead(init: {
  status?: number;
  reason?: string;
  version?: HttpVersion;
  headers?: HeaderInit;
  body?: BodyLength;
}): ResponseHead {
  const status = init.status ?? 200;
  return {
    status,
    reason: init.reason ?? reasonPhrase(status),
    version: init.version ?? "HTTP/1.1",
    headers: HeaderMap.from(init.headers),
    body: init.body ?? NO_BODY,
  };
}

const REASON_PHRASES: Record<number, string> = {
  100: "Continue",
  101: "Switching Protocols",
  103: "Early Hints",
  200: "OK",
  201: "Created",
  202: "Accepted",
  204: "No Content",
  205: "Reset Content",
  206: "Partial Content",
  301: "Moved Permanently",
  302: "Found",
  303: "See Other",
  304: "Not Modified",
  307: "Temporary Redirect",
  308: "Permanent Redirect",
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  411: "Length Required",
  413: "Payload Too Large",
  414: "URI Too Long",
  415: "Unsupported Media Type",
  417: "Expectation Failed",
  426: "Upgrade Required",
  429: "Too Many Requests",
  431: "Request Header Fields Too Large",
  500: "Internal Server Error",
  501: "Not Implemented",
  502: "Bad Gateway",
  503: "Service Unavailable",
  504: "Gateway Timeout",
  505: "HTTP Version Not Supported",
};

export function reasonPhrase(status: number): string {
  return REASON_PHRASES[status] ?? "";
}

/** Status classes that never carry a body */
export function isNoBodyStatus(status: number): boolean {
  return (status >= 100 && status < 200) || status === 204 || status === 304;
}

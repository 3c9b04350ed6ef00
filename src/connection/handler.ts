import type { BodySource } from "../http/body-stream.ts";
import type { ResponseInit } from "../http/encoder.ts";
import type { HeaderMap } from "../http/header-map.ts";
import type { RequestHead } from "../http/types.ts";

export type IncomingRequest = {
  head: RequestHead;
  /** lazy body, decompressed when the connection decodes Content-Encoding */
  body: BodySource;
  /** trailer fields of a chunked body, filled in once the body was read */
  trailers: HeaderMap;
};

/** Raw byte channel handed over after a successful protocol upgrade */
export interface UpgradeTunnel extends AsyncIterable<Buffer> {
  /** next inbound chunk (bytes after the request head first), or null at EOF */
  read(): Promise<Buffer | null>;
  write(chunk: Buffer | string): Promise<void>;
  end(): void;
  destroy(error?: Error): void;
}

export type OutgoingResponse = ResponseInit & {
  /**
   * Takes over the connection after a 101 response to an Upgrade request or
   * a 2xx response to CONNECT.
   */
  upgrade?: (tunnel: UpgradeTunnel, request: RequestHead) => Promise<void> | void;
};

export type Handler = (request: IncomingRequest) => Promise<OutgoingResponse>;

/**
 * h1-engine
 *
 * HTTP/1.x wire protocol for Node.js: incremental parsing, body framing
 * and compression, keep-alive, pipelining and protocol upgrades.
 */

// Connections and server
export {
  HttpConnection,
  type ConnectionOptions,
  type PolicyViolation,
} from "./connection/connection.ts";
export {
  type Handler,
  type IncomingRequest,
  type OutgoingResponse,
  type UpgradeTunnel,
} from "./connection/handler.ts";
export {
  ConnectionStateMachine,
  IllegalTransitionError,
  TRANSITIONS,
  type ConnectionState,
} from "./connection/state.ts";
export { socketTransport, type Transport } from "./connection/transport.ts";
export { HttpServer, createServer } from "./server.ts";
export { fetchHandler, fromFetchResponse, toFetchRequest, type FetchHandler } from "./web.ts";

// Configuration
export {
  resolveEngineOptions,
  type EngineOptions,
  type ResolvedEngineOptions,
} from "./config.ts";
export { type DebugConfig, type DebugFlag } from "./debug.ts";

// Errors
export {
  BodyError,
  HeaderEncodingError,
  HttpProtocolError,
  ParseError,
  isHttpProtocolError,
  type BodyErrorKind,
  type ParseErrorKind,
} from "./errors.ts";

// Wire protocol
export { HeadArena } from "./http/arena.ts";
export {
  BodyDecoder,
  parseContentLength,
  requestBodyLength,
  responseBodyLength,
  sizeHintOf,
  type SizeHint,
} from "./http/body.ts";
export {
  BodyStream,
  IterableBody,
  collectBody,
  type BodySource,
} from "./http/body-stream.ts";
export {
  ChunkedDecoder,
  encodeChunk,
  encodeChunked,
  encodeLastChunk,
  type ChunkedDecoderOptions,
} from "./http/chunked.ts";
export {
  compressBody,
  decompressBody,
  negotiateContentEncoding,
  type ContentCoding,
} from "./http/compression.ts";
export {
  encodeRequestHead,
  encodeResponseHead,
  frameResponse,
  writeFramedBody,
  type BodyInit,
  type ResponseInit,
} from "./http/encoder.ts";
export { HeaderMap, type HeaderInit } from "./http/header-map.ts";
export {
  RequestParser,
  ResponseParser,
  type ParseResult,
  type ParserLimits,
} from "./http/parser.ts";
export { readBody, readText, type PayloadConfig } from "./http/payload.ts";
export {
  NO_BODY,
  createRequestHead,
  createResponseHead,
  reasonPhrase,
  type BodyLength,
  type HttpVersion,
  type RequestHead,
  type ResponseHead,
} from "./http/types.ts";

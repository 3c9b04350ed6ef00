import {
  debugFlagsToArray,
  parseDebugEnv,
  resolveDebugFlags,
  type DebugConfig,
  type DebugFlag,
} from "./debug.ts";
import { DEFAULT_BODY_HIGH_WATER_BYTES } from "./http/body-stream.ts";
import { DEFAULT_MAX_CHUNK_SIZE } from "./http/chunked.ts";
import { DEFAULT_MAX_DECOMPRESSED_BYTES } from "./http/compression.ts";
import { DEFAULT_SMALL_BODY_LIMIT } from "./http/encoder.ts";
import { DEFAULT_MAX_HEADER_BYTES, DEFAULT_MAX_HEADER_COUNT } from "./http/parser.ts";
import { resolveEnvFlag, resolveEnvNumber } from "./utils/env.ts";

export const DEFAULT_MAX_PIPELINED_REQUESTS = 16;
export const DEFAULT_MAX_PIPELINE_BYTES = 64 * 1024;
export const DEFAULT_MAX_CONCURRENT_HANDLERS = 256;
export const DEFAULT_HEADER_READ_TIMEOUT_MS = 30_000;
export const DEFAULT_BODY_READ_TIMEOUT_MS = 60_000;
export const DEFAULT_KEEP_ALIVE_TIMEOUT_MS = 5_000;
export const DEFAULT_SHUTDOWN_GRACE_MS = 10_000;

export type EngineOptions = {
  /** max bytes of a request head (start line + headers) */
  maxHeaderBytes?: number;
  /** max header fields per head */
  maxHeaderCount?: number;
  /** max chunk-size value in `bytes` */
  maxChunkSize?: number;
  /** max decompressed request body size in `bytes` */
  maxDecompressedBytes?: number;
  /** max dispatched but unanswered requests per connection */
  maxPipelinedRequests?: number;
  /** max input bytes held while the pipeline is full */
  maxPipelineBytes?: number;
  /** queued request body bytes before the transport is paused */
  bodyHighWaterBytes?: number;
  /** streamed response bodies ending within this many `bytes` get Content-Length */
  smallBodyLimit?: number;
  /** handlers running at once across all connections of a server */
  maxConcurrentHandlers?: number;

  /** time to receive a complete head in `ms` */
  headerReadTimeoutMs?: number;
  /** max gap between request body reads in `ms` */
  bodyReadTimeoutMs?: number;
  /** idle time between exchanges in `ms` */
  keepAliveTimeoutMs?: number;
  /** time in-flight exchanges get to finish after shutdown in `ms` */
  shutdownGraceMs?: number;

  /** decode Content-Encoding of request bodies */
  decompressRequests?: boolean;
  /** compress response bodies according to Accept-Encoding */
  compressResponses?: boolean;

  /**
   * Debug configuration
   *
   * - `true`: enable all debug components
   * - `false`: disable all debug components
   * - `string[]`: enable selected components (e.g. `["parser", "conn"]`)
   *
   * If omitted, defaults to `H1_DEBUG`.
   */
  debug?: DebugConfig;
};

export type ResolvedEngineOptions = {
  maxHeaderBytes: number;
  maxHeaderCount: number;
  maxChunkSize: number;
  maxDecompressedBytes: number;
  maxPipelinedRequests: number;
  maxPipelineBytes: number;
  bodyHighWaterBytes: number;
  smallBodyLimit: number;
  maxConcurrentHandlers: number;

  headerReadTimeoutMs: number;
  bodyReadTimeoutMs: number;
  keepAliveTimeoutMs: number;
  shutdownGraceMs: number;

  decompressRequests: boolean;
  compressResponses: boolean;

  /** enabled debug components */
  debug: DebugFlag[];
};

type NumericOption = {
  [K in keyof ResolvedEngineOptions]: ResolvedEngineOptions[K] extends number ? K : never;
}[keyof ResolvedEngineOptions];

const NUMERIC_DEFAULTS: Record<NumericOption, { env: string; fallback: number; min: number }> = {
  maxHeaderBytes: { env: "H1_MAX_HEADER_BYTES", fallback: DEFAULT_MAX_HEADER_BYTES, min: 64 },
  maxHeaderCount: { env: "H1_MAX_HEADER_COUNT", fallback: DEFAULT_MAX_HEADER_COUNT, min: 1 },
  maxChunkSize: { env: "H1_MAX_CHUNK_SIZE", fallback: DEFAULT_MAX_CHUNK_SIZE, min: 1 },
  maxDecompressedBytes: {
    env: "H1_MAX_DECOMPRESSED_BYTES",
    fallback: DEFAULT_MAX_DECOMPRESSED_BYTES,
    min: 1,
  },
  maxPipelinedRequests: {
    env: "H1_MAX_PIPELINED_REQUESTS",
    fallback: DEFAULT_MAX_PIPELINED_REQUESTS,
    min: 1,
  },
  maxPipelineBytes: { env: "H1_MAX_PIPELINE_BYTES", fallback: DEFAULT_MAX_PIPELINE_BYTES, min: 0 },
  bodyHighWaterBytes: {
    env: "H1_BODY_HIGH_WATER_BYTES",
    fallback: DEFAULT_BODY_HIGH_WATER_BYTES,
    min: 1,
  },
  smallBodyLimit: { env: "H1_SMALL_BODY_LIMIT", fallback: DEFAULT_SMALL_BODY_LIMIT, min: 0 },
  maxConcurrentHandlers: {
    env: "H1_MAX_CONCURRENT_HANDLERS",
    fallback: DEFAULT_MAX_CONCURRENT_HANDLERS,
    min: 1,
  },
  headerReadTimeoutMs: {
    env: "H1_HEADER_READ_TIMEOUT_MS",
    fallback: DEFAULT_HEADER_READ_TIMEOUT_MS,
    min: 1,
  },
  bodyReadTimeoutMs: { env: "H1_BODY_READ_TIMEOUT_MS", fallback: DEFAULT_BODY_READ_TIMEOUT_MS, min: 1 },
  keepAliveTimeoutMs: {
    env: "H1_KEEP_ALIVE_TIMEOUT_MS",
    fallback: DEFAULT_KEEP_ALIVE_TIMEOUT_MS,
    min: 1,
  },
  shutdownGraceMs: { env: "H1_SHUTDOWN_GRACE_MS", fallback: DEFAULT_SHUTDOWN_GRACE_MS, min: 0 },
};

function resolveNumber(key: NumericOption, explicit: number | undefined): number {
  const { env, fallback, min } = NUMERIC_DEFAULTS[key];
  if (explicit === undefined) return resolveEnvNumber(env, fallback);
  if (!Number.isFinite(explicit) || !Number.isInteger(explicit) || explicit < min) {
    throw new RangeError(`${key} must be an integer >= ${min} (got ${explicit})`);
  }
  return explicit;
}

export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const debug = debugFlagsToArray(resolveDebugFlags(options.debug, parseDebugEnv()));

  return {
    maxHeaderBytes: resolveNumber("maxHeaderBytes", options.maxHeaderBytes),
    maxHeaderCount: resolveNumber("maxHeaderCount", options.maxHeaderCount),
    maxChunkSize: resolveNumber("maxChunkSize", options.maxChunkSize),
    maxDecompressedBytes: resolveNumber("maxDecompressedBytes", options.maxDecompressedBytes),
    maxPipelinedRequests: resolveNumber("maxPipelinedRequests", options.maxPipelinedRequests),
    maxPipelineBytes: resolveNumber("maxPipelineBytes", options.maxPipelineBytes),
    bodyHighWaterBytes: resolveNumber("bodyHighWaterBytes", options.bodyHighWaterBytes),
    smallBodyLimit: resolveNumber("smallBodyLimit", options.smallBodyLimit),
    maxConcurrentHandlers: resolveNumber("maxConcurrentHandlers", options.maxConcurrentHandlers),

    headerReadTimeoutMs: resolveNumber("headerReadTimeoutMs", options.headerReadTimeoutMs),
    bodyReadTimeoutMs: resolveNumber("bodyReadTimeoutMs", options.bodyReadTimeoutMs),
    keepAliveTimeoutMs: resolveNumber("keepAliveTimeoutMs", options.keepAliveTimeoutMs),
    shutdownGraceMs: resolveNumber("shutdownGraceMs", options.shutdownGraceMs),

    decompressRequests:
      options.decompressRequests ?? resolveEnvFlag("H1_DECOMPRESS_REQUESTS", true),
    compressResponses: options.compressResponses ?? resolveEnvFlag("H1_COMPRESS_RESPONSES", false),

    debug,
  };
}

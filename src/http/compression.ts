import zlib from "zlib";
import { Readable, type Transform } from "stream";

import { BodyError } from "../errors.ts";

export const DEFAULT_MAX_DECOMPRESSED_BYTES = 8 * 1024 * 1024;

export type ContentCoding = "gzip" | "deflate" | "br" | "zstd" | "identity";

/** Preference order used to break ties between equally weighted codings */
export const CODING_PREFERENCE: readonly ContentCoding[] = [
  "gzip",
  "deflate",
  "br",
  "zstd",
  "identity",
];

// node:zlib has no zstd support on Node.js 20
const SUPPORTED_CODINGS: ReadonlySet<ContentCoding> = new Set([
  "gzip",
  "deflate",
  "br",
  "identity",
]);

export function parseContentCoding(value: string): ContentCoding | null {
  switch (value.trim().toLowerCase()) {
    case "gzip":
    case "x-gzip":
      return "gzip";
    case "deflate":
      return "deflate";
    case "br":
      return "br";
    case "zstd":
      return "zstd";
    case "identity":
      return "identity";
    default:
      return null;
  }
}

type AcceptEntry = { coding: string; q: number };

function parseAcceptEncoding(value: string): AcceptEntry[] {
  const entries: AcceptEntry[] = [];
  for (const part of value.split(",")) {
    const [rawCoding, ...params] = part.split(";");
    const coding = rawCoding?.trim().toLowerCase();
    if (!coding) continue;

    let q = 1;
    for (const param of params) {
      const [key, rawValue] = param.split("=");
      if (key?.trim().toLowerCase() !== "q" || rawValue === undefined) continue;
      const parsed = Number(rawValue.trim());
      q = Number.isFinite(parsed) ? Math.min(1, Math.max(0, parsed)) : 0;
    }
    entries.push({ coding: coding === "x-gzip" ? "gzip" : coding, q });
  }
  return entries;
}

/**
 * Choose a response coding from an Accept-Encoding value.
 *
 * Returns null when the client refuses every coding we can produce
 * (including identity).
 */
export function negotiateContentEncoding(
  acceptEncoding: string | undefined,
): ContentCoding | null {
  if (acceptEncoding === undefined) return "identity";

  const entries = parseAcceptEncoding(acceptEncoding);
  const wildcard = entries.find((entry) => entry.coding === "*");

  let best: ContentCoding | null = null;
  let bestQ = 0;
  for (const coding of CODING_PREFERENCE) {
    if (!SUPPORTED_CODINGS.has(coding)) continue;

    const explicit = entries.find((entry) => entry.coding === coding);
    let q: number;
    if (explicit) {
      q = explicit.q;
    } else if (wildcard) {
      q = wildcard.q;
    } else {
      // identity stays acceptable unless excluded
      q = coding === "identity" ? 0.001 : 0;
    }

    if (q > bestQ) {
      best = coding;
      bestQ = q;
    }
  }
  return best;
}

/** Content codings in the order they were applied, or throws for unknown ones */
export function contentCodingsOf(values: string[]): ContentCoding[] {
  const out: ContentCoding[] = [];
  for (const value of values) {
    const coding = parseContentCoding(value);
    if (coding === null) {
      throw new BodyError("unsupported-encoding", `unsupported content-encoding: ${value}`);
    }
    if (coding !== "identity") out.push(coding);
  }
  return out;
}

function createDecompressor(coding: ContentCoding): Transform {
  switch (coding) {
    case "gzip":
      return zlib.createGunzip();
    case "deflate":
      return zlib.createInflate();
    case "br":
      return zlib.createBrotliDecompress();
    case "zstd":
    case "identity":
      throw new BodyError("unsupported-encoding", `unsupported content-encoding: ${coding}`);
  }
}

function createCompressor(coding: ContentCoding): Transform {
  switch (coding) {
    case "gzip":
      return zlib.createGzip();
    case "deflate":
      return zlib.createDeflate();
    case "br":
      return zlib.createBrotliCompress();
    case "zstd":
    case "identity":
      throw new Error(`cannot compress with ${coding}`);
  }
}

async function* throughTransform(
  source: AsyncIterable<Buffer>,
  transform: Transform,
): AsyncGenerator<Buffer> {
  const input = Readable.from(source, { objectMode: false });
  input.on("error", (err) => transform.destroy(err));
  input.pipe(transform);

  try {
    for await (const chunk of transform) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    }
  } finally {
    input.destroy();
    transform.destroy();
  }
}

/**
 * Decompress a body stream, applying codings in reverse order.
 *
 * Output beyond `maxBytes` fails with `decompressed-too-large` before the
 * offending chunk reaches the consumer; corrupt input fails with
 * `invalid-encoding`.
 */
export async function* decompressBody(
  source: AsyncIterable<Buffer>,
  codings: ContentCoding | readonly ContentCoding[],
  maxBytes = DEFAULT_MAX_DECOMPRESSED_BYTES,
): AsyncGenerator<Buffer> {
  const list = (typeof codings === "string" ? [codings] : [...codings]).filter(
    (coding) => coding !== "identity",
  );

  let stream: AsyncIterable<Buffer> = source;
  for (const coding of list.reverse()) {
    stream = throughTransform(stream, createDecompressor(coding));
  }

  let total = 0;
  try {
    for await (const chunk of stream) {
      total += chunk.length;
      if (total > maxBytes) {
        throw new BodyError(
          "decompressed-too-large",
          `decompressed body exceeds ${maxBytes} bytes`,
        );
      }
      yield chunk;
    }
  } catch (err) {
    if (err instanceof BodyError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new BodyError("invalid-encoding", `invalid ${list.join(", ")} payload: ${message}`);
  }
}

export async function* compressBody(
  source: AsyncIterable<Buffer>,
  coding: ContentCoding,
): AsyncGenerator<Buffer> {
  if (coding === "identity") {
    yield* source;
    return;
  }
  yield* throughTransform(source, createCompressor(coding));
}

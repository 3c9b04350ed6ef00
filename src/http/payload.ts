import { BodyError } from "../errors.ts";
import type { IncomingRequest } from "../connection/handler.ts";
import { collectBody } from "./body-stream.ts";

export const DEFAULT_PAYLOAD_LIMIT = 262_144;

export type PayloadConfig = {
  /** max body size in `bytes` */
  limit?: number;
  /** required media type, either exact (`application/json`) or `type/*` */
  mimeType?: string;
};

type MediaType = {
  essence: string;
  params: Map<string, string>;
};

function parseMediaType(value: string): MediaType {
  const [essence = "", ...rest] = value.split(";");
  const params = new Map<string, string>();
  for (const part of rest) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    const key = part.slice(0, eq).trim().toLowerCase();
    let raw = part.slice(eq + 1).trim();
    if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
      raw = raw.slice(1, -1);
    }
    if (key) params.set(key, raw);
  }
  return { essence: essence.trim().toLowerCase(), params };
}

function mediaTypeMatches(essence: string, expected: string): boolean {
  const wanted = expected.trim().toLowerCase();
  if (wanted.endsWith("/*")) {
    return essence.startsWith(wanted.slice(0, -1));
  }
  return essence === wanted;
}

function contentType(request: IncomingRequest): MediaType | null {
  const raw = request.head.headers.get("content-type");
  return raw === undefined ? null : parseMediaType(raw.toString("latin1"));
}

/**
 * Collect a request body, enforcing `limit` and the optional media type.
 *
 * A declared Content-Length above the limit is rejected before any body
 * bytes are read.
 */
export async function readBody(
  request: IncomingRequest,
  config: PayloadConfig = {},
): Promise<Buffer> {
  const limit = config.limit ?? DEFAULT_PAYLOAD_LIMIT;

  const framing = request.head.body;
  if (framing.kind === "fixed" && framing.length > limit) {
    throw new BodyError("payload-overflow", `body exceeds ${limit} bytes`);
  }

  if (config.mimeType !== undefined) {
    const type = contentType(request);
    if (type === null || type.essence === "") {
      throw new BodyError("unexpected-content-type", "Content-Type is expected");
    }
    if (!mediaTypeMatches(type.essence, config.mimeType)) {
      throw new BodyError("unexpected-content-type", "Unexpected Content-Type");
    }
  }

  return collectBody(request.body, limit);
}

/** Collect a body and decode it with the Content-Type charset (UTF-8 default) */
export async function readText(
  request: IncomingRequest,
  config: PayloadConfig = {},
): Promise<string> {
  const body = await readBody(request, config);
  const charset = contentType(request)?.params.get("charset") ?? "utf-8";

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset, { fatal: true, ignoreBOM: true });
  } catch {
    throw new BodyError("undecodable-body", "Can not decode body");
  }

  try {
    return decoder.decode(body);
  } catch {
    throw new BodyError("undecodable-body", "Can not decode body");
  }
}

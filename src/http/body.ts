import { BodyError } from "../errors.ts";
import { ChunkedDecoder, type ChunkedDecoderOptions, type DecodeOutput } from "./chunked.ts";
import type { HeaderMap } from "./header-map.ts";
import {
  NO_BODY,
  isNoBodyStatus,
  type BodyLength,
  type RequestHead,
  type ResponseHead,
} from "./types.ts";

const DIGITS_RE = /^\d+$/;

/**
 * Parse Content-Length, accepting repeated identical values
 * (`5, 5` or two `5` lines) and rejecting anything ambiguous.
 *
 * Returns null when the header is absent.
 */
export function parseContentLength(headers: HeaderMap): number | null {
  const raw = headers.getAll("content-length");
  if (raw.length === 0) return null;

  let value: string | null = null;
  for (const item of raw) {
    for (const part of item.toString("latin1").split(",")) {
      const trimmed = part.trim();
      if (!DIGITS_RE.test(trimmed)) {
        throw new BodyError("invalid-framing", "invalid content-length");
      }
      const normalized = trimmed.replace(/^0+(?=\d)/, "");
      if (value !== null && value !== normalized) {
        throw new BodyError("invalid-framing", "conflicting content-length values");
      }
      value = normalized;
    }
  }

  const length = Number(value);
  if (!Number.isSafeInteger(length)) {
    throw new BodyError("invalid-framing", "content-length out of range");
  }
  return length;
}

/** Transfer codings in order of application, or null when absent */
function transferCodings(headers: HeaderMap): string[] | null {
  if (!headers.has("transfer-encoding")) return null;
  return headers.tokens("transfer-encoding").map((t) => t.split(";")[0]!.trim());
}

function isChunkedOnly(codings: string[]): boolean {
  return codings.length > 0 && codings.every((coding) => coding === "chunked");
}

/**
 * Derive request body framing.
 *
 * Transfer-Encoding and Content-Length together are rejected rather than
 * resolved in favor of either header.
 */
export function requestBodyLength(head: RequestHead): BodyLength {
  const codings = transferCodings(head.headers);
  if (codings !== null) {
    if (head.version === "HTTP/1.0") {
      throw new BodyError("invalid-framing", "transfer-encoding in an HTTP/1.0 request");
    }
    if (head.headers.has("content-length")) {
      throw new BodyError("invalid-framing", "both transfer-encoding and content-length present");
    }
    if (!isChunkedOnly(codings)) {
      throw new BodyError(
        "unsupported-transfer-encoding",
        `unsupported transfer-encoding: ${codings.join(", ")}`,
      );
    }
    return { kind: "chunked" };
  }

  const length = parseContentLength(head.headers);
  if (length === null || length === 0) return NO_BODY;
  return { kind: "fixed", length };
}

/** Derive response body framing given the method of the request it answers */
export function responseBodyLength(head: ResponseHead, requestMethod = "GET"): BodyLength {
  if (isNoBodyStatus(head.status) || requestMethod === "HEAD") return NO_BODY;
  if (requestMethod === "CONNECT" && head.status >= 200 && head.status < 300) {
    return { kind: "until-close" };
  }

  const codings = transferCodings(head.headers);
  if (codings !== null) {
    if (head.headers.has("content-length")) {
      throw new BodyError("invalid-framing", "both transfer-encoding and content-length present");
    }
    return codings[codings.length - 1] === "chunked"
      ? { kind: "chunked" }
      : { kind: "until-close" };
  }

  const length = parseContentLength(head.headers);
  if (length === null) return { kind: "until-close" };
  if (length === 0) return NO_BODY;
  return { kind: "fixed", length };
}

export type SizeHint = {
  /** bytes known to follow */
  lower: number;
  /** upper bound, null when unknown */
  upper: number | null;
};

export function sizeHintOf(length: BodyLength): SizeHint {
  switch (length.kind) {
    case "none":
      return { lower: 0, upper: 0 };
    case "fixed":
      return { lower: length.length, upper: length.length };
    case "chunked":
    case "until-close":
      return { lower: 0, upper: null };
  }
}

type DecoderState =
  | { kind: "none" }
  | { kind: "fixed"; remaining: number }
  | { kind: "chunked"; decoder: ChunkedDecoder }
  | { kind: "until-close"; ended: boolean };

function initialState(length: BodyLength, options: ChunkedDecoderOptions): DecoderState {
  switch (length.kind) {
    case "none":
      return { kind: "none" };
    case "fixed":
      return { kind: "fixed", remaining: length.length };
    case "chunked":
      return { kind: "chunked", decoder: new ChunkedDecoder(options) };
    case "until-close":
      return { kind: "until-close", ended: false };
  }
}

/**
 * Body decoder for every framing kind; dispatch is a switch on the tagged
 * state so Fixed/Chunked/RawUntilClose stay interchangeable at call sites.
 */
export class BodyDecoder {
  private state: DecoderState;
  readonly length: BodyLength;

  constructor(length: BodyLength, options: ChunkedDecoderOptions = {}) {
    this.length = length;
    this.state = initialState(length, options);
  }

  get done(): boolean {
    switch (this.state.kind) {
      case "none":
        return true;
      case "fixed":
        return this.state.remaining === 0;
      case "chunked":
        return this.state.decoder.done;
      case "until-close":
        return this.state.ended;
    }
  }

  /** trailers of a chunked body (empty for other framings) */
  get trailers(): HeaderMap | null {
    return this.state.kind === "chunked" ? this.state.decoder.trailers : null;
  }

  feed(input: Buffer): DecodeOutput {
    const state = this.state;
    switch (state.kind) {
      case "none":
        return { chunks: [], done: true, leftover: input };

      case "fixed": {
        const take = Math.min(state.remaining, input.length);
        state.remaining -= take;
        return {
          chunks: take > 0 ? [input.subarray(0, take)] : [],
          done: state.remaining === 0,
          leftover: input.subarray(take),
        };
      }

      case "chunked":
        return state.decoder.feed(input);

      case "until-close":
        return {
          chunks: input.length > 0 ? [input] : [],
          done: false,
          leftover: Buffer.alloc(0),
        };
    }
  }

  /** Transport reached EOF; throws when the body was cut short */
  finish() {
    const state = this.state;
    switch (state.kind) {
      case "none":
        return;
      case "fixed":
        if (state.remaining > 0) {
          throw new BodyError(
            "incomplete-body",
            `connection closed with ${state.remaining} body bytes outstanding`,
          );
        }
        return;
      case "chunked":
        state.decoder.finish();
        return;
      case "until-close":
        state.ended = true;
        return;
    }
  }
}

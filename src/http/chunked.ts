import { BodyError, ParseError } from "../errors.ts";
import { HeaderMap } from "./header-map.ts";
import { DEFAULT_PARSER_LIMITS, parseFieldLine, type ParserLimits } from "./parser.ts";

export const DEFAULT_MAX_CHUNK_SIZE = 16 * 1024 * 1024;

// Chunk-size lines carry extensions we ignore; keep them bounded anyway.
const MAX_CHUNK_SIZE_LINE_BYTES = 4096;

const CRLF = Buffer.from("\r\n");
const LAST_CHUNK = Buffer.from("0\r\n\r\n");
const HEX_RE = /^[0-9a-fA-F]+$/;

export type ChunkedDecoderOptions = {
  /** largest accepted chunk-size value in `bytes` */
  maxChunkSize?: number;
  /** bounds for the trailer section */
  trailerLimits?: Partial<ParserLimits>;
};

export type DecodeOutput = {
  /** decoded body bytes (views into the input) */
  chunks: Buffer[];
  /** whether the body is complete */
  done: boolean;
  /** bytes after the end of the body */
  leftover: Buffer;
};

type ChunkedPhase = "size" | "data" | "data-cr" | "data-lf" | "trailers" | "done";

/**
 * Streaming decoder for `Transfer-Encoding: chunked`
 *
 * Lines (size lines and trailers) may be split anywhere; partial lines are
 * kept until their LF arrives. Chunk data is never buffered.
 */
export class ChunkedDecoder {
  private phase: ChunkedPhase = "size";
  private remaining = 0;
  private lineParts: Buffer[] = [];
  private lineBytes = 0;
  private trailerBytes = 0;
  private readonly maxChunkSize: number;
  private readonly trailerLimits: ParserLimits;

  /** trailer fields received after the last chunk */
  readonly trailers = new HeaderMap();

  constructor(options: ChunkedDecoderOptions = {}) {
    this.maxChunkSize = options.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;
    this.trailerLimits = { ...DEFAULT_PARSER_LIMITS, ...options.trailerLimits };
  }

  get done() {
    return this.phase === "done";
  }

  feed(input: Buffer): DecodeOutput {
    const chunks: Buffer[] = [];
    let pos = 0;

    while (pos < input.length && this.phase !== "done") {
      switch (this.phase) {
        case "size":
        case "trailers": {
          const lf = input.indexOf(0x0a, pos);
          const end = lf === -1 ? input.length : lf + 1;
          this.appendLine(input.subarray(pos, end));
          pos = end;
          if (lf === -1) break;
          const line = this.takeLine();
          if (this.phase === "size") {
            this.onSizeLine(line);
          } else {
            this.onTrailerLine(line);
          }
          break;
        }

        case "data": {
          const take = Math.min(this.remaining, input.length - pos);
          chunks.push(input.subarray(pos, pos + take));
          pos += take;
          this.remaining -= take;
          if (this.remaining === 0) this.phase = "data-cr";
          break;
        }

        case "data-cr": {
          const b = input[pos]!;
          pos += 1;
          if (b === 0x0d) {
            this.phase = "data-lf";
          } else if (b === 0x0a) {
            this.phase = "size";
          } else {
            throw new BodyError("invalid-chunk", "missing CRLF after chunk data");
          }
          break;
        }

        case "data-lf": {
          const b = input[pos]!;
          pos += 1;
          if (b !== 0x0a) {
            throw new BodyError("invalid-chunk", "invalid chunk terminator");
          }
          this.phase = "size";
          break;
        }
      }
    }

    return {
      chunks,
      done: this.phase === "done",
      leftover: this.phase === "done" ? input.subarray(pos) : Buffer.alloc(0),
    };
  }

  /** Called when the transport ends */
  finish() {
    if (this.phase !== "done") {
      throw new BodyError("incomplete-body", "connection closed inside chunked body");
    }
  }

  private appendLine(part: Buffer) {
    const limit =
      this.phase === "size"
        ? MAX_CHUNK_SIZE_LINE_BYTES
        : this.trailerLimits.maxHeaderBytes - this.trailerBytes;
    if (this.lineBytes + part.length > limit) {
      if (this.phase === "size") {
        throw new BodyError("invalid-chunk", "chunk size line too long");
      }
      throw new BodyError("invalid-chunk", `trailers exceed ${this.trailerLimits.maxHeaderBytes} bytes`);
    }
    // copy: the input buffer may be reused by the transport
    this.lineParts.push(Buffer.from(part));
    this.lineBytes += part.length;
  }

  private takeLine(): Buffer {
    const raw = Buffer.concat(this.lineParts, this.lineBytes);
    this.trailerBytes += this.phase === "trailers" ? raw.length : 0;
    this.lineParts = [];
    this.lineBytes = 0;

    let end = raw.length - 1;
    if (end > 0 && raw[end - 1] === 0x0d) end -= 1;
    const line = raw.subarray(0, end);
    if (line.includes(0x0d)) {
      throw new BodyError("invalid-chunk", "bare CR in chunked framing");
    }
    return line;
  }

  private onSizeLine(line: Buffer) {
    const text = line.toString("latin1");
    const semicolon = text.indexOf(";");
    const digits = (semicolon === -1 ? text : text.slice(0, semicolon)).trim();
    if (!HEX_RE.test(digits)) {
      throw new BodyError("invalid-chunk", `invalid chunk size: ${JSON.stringify(digits)}`);
    }

    // reject before converting so absurd sizes never become numbers
    const significant = digits.replace(/^0+/, "");
    if (significant.length > 13) {
      throw new BodyError("chunk-too-large", `chunk size exceeds ${this.maxChunkSize} bytes`);
    }
    const size = significant.length === 0 ? 0 : Number.parseInt(significant, 16);
    if (size > this.maxChunkSize) {
      throw new BodyError("chunk-too-large", `chunk size ${size} exceeds ${this.maxChunkSize} bytes`);
    }

    if (size === 0) {
      this.phase = "trailers";
      return;
    }
    this.remaining = size;
    this.phase = "data";
  }

  private onTrailerLine(line: Buffer) {
    if (line.length === 0) {
      this.phase = "done";
      return;
    }
    if (line[0] === 0x20 || line[0] === 0x09) {
      throw new BodyError("invalid-chunk", "obsolete line folding in trailers");
    }
    const field = parseFieldLine(line);
    if (field instanceof ParseError) {
      throw new BodyError("invalid-chunk", `invalid trailer: ${field.message}`);
    }
    if (this.trailers.size >= this.trailerLimits.maxHeaderCount) {
      throw new BodyError("invalid-chunk", `more than ${this.trailerLimits.maxHeaderCount} trailers`);
    }
    this.trailers.appendSlice(field.name, line, field.valueStart, field.valueEnd);
  }
}

/** Frame one non-empty segment as a chunk */
export function encodeChunk(data: Buffer): Buffer[] {
  return [Buffer.from(`${data.length.toString(16)}\r\n`, "latin1"), data, CRLF];
}

/** Zero-size chunk plus optional trailer section */
export function encodeLastChunk(trailers?: HeaderMap): Buffer {
  if (!trailers || trailers.size === 0) return LAST_CHUNK;
  const parts: Buffer[] = [Buffer.from("0\r\n", "latin1")];
  for (const [name, value] of trailers) {
    parts.push(Buffer.from(`${name}: `, "latin1"), value, CRLF);
  }
  parts.push(CRLF);
  return Buffer.concat(parts);
}

/** Encode a whole body as chunks (one chunk per non-empty segment) */
export function encodeChunked(segments: Iterable<Buffer>, trailers?: HeaderMap): Buffer {
  const parts: Buffer[] = [];
  for (const segment of segments) {
    if (segment.length === 0) continue;
    parts.push(...encodeChunk(segment));
  }
  parts.push(encodeLastChunk(trailers));
  return Buffer.concat(parts);
}

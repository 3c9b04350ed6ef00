import { ParseError } from "../errors.ts";
import { HeadArena } from "./arena.ts";
import { HeaderMap, isTokenByte } from "./header-map.ts";
import {
  NO_BODY,
  type HttpVersion,
  type MessageHead,
  type RequestHead,
  type ResponseHead,
} from "./types.ts";

export const DEFAULT_MAX_HEADER_BYTES = 64 * 1024;
export const DEFAULT_MAX_HEADER_COUNT = 100;

export type ParserLimits = {
  /** max bytes of the whole head (start line, headers, terminator) */
  maxHeaderBytes: number;
  /** max number of header lines */
  maxHeaderCount: number;
};

export const DEFAULT_PARSER_LIMITS: ParserLimits = {
  maxHeaderBytes: DEFAULT_MAX_HEADER_BYTES,
  maxHeaderCount: DEFAULT_MAX_HEADER_COUNT,
};

export type ParseResult<H extends MessageHead> =
  | { type: "need-more" }
  | { type: "parsed"; head: H; leftover: Buffer }
  | { type: "error"; error: ParseError };

export type ParserState = "start-line" | "headers" | "done" | "error";

const CR = 0x0d;
const LF = 0x0a;
const SP = 0x20;
const HTAB = 0x09;

const NEED_MORE = Object.freeze({ type: "need-more" as const });

const VERSION_RE = /^HTTP\/(\d)\.(\d)$/;

type PendingHeader = {
  name: string;
  /** value offsets relative to the head start */
  start: number;
  end: number;
};

function parseVersion(raw: string): HttpVersion {
  const match = VERSION_RE.exec(raw);
  if (!match) {
    throw new ParseError("invalid-start-line", `invalid http version: ${JSON.stringify(raw)}`);
  }
  if (raw === "HTTP/1.1" || raw === "HTTP/1.0") return raw;
  throw new ParseError("unsupported-version", `unsupported http version: ${raw}`);
}

function isFieldValueByte(b: number): boolean {
  return b === HTAB || (b >= SP && b !== 0x7f);
}

export type FieldLine = {
  name: string;
  /** value bounds within the line, optional whitespace trimmed */
  valueStart: number;
  valueEnd: number;
};

/** Split a `name: value` line (without its line terminator) */
export function parseFieldLine(line: Buffer): FieldLine | ParseError {
  const colon = line.indexOf(0x3a);
  if (colon <= 0) {
    return new ParseError("invalid-header-name", "header line without a name");
  }
  for (let i = 0; i < colon; i += 1) {
    if (!isTokenByte(line[i]!)) {
      return new ParseError(
        "invalid-header-name",
        `invalid header name: ${JSON.stringify(line.toString("latin1", 0, colon))}`,
      );
    }
  }

  let valueStart = colon + 1;
  let valueEnd = line.length;
  while (valueStart < valueEnd && (line[valueStart] === SP || line[valueStart] === HTAB)) {
    valueStart += 1;
  }
  while (valueEnd > valueStart && (line[valueEnd - 1] === SP || line[valueEnd - 1] === HTAB)) {
    valueEnd -= 1;
  }
  for (let i = valueStart; i < valueEnd; i += 1) {
    if (!isFieldValueByte(line[i]!)) {
      return new ParseError(
        "invalid-header-value",
        `invalid byte in value of ${line.toString("latin1", 0, colon)}`,
      );
    }
  }

  return { name: line.toString("latin1", 0, colon), valueStart, valueEnd };
}

/**
 * Incremental message head parser
 *
 * Bytes are copied into the connection's head arena once, line by line. A
 * line is only interpreted once its LF has arrived, which makes the result
 * independent of how the input was split into chunks.
 */
abstract class HeadParser<H extends MessageHead> {
  private state_: ParserState = "start-line";
  private failure: ParseError | null = null;
  private lineStart = 0;
  private readonly pending: PendingHeader[] = [];
  protected readonly arena: HeadArena;
  protected readonly limits: ParserLimits;

  constructor(limits: Partial<ParserLimits> = {}, arena = new HeadArena()) {
    this.limits = { ...DEFAULT_PARSER_LIMITS, ...limits };
    this.arena = arena;
    // a previous parser may have been torn down mid-head
    this.arena.discard();
  }

  get state(): ParserState {
    return this.state_;
  }

  /** bytes of the head buffered so far */
  get bufferedBytes() {
    return this.arena.length;
  }

  protected abstract parseStartLine(line: Buffer): void;
  protected abstract skipsLeadingEmptyLines(): boolean;
  protected abstract buildHead(headers: HeaderMap): H;

  feed(chunk: Buffer): ParseResult<H> {
    if (this.state_ === "done") {
      throw new Error("parser already produced a head");
    }
    if (this.failure) return { type: "error", error: this.failure };

    let pos = 0;
    while (pos < chunk.length) {
      const lf = chunk.indexOf(LF, pos);
      const end = lf === -1 ? chunk.length : lf + 1;

      if (this.arena.length + (end - pos) > this.limits.maxHeaderBytes) {
        return this.fail(
          new ParseError(
            "too-large",
            `message head exceeds ${this.limits.maxHeaderBytes} bytes`,
          ),
        );
      }

      this.arena.append(chunk.subarray(pos, end));
      pos = end;
      if (lf === -1) break;

      const outcome = this.processLine(this.lineStart, this.arena.length - 1);
      this.lineStart = this.arena.length;

      if (outcome === "done") {
        return {
          type: "parsed",
          head: this.complete(),
          leftover: chunk.subarray(pos),
        };
      }
      if (outcome) return this.fail(outcome);
    }

    return NEED_MORE;
  }

  /**
   * Signal end of input. Returns null when nothing was buffered (clean end
   * between messages) and an `incomplete` error otherwise.
   */
  finish(): ParseError | null {
    if (this.state_ === "done") return null;
    if (this.failure) return this.failure;
    if (this.state_ === "start-line" && this.arena.length === 0) return null;
    this.fail(new ParseError("incomplete", "connection closed before message head was complete"));
    return this.failure;
  }

  private fail(error: ParseError): { type: "error"; error: ParseError } {
    this.state_ = "error";
    this.failure = error;
    this.arena.discard();
    return { type: "error", error };
  }

  private processLine(start: number, lfIndex: number): ParseError | "done" | null {
    let end = lfIndex;
    if (end > start && this.arena.byteAt(end - 1) === CR) end -= 1;

    const line = this.arena.view().subarray(start, end);
    if (line.includes(CR)) {
      return new ParseError(
        this.state_ === "start-line" ? "invalid-start-line" : "invalid-header-value",
        "bare CR in message head",
      );
    }

    if (this.state_ === "start-line") {
      if (line.length === 0) {
        return this.skipsLeadingEmptyLines()
          ? null
          : new ParseError("invalid-start-line", "empty start line");
      }
      try {
        this.parseStartLine(line);
      } catch (err) {
        if (err instanceof ParseError) return err;
        throw err;
      }
      this.state_ = "headers";
      return null;
    }

    if (line.length === 0) return "done";

    const first = line[0]!;
    if (first === SP || first === HTAB) {
      return new ParseError("invalid-header-value", "obsolete line folding is not allowed");
    }

    const field = parseFieldLine(line);
    if (field instanceof ParseError) return field;

    if (this.pending.length >= this.limits.maxHeaderCount) {
      return new ParseError(
        "too-large",
        `message head has more than ${this.limits.maxHeaderCount} headers`,
      );
    }

    this.pending.push({
      name: field.name,
      start: start + field.valueStart,
      end: start + field.valueEnd,
    });
    return null;
  }

  private complete(): H {
    const source = this.arena.seal();
    const headers = new HeaderMap();
    for (const { name, start, end } of this.pending) {
      headers.appendSlice(name, source, start, end);
    }
    this.state_ = "done";
    return this.buildHead(headers);
  }
}

export class RequestParser extends HeadParser<RequestHead> {
  private method = "";
  private target = "";
  private version: HttpVersion = "HTTP/1.1";

  protected skipsLeadingEmptyLines() {
    return true;
  }

  protected parseStartLine(line: Buffer) {
    const [method, target, version, ...extra] = line.toString("latin1").split(" ");
    if (method === undefined || target === undefined || version === undefined || extra.length > 0) {
      throw new ParseError("invalid-start-line", "malformed request line");
    }

    if (method.length === 0 || ![...method].every((ch) => isTokenByte(ch.charCodeAt(0)))) {
      throw new ParseError("invalid-start-line", "invalid request method");
    }
    if (target.length === 0 || ![...target].every((ch) => ch > " " && ch < "\x7f")) {
      throw new ParseError("invalid-start-line", "invalid request target");
    }

    this.method = method;
    this.target = target;
    this.version = parseVersion(version);
  }

  protected buildHead(headers: HeaderMap): RequestHead {
    return {
      method: this.method,
      target: this.target,
      version: this.version,
      headers,
      body: NO_BODY,
      extensions: new Map(),
    };
  }
}

export class ResponseParser extends HeadParser<ResponseHead> {
  private status = 0;
  private reason = "";
  private version: HttpVersion = "HTTP/1.1";

  protected skipsLeadingEmptyLines() {
    return false;
  }

  protected parseStartLine(line: Buffer) {
    const text = line.toString("latin1");
    const firstSpace = text.indexOf(" ");
    if (firstSpace === -1) {
      throw new ParseError("invalid-start-line", "malformed status line");
    }
    const version = parseVersion(text.slice(0, firstSpace));

    const rest = text.slice(firstSpace + 1);
    const code = rest.slice(0, 3);
    if (!/^[1-9]\d\d$/.test(code) || (rest.length > 3 && rest[3] !== " ")) {
      throw new ParseError("invalid-start-line", "invalid status code");
    }

    const reason = rest.slice(4);
    for (let i = 0; i < reason.length; i += 1) {
      if (!isFieldValueByte(reason.charCodeAt(i))) {
        throw new ParseError("invalid-start-line", "invalid reason phrase");
      }
    }

    this.version = version;
    this.status = Number.parseInt(code, 10);
    this.reason = reason;
  }

  protected buildHead(headers: HeaderMap): ResponseHead {
    return {
      status: this.status,
      reason: this.reason,
      version: this.version,
      headers,
      body: NO_BODY,
    };
  }
}

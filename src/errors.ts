export type ParseErrorKind =
  | "incomplete"
  | "too-large"
  | "invalid-start-line"
  | "invalid-header-name"
  | "invalid-header-value"
  | "unsupported-version";

export type BodyErrorKind =
  | "invalid-framing"
  | "unsupported-transfer-encoding"
  | "invalid-chunk"
  | "chunk-too-large"
  | "incomplete-body"
  | "unsupported-encoding"
  | "invalid-encoding"
  | "decompressed-too-large"
  | "timeout"
  | "payload-overflow"
  | "unexpected-content-type"
  | "undecodable-body"
  | "aborted";

/**
 * Base class for protocol failures that map onto an HTTP error response
 */
export class HttpProtocolError extends Error {
  status: number;
  statusText: string;

  constructor(message: string, status = 400, statusText = "Bad Request") {
    super(message);
    this.name = "HttpProtocolError";
    this.status = status;
    this.statusText = statusText;
  }
}

const PARSE_ERROR_STATUS: Record<ParseErrorKind, [number, string]> = {
  incomplete: [400, "Bad Request"],
  "too-large": [431, "Request Header Fields Too Large"],
  "invalid-start-line": [400, "Bad Request"],
  "invalid-header-name": [400, "Bad Request"],
  "invalid-header-value": [400, "Bad Request"],
  "unsupported-version": [505, "HTTP Version Not Supported"],
};

export class ParseError extends HttpProtocolError {
  readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, message: string = kind) {
    const [status, statusText] = PARSE_ERROR_STATUS[kind];
    super(message, status, statusText);
    this.name = "ParseError";
    this.kind = kind;
  }
}

const BODY_ERROR_STATUS: Record<BodyErrorKind, [number, string]> = {
  "invalid-framing": [400, "Bad Request"],
  "unsupported-transfer-encoding": [501, "Not Implemented"],
  "invalid-chunk": [400, "Bad Request"],
  "chunk-too-large": [413, "Payload Too Large"],
  "incomplete-body": [400, "Bad Request"],
  "unsupported-encoding": [415, "Unsupported Media Type"],
  "invalid-encoding": [400, "Bad Request"],
  "decompressed-too-large": [413, "Payload Too Large"],
  timeout: [408, "Request Timeout"],
  "payload-overflow": [413, "Payload Too Large"],
  "unexpected-content-type": [400, "Bad Request"],
  "undecodable-body": [400, "Bad Request"],
  aborted: [400, "Bad Request"],
};

export class BodyError extends HttpProtocolError {
  readonly kind: BodyErrorKind;

  constructor(kind: BodyErrorKind, message: string = kind) {
    const [status, statusText] = BODY_ERROR_STATUS[kind];
    super(message, status, statusText);
    this.name = "BodyError";
    this.kind = kind;
  }
}

/** Thrown by the validated-text header accessors; a peer sent bytes we cannot read as text */
export class HeaderEncodingError extends HttpProtocolError {
  readonly header: string;

  constructor(header: string) {
    super(`header ${header} is not representable as text`, 400, "Bad Request");
    this.name = "HeaderEncodingError";
    this.header = header;
  }
}

export function isHttpProtocolError(err: unknown): err is HttpProtocolError {
  return err instanceof HttpProtocolError;
}

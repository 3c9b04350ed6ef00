import { EventEmitter } from "events";

import { resolveEngineOptions, type EngineOptions, type ResolvedEngineOptions } from "../config.ts";
import { stripTrailingNewline, type DebugFlag } from "../debug.ts";
import { BodyError, HttpProtocolError, isHttpProtocolError } from "../errors.ts";
import { HeadArena } from "../http/arena.ts";
import { BodyDecoder, requestBodyLength } from "../http/body.ts";
import { BodyStream, IterableBody, type BodySource } from "../http/body-stream.ts";
import type { DecodeOutput } from "../http/chunked.ts";
import {
  compressBody,
  contentCodingsOf,
  decompressBody,
  negotiateContentEncoding,
} from "../http/compression.ts";
import {
  bodyChunks,
  encodeResponseHead,
  frameResponse,
  releaseBody,
  writeFramedBody,
  type FramedResponse,
} from "../http/encoder.ts";
import { HeaderMap } from "../http/header-map.ts";
import { RequestParser } from "../http/parser.ts";
import { isNoBodyStatus, type RequestHead } from "../http/types.ts";
import { createDeferred, type AsyncSemaphore, type Deferred } from "../utils/async.ts";
import type { Handler, IncomingRequest, OutgoingResponse, UpgradeTunnel } from "./handler.ts";
import { ConnectionStateMachine, type ConnectionState } from "./state.ts";
import type { Transport } from "./transport.ts";

const CONTINUE = Buffer.from("HTTP/1.1 100 Continue\r\n\r\n", "latin1");
const EMPTY = Buffer.alloc(0);
const INTERNAL_ERROR = new HttpProtocolError("Internal Server Error", 500, "Internal Server Error");

export type ConnectionOptions = EngineOptions & {
  /** shared bound on handlers running at once */
  handlerSemaphore?: AsyncSemaphore;
};

export type PolicyViolation = {
  status: number;
  method: string;
  target: string;
  reason: string;
};

type Exchange = {
  id: number;
  /** null for a connection-level error that never produced a head */
  head: RequestHead | null;
  stream: BodyStream | null;
  /** null when the exchange failed before reaching the handler */
  response: Promise<OutgoingResponse> | null;
  failure: Deferred<HttpProtocolError>;
  failed: HttpProtocolError | null;
  keepAlive: boolean;
  expectsContinue: boolean;
  continueWanted: boolean;
  continueSent: boolean;
  /** CONNECT or an Upgrade request: input is held until the response decides */
  upgrade: boolean;
  responseStarted: boolean;
};

type ReadMode =
  | { kind: "head"; parser: RequestParser }
  | { kind: "body"; exchange: Exchange; decoder: BodyDecoder }
  | { kind: "held" }
  | { kind: "stopped" };

type TimerKind = "header" | "body" | "keep-alive" | "shutdown";

type PreparedResponse = {
  framed: FramedResponse;
  keepAlive: boolean;
  headBytes: Buffer;
};

type Outcome =
  | { kind: "response"; response: OutgoingResponse }
  | { kind: "error"; error: HttpProtocolError };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function toProtocolError(err: unknown): HttpProtocolError {
  if (isHttpProtocolError(err)) return err;
  return new BodyError("invalid-framing", toError(err).message);
}

function requestKeepAlive(head: RequestHead): boolean {
  const tokens = head.headers.tokens("connection");
  if (head.version === "HTTP/1.0") return tokens.includes("keep-alive");
  return !tokens.includes("close");
}

function isUpgradeRequest(head: RequestHead): boolean {
  if (head.method === "CONNECT") return true;
  return head.headers.has("upgrade") && head.headers.tokens("connection").includes("upgrade");
}

/**
 * One HTTP/1.x connection over a transport
 *
 * Input arrives through `receive()` / `receiveEnd()`; heads are parsed and
 * dispatched to the handler as they complete (pipelining), while responses
 * are written strictly in request order.
 *
 * Events: `debug` (component, message), `log` (string), `policy-violation`
 * (PolicyViolation), `close` (error?).
 */
export class HttpConnection extends EventEmitter {
  private readonly options: ResolvedEngineOptions;
  private readonly debugFlags: ReadonlySet<DebugFlag>;
  private readonly semaphore: AsyncSemaphore | null;
  private readonly machine = new ConnectionStateMachine();
  private readonly arena = new HeadArena();
  private readonly queue: Exchange[] = [];
  private readonly timers = new Map<TimerKind, NodeJS.Timeout>();
  private readonly closedDeferred = createDeferred<void>();

  private read: ReadMode;
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private nextId = 1;
  private pumping = false;
  private writing = false;
  private paused = false;
  private bodyBackpressure = false;
  private tunnelBackpressure = false;
  private tunnelInput: BodyStream | null = null;
  private peerEnded = false;
  private draining = false;

  /** resolves once the connection reached `closed` */
  readonly closed: Promise<void> = this.closedDeferred.promise;

  constructor(
    private readonly transport: Transport,
    private readonly handler: Handler,
    options: ConnectionOptions = {},
  ) {
    super();
    this.options = resolveEngineOptions(options);
    this.debugFlags = new Set(this.options.debug);
    this.semaphore = options.handlerSemaphore ?? null;
    this.read = { kind: "head", parser: this.newParser() };

    this.machine.onTransition((from, to) => this.onTransition(from, to));
    this.armTimer("header", this.options.headerReadTimeoutMs, () => this.onHeaderTimeout());
  }

  get state(): ConnectionState {
    return this.machine.state;
  }

  /** dispatched requests whose responses are not written yet */
  get inFlight() {
    return this.queue.length;
  }

  receive(chunk: Buffer) {
    if (chunk.length === 0 || this.machine.state === "closed") return;

    if (this.tunnelInput) {
      if (!this.tunnelInput.push(chunk)) {
        this.tunnelBackpressure = true;
        this.updateFlow();
      }
      return;
    }
    if (this.read.kind === "stopped") return;

    this.pending.push(chunk);
    this.pendingBytes += chunk.length;
    this.pump();
  }

  /** The peer finished sending */
  receiveEnd() {
    if (this.peerEnded || this.machine.state === "closed") return;
    this.peerEnded = true;
    this.emitDebug("conn", "peer ended input");

    if (this.tunnelInput) {
      this.tunnelInput.end();
      return;
    }
    this.pump();
  }

  /**
   * Stop taking new requests, let in-flight exchanges finish within
   * `shutdownGraceMs`, then close.
   */
  shutdown(): Promise<void> {
    if (this.machine.state === "closed") return this.closed;
    this.draining = true;
    this.emitDebug("conn", "shutdown requested");

    if (this.read.kind === "head" || this.read.kind === "held") {
      this.stopReading();
    }
    if (this.queue.length === 0 && this.machine.speaksHttp) {
      this.close();
      return this.closed;
    }
    this.armTimer("shutdown", this.options.shutdownGraceMs, () => {
      this.abort(new Error("shutdown grace period elapsed"));
    });
    return this.closed;
  }

  /** Graceful close: flush what was written, then end the transport */
  close() {
    if (this.machine.state === "closing" || this.machine.state === "closed") return;
    this.machine.transition("closing");
    this.teardown(new BodyError("aborted", "connection closed"));
    this.transport.end();
    this.finishClose(null);
  }

  /** Hard close after an I/O or internal error */
  abort(error: Error) {
    if (this.machine.state === "closed") return;
    this.emitDebug("conn", `aborting: ${error.message}`);
    if (this.machine.state !== "closing") this.machine.transition("closing");
    this.teardown(new BodyError("aborted", error.message));
    this.transport.destroy();
    this.finishClose(error);
  }

  private emitDebug(component: DebugFlag, message: string) {
    if (!this.debugFlags.has(component)) return;
    const normalized = stripTrailingNewline(message);
    this.emit("debug", component, normalized);
    // Legacy string log event
    this.emit("log", `[${component}] ${normalized}`);
  }

  private newParser() {
    return new RequestParser(
      {
        maxHeaderBytes: this.options.maxHeaderBytes,
        maxHeaderCount: this.options.maxHeaderCount,
      },
      this.arena,
    );
  }

  // ---------------------------------------------------------------------------
  // input

  private pump() {
    if (this.pumping) return;
    this.pumping = true;
    try {
      while (this.pending.length > 0) {
        const mode = this.read;
        if (mode.kind === "stopped") {
          this.pending = [];
          this.pendingBytes = 0;
          break;
        }
        if (mode.kind === "held") break;
        if (mode.kind === "head" && this.queue.length >= this.options.maxPipelinedRequests) break;

        const chunk = this.pending.shift();
        if (!chunk) break;
        this.pendingBytes -= chunk.length;

        const rest = mode.kind === "head" ? this.feedHead(mode.parser, chunk) : this.feedBody(mode, chunk);
        if (rest.length > 0) {
          this.pending.unshift(rest);
          this.pendingBytes += rest.length;
        }
      }
    } finally {
      this.pumping = false;
    }

    if (this.pendingBytes > this.options.maxPipelineBytes) {
      this.emitDebug(
        "conn",
        `held input exceeds ${this.options.maxPipelineBytes} bytes, closing after queued responses`,
      );
      this.stopReading();
    }
    if (this.peerEnded && this.pending.length === 0) this.onInputEnd();
    this.updateFlow();
  }

  private feedHead(parser: RequestParser, chunk: Buffer): Buffer {
    if (this.machine.state === "idle" || this.machine.state === "keep-alive-wait") {
      this.machine.transition("reading-head");
    }

    const result = parser.feed(chunk);
    switch (result.type) {
      case "need-more":
        return EMPTY;
      case "error":
        this.emitDebug("parser", `rejected head: ${result.error.message}`);
        this.failConnection(result.error);
        return EMPTY;
      case "parsed":
        this.startExchange(result.head);
        return result.leftover;
    }
  }

  private feedBody(mode: { exchange: Exchange; decoder: BodyDecoder }, chunk: Buffer): Buffer {
    const { exchange, decoder } = mode;
    const stream = exchange.stream;
    if (!stream) return EMPTY;

    let output: DecodeOutput;
    try {
      output = decoder.feed(chunk);
    } catch (err) {
      this.failBody(exchange, toProtocolError(err));
      return EMPTY;
    }

    for (const piece of output.chunks) {
      if (!stream.push(piece)) this.bodyBackpressure = true;
    }

    if (output.done) {
      this.clearTimer("body");
      stream.end();
      this.afterBody(exchange);
      return output.leftover;
    }
    this.armBodyTimer(exchange);
    return EMPTY;
  }

  private onInputEnd() {
    const mode = this.read;
    switch (mode.kind) {
      case "head": {
        const error = mode.parser.finish();
        if (error) {
          this.emitDebug("parser", error.message);
          this.failConnection(error);
        } else {
          this.stopReading();
        }
        break;
      }
      case "body": {
        try {
          mode.decoder.finish();
          mode.exchange.stream?.end();
          this.stopReading();
        } catch (err) {
          this.failBody(mode.exchange, toProtocolError(err));
        }
        break;
      }
      case "held":
        // buffered bytes after an upgrade request may still belong to the tunnel
        break;
      case "stopped":
        break;
    }

    if (this.queue.length === 0 && !this.writing && this.machine.speaksHttp) this.close();
  }

  private startExchange(head: RequestHead) {
    const id = this.nextId++;
    this.emitDebug("parser", `#${id} ${head.method} ${head.target} ${head.version}`);

    try {
      head.body = requestBodyLength(head);
    } catch (err) {
      this.emitDebug("codec", `#${id} invalid framing: ${toError(err).message}`);
      this.failConnection(toProtocolError(err));
      return;
    }

    const exchange: Exchange = {
      id,
      head,
      stream: null,
      response: null,
      failure: createDeferred<HttpProtocolError>(),
      failed: null,
      keepAlive: requestKeepAlive(head),
      expectsContinue: false,
      continueWanted: false,
      continueSent: false,
      upgrade: isUpgradeRequest(head),
      responseStarted: false,
    };

    let early: HttpProtocolError | null = null;
    const expectations = head.headers.tokens("expect");
    if (head.version === "HTTP/1.1" && expectations.length > 0) {
      if (expectations.every((token) => token === "100-continue")) {
        exchange.expectsContinue = head.body.kind !== "none";
      } else {
        early = new HttpProtocolError(
          `unsupported expectation: ${expectations.join(", ")}`,
          417,
          "Expectation Failed",
        );
      }
    }

    const stream = new BodyStream({
      length: head.body,
      highWaterBytes: this.options.bodyHighWaterBytes,
      onDemand: () => this.onBodyDemand(exchange),
      onDrain: () => {
        this.bodyBackpressure = false;
        this.updateFlow();
      },
    });
    exchange.stream = stream;

    const decoder = new BodyDecoder(head.body, {
      maxChunkSize: this.options.maxChunkSize,
      trailerLimits: {
        maxHeaderBytes: this.options.maxHeaderBytes,
        maxHeaderCount: this.options.maxHeaderCount,
      },
    });

    let body: BodySource = stream;
    if (!early && this.options.decompressRequests && head.headers.has("content-encoding")) {
      try {
        const codings = contentCodingsOf(head.headers.tokens("content-encoding"));
        if (codings.length > 0) {
          body = new IterableBody(
            decompressBody(stream, codings, this.options.maxDecompressedBytes),
          );
          this.emitDebug("codec", `#${id} decoding ${codings.join(", ")}`);
        }
      } catch (err) {
        early = toProtocolError(err);
      }
    }

    const request: IncomingRequest = {
      head,
      body,
      trailers: decoder.trailers ?? new HeaderMap(),
    };

    this.queue.push(exchange);
    if (this.machine.state === "reading-head") this.machine.transition("awaiting-body");

    if (early) {
      this.failExchange(exchange, early);
    } else {
      exchange.response = this.runHandler(exchange, request);
    }

    if (head.body.kind === "none") {
      stream.end();
      this.afterBody(exchange);
    } else {
      this.read = { kind: "body", exchange, decoder };
      this.armBodyTimer(exchange);
    }
    this.kickWriter();
  }

  private afterBody(exchange: Exchange) {
    if (!exchange.keepAlive || this.draining) {
      this.stopReading();
    } else if (exchange.upgrade) {
      this.read = { kind: "held" };
    } else {
      this.readHeads();
    }
  }

  /** Switch input to request heads, timing the head when one is due now */
  private readHeads() {
    this.read = { kind: "head", parser: this.newParser() };
    if (this.machine.state === "reading-head") this.armHeaderTimer();
  }

  private stopReading() {
    this.read = { kind: "stopped" };
    this.pending = [];
    this.pendingBytes = 0;
    this.clearTimer("header");
    this.clearTimer("body");
  }

  /** A protocol error outside any exchange: answer it (in order), then close */
  private failConnection(error: HttpProtocolError) {
    this.stopReading();
    const exchange: Exchange = {
      id: this.nextId++,
      head: null,
      stream: null,
      response: null,
      failure: createDeferred<HttpProtocolError>(),
      failed: null,
      keepAlive: false,
      expectsContinue: false,
      continueWanted: false,
      continueSent: false,
      upgrade: false,
      responseStarted: false,
    };
    this.failExchange(exchange, error);
    this.queue.push(exchange);
    this.kickWriter();
  }

  private failBody(exchange: Exchange, error: HttpProtocolError) {
    this.emitDebug("codec", `#${exchange.id} body failed: ${error.message}`);
    exchange.stream?.fail(error);
    this.failExchange(exchange, error);
    this.stopReading();
  }

  private failExchange(exchange: Exchange, error: HttpProtocolError) {
    exchange.keepAlive = false;
    if (exchange.failed || exchange.responseStarted) return;
    exchange.failed = error;
    exchange.failure.resolve(error);
  }

  private onBodyDemand(exchange: Exchange) {
    if (!exchange.expectsContinue || exchange.continueSent) return;
    exchange.continueWanted = true;
    if (this.queue[0] === exchange && !exchange.responseStarted) {
      this.sendContinue(exchange).catch((err) => this.abort(toError(err)));
    }
  }

  private async sendContinue(exchange: Exchange) {
    if (exchange.continueSent || exchange.stream?.settled) return;
    exchange.continueSent = true;
    this.emitDebug("conn", `#${exchange.id} 100 continue`);
    await this.transport.write(CONTINUE);
  }

  private async runHandler(exchange: Exchange, request: IncomingRequest): Promise<OutgoingResponse> {
    const release = this.semaphore ? await this.semaphore.acquire() : null;
    try {
      // never run handler code synchronously inside receive()
      if (!release) await Promise.resolve();
      return await this.handler(request);
    } catch (err) {
      if (isHttpProtocolError(err)) {
        this.emitDebug("conn", `#${exchange.id} handler rejected request: ${err.message}`);
        return this.errorResponse(err);
      }
      this.emitDebug("conn", `#${exchange.id} handler failed: ${toError(err).message}`);
      return this.errorResponse(INTERNAL_ERROR);
    } finally {
      release?.();
    }
  }

  private errorResponse(error: HttpProtocolError): OutgoingResponse {
    return {
      status: error.status,
      reason: error.statusText,
      headers: {
        "content-type": "text/plain; charset=utf-8",
        connection: "close",
      },
      body: `${error.message}\n`,
    };
  }

  // ---------------------------------------------------------------------------
  // output

  private kickWriter() {
    if (this.writing || !this.machine.speaksHttp) return;
    this.writing = true;
    this.writeLoop().catch((err) => {
      this.writing = false;
      this.abort(toError(err));
    });
  }

  private async writeLoop() {
    while (this.machine.speaksHttp) {
      const exchange = this.queue[0];
      if (!exchange) break;
      if (!(await this.respond(exchange))) break;
    }
    this.writing = false;
    if (this.queue.length === 0 && this.read.kind === "stopped" && this.machine.speaksHttp) {
      this.close();
    }
  }

  private async awaitOutcome(exchange: Exchange): Promise<Outcome> {
    if (exchange.failed) return { kind: "error", error: exchange.failed };
    if (!exchange.response) return { kind: "error", error: await exchange.failure.promise };
    if (exchange.continueWanted) await this.sendContinue(exchange);
    return Promise.race([
      exchange.response.then((response): Outcome => ({ kind: "response", response })),
      exchange.failure.promise.then((error): Outcome => ({ kind: "error", error })),
    ]);
  }

  /** Write one response; returns whether the writer should go on */
  private async respond(exchange: Exchange): Promise<boolean> {
    const outcome = await this.awaitOutcome(exchange);
    if (!this.machine.speaksHttp) return false;

    const head = exchange.head;
    let response: OutgoingResponse;
    if (outcome.kind === "error") {
      exchange.keepAlive = false;
      response = this.errorResponse(outcome.error);
    } else {
      response = outcome.response;
    }

    const upgradeCallback = response.upgrade;
    const opensTunnel =
      response.status === 101 ||
      (head?.method === "CONNECT" && response.status >= 200 && response.status < 300);
    const upgrading = head !== null && exchange.upgrade && opensTunnel && upgradeCallback !== undefined;

    if (opensTunnel && !upgrading) {
      this.emitDebug("conn", `#${exchange.id} ${response.status} without an upgrade`);
      exchange.keepAlive = false;
      response = this.errorResponse(INTERNAL_ERROR);
    }

    let prepared: PreparedResponse;
    try {
      prepared = await this.prepare(exchange, response, upgrading);
    } catch (err) {
      this.emitDebug("codec", `#${exchange.id} cannot encode response: ${toError(err).message}`);
      exchange.keepAlive = false;
      prepared = await this.prepare(exchange, this.errorResponse(INTERNAL_ERROR), false);
    }
    const { framed, keepAlive } = prepared;

    if (!this.machine.speaksHttp) return false;
    if (this.machine.state !== "writing-response") this.machine.transition("writing-response");

    exchange.responseStarted = true;
    this.emitDebug(
      "conn",
      `#${exchange.id} ${framed.head.status} ${framed.head.body.kind}${keepAlive ? "" : " close"}`,
    );

    try {
      await this.transport.write(prepared.headBytes);
      await writeFramedBody(framed, (chunk) => this.transport.write(chunk));
    } catch (err) {
      this.abort(toError(err));
      return false;
    }

    if (upgrading && head && upgradeCallback) {
      this.queue.shift();
      this.startTunnel(head, upgradeCallback);
      return false;
    }

    return this.finishExchange(exchange, keepAlive);
  }

  /** Frame the response and settle its Connection header */
  private async prepare(
    exchange: Exchange,
    init: OutgoingResponse,
    upgrading: boolean,
  ): Promise<PreparedResponse> {
    const head = exchange.head;
    const response = head && !upgrading ? this.maybeCompress(head, init) : init;

    const framed = await frameResponse(response, {
      requestMethod: head?.method ?? "GET",
      requestVersion: head?.version ?? "HTTP/1.1",
      smallBodyLimit: this.options.smallBodyLimit,
    });

    if (framed.droppedBody) {
      const violation: PolicyViolation = {
        status: framed.head.status,
        method: head?.method ?? "",
        target: head?.target ?? "",
        reason: `body not allowed with status ${framed.head.status}`,
      };
      this.emitDebug("codec", `#${exchange.id} dropped response body: ${violation.reason}`);
      this.emit("policy-violation", violation);
    }
    if (framed.body === null) {
      releaseBody(response.body).catch((err: unknown) => {
        this.emitDebug("codec", `#${exchange.id} releasing dropped body failed: ${toError(err).message}`);
      });
    }

    const lastExchange = this.queue.length === 1 && (this.read.kind === "stopped" || this.draining);
    // the client may still be waiting for permission to send the body
    const bodyWithheld =
      exchange.expectsContinue && !exchange.continueSent && exchange.stream?.settled === false;
    const keepAlive =
      !upgrading &&
      exchange.keepAlive &&
      !lastExchange &&
      !bodyWithheld &&
      !framed.head.headers.tokens("connection").includes("close") &&
      framed.head.body.kind !== "until-close";

    if (!upgrading) {
      if (!keepAlive) {
        framed.head.headers.set("connection", "close");
      } else if (head?.version === "HTTP/1.0") {
        framed.head.headers.set("connection", "keep-alive");
      }
    }

    return { framed, keepAlive, headBytes: encodeResponseHead(framed.head) };
  }

  private maybeCompress(head: RequestHead, response: OutgoingResponse): OutgoingResponse {
    if (!this.options.compressResponses) return response;
    if (response.body === undefined || response.body === null) return response;
    if (isNoBodyStatus(response.status) || head.method === "HEAD") return response;

    const headers = HeaderMap.from(response.headers);
    if (headers.has("content-encoding")) return response;

    const coding = negotiateContentEncoding(head.headers.get("accept-encoding")?.toString("latin1"));
    if (coding === null || coding === "identity") return response;

    headers.set("content-encoding", coding);
    headers.append("vary", "accept-encoding");
    headers.delete("content-length");
    this.emitDebug("codec", `compressing response with ${coding}`);
    return { ...response, headers, body: compressBody(bodyChunks(response.body), coding) };
  }

  private finishExchange(exchange: Exchange, keepAlive: boolean): boolean {
    this.queue.shift();

    if (!keepAlive) {
      this.close();
      return false;
    }

    const stream = exchange.stream;
    if (stream && !stream.settled) {
      this.emitDebug("conn", `#${exchange.id} discarding unread request body`);
      stream.discard();
      this.bodyBackpressure = false;
    }

    if (this.read.kind === "held") this.readHeads();

    const mode = this.read;
    if (this.queue.length > 0) {
      this.machine.transition("awaiting-body");
    } else if (mode.kind === "stopped") {
      this.close();
      return false;
    } else if (mode.kind !== "head" || this.pending.length > 0 || mode.parser.bufferedBytes > 0) {
      this.machine.transition("reading-head");
    } else {
      this.machine.transition("keep-alive-wait");
    }

    this.pump();
    return this.machine.speaksHttp;
  }

  private startTunnel(
    head: RequestHead,
    upgrade: NonNullable<OutgoingResponse["upgrade"]>,
  ) {
    this.machine.transition("upgraded");
    this.emitDebug("conn", `upgraded (${head.method} ${head.target})`);

    const inbound = new BodyStream({
      length: { kind: "until-close" },
      highWaterBytes: this.options.bodyHighWaterBytes,
      onDrain: () => {
        this.tunnelBackpressure = false;
        this.updateFlow();
      },
    });
    this.tunnelInput = inbound;

    // bytes that followed the request head belong to the new protocol
    for (const chunk of this.pending) {
      if (!inbound.push(chunk)) this.tunnelBackpressure = true;
    }
    this.pending = [];
    this.pendingBytes = 0;
    this.read = { kind: "stopped" };
    if (this.peerEnded) inbound.end();
    this.updateFlow();

    const tunnel: UpgradeTunnel = {
      read: () => inbound.read(),
      [Symbol.asyncIterator]: () => inbound[Symbol.asyncIterator](),
      write: (chunk) =>
        this.transport.write(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk),
      end: () => this.close(),
      destroy: (error) => this.abort(error ?? new Error("tunnel destroyed")),
    };

    Promise.resolve()
      .then(() => upgrade(tunnel, head))
      .then(
        () => this.close(),
        (err) => this.abort(toError(err)),
      );
  }

  // ---------------------------------------------------------------------------
  // flow control and timers

  private updateFlow() {
    const held =
      this.pending.length > 0 &&
      (this.read.kind === "held" ||
        (this.read.kind === "head" && this.queue.length >= this.options.maxPipelinedRequests));
    if (!this.machine.speaksHttp && this.machine.state !== "upgraded") return;
    const shouldPause = this.bodyBackpressure || this.tunnelBackpressure || held;

    if (shouldPause === this.paused) return;
    this.paused = shouldPause;
    if (shouldPause) {
      this.emitDebug("conn", "pausing input");
      this.clearTimer("body");
      this.transport.pause();
    } else {
      this.emitDebug("conn", "resuming input");
      if (this.read.kind === "body") this.armBodyTimer(this.read.exchange);
      this.transport.resume();
    }
  }

  private onTransition(from: ConnectionState, to: ConnectionState) {
    this.emitDebug("conn", `${from} -> ${to}`);
    if (from === "keep-alive-wait") this.clearTimer("keep-alive");

    switch (to) {
      case "reading-head":
        // a discarded body still being read arms it once the body ends
        if (this.read.kind === "head") this.armHeaderTimer();
        break;
      case "awaiting-body":
        this.clearTimer("header");
        break;
      case "keep-alive-wait":
        this.clearTimer("header");
        this.armTimer("keep-alive", this.options.keepAliveTimeoutMs, () => {
          this.emitDebug("conn", "keep-alive timeout");
          this.close();
        });
        break;
      case "upgraded":
        this.clearTimer("header");
        this.clearTimer("body");
        break;
      default:
        break;
    }
  }

  private onHeaderTimeout() {
    this.timers.delete("header");
    const mode = this.read;
    if (mode.kind !== "head") return;

    const started = mode.parser.bufferedBytes > 0 || this.pending.length > 0;
    this.emitDebug("conn", "timed out reading request head");
    if (this.queue.length > 0) {
      this.stopReading();
      return;
    }
    if (!started) {
      this.close();
      return;
    }
    this.failConnection(new HttpProtocolError("timed out reading request head", 408, "Request Timeout"));
  }

  private armHeaderTimer() {
    if (this.timers.has("header")) return;
    this.armTimer("header", this.options.headerReadTimeoutMs, () => this.onHeaderTimeout());
  }

  private armBodyTimer(exchange: Exchange) {
    if (this.paused) return;
    this.armTimer("body", this.options.bodyReadTimeoutMs, () => {
      this.timers.delete("body");
      this.failBody(exchange, new BodyError("timeout", "timed out reading request body"));
    });
  }

  private armTimer(kind: TimerKind, ms: number, fn: () => void) {
    this.clearTimer(kind);
    const timer = setTimeout(fn, ms);
    timer.unref();
    this.timers.set(kind, timer);
  }

  private clearTimer(kind: TimerKind) {
    const timer = this.timers.get(kind);
    if (!timer) return;
    clearTimeout(timer);
    this.timers.delete(kind);
  }

  private teardown(error: BodyError) {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();

    for (const exchange of this.queue) {
      exchange.stream?.fail(error);
      exchange.failure.resolve(error);
    }
    this.queue.length = 0;
    if (this.read.kind === "body") this.read.exchange.stream?.fail(error);
    this.tunnelInput?.fail(error);

    this.read = { kind: "stopped" };
    this.pending = [];
    this.pendingBytes = 0;
  }

  private finishClose(error: Error | null) {
    this.machine.transition("closed");
    this.emit("close", error ?? undefined);
    this.closedDeferred.resolve();
  }
}

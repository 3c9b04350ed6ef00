import { EventEmitter } from "events";
import net from "net";

import { resolveEngineOptions, type EngineOptions, type ResolvedEngineOptions } from "./config.ts";
import { HttpConnection, type PolicyViolation } from "./connection/connection.ts";
import type { Handler } from "./connection/handler.ts";
import { socketTransport } from "./connection/transport.ts";
import { stripTrailingNewline, type DebugFlag } from "./debug.ts";
import { AsyncSemaphore } from "./utils/async.ts";

/**
 * Accepts TCP connections and runs one `HttpConnection` per socket
 *
 * Handler work is bounded across all connections by `maxConcurrentHandlers`.
 */
export class HttpServer extends EventEmitter {
  private readonly options: ResolvedEngineOptions;
  private readonly debugFlags: ReadonlySet<DebugFlag>;
  private readonly semaphore: AsyncSemaphore;
  private readonly connections = new Set<HttpConnection>();
  private server: net.Server | null = null;
  private closing = false;

  constructor(
    private readonly handler: Handler,
    options: EngineOptions = {},
  ) {
    super();
    this.options = resolveEngineOptions(options);
    this.debugFlags = new Set(this.options.debug);
    this.semaphore = new AsyncSemaphore(this.options.maxConcurrentHandlers);

    // keep stray socket errors from crashing the process
    this.on("error", (err: Error) => this.emitDebug("server", `error: ${err.message}`));
  }

  get connectionCount() {
    return this.connections.size;
  }

  private emitDebug(component: DebugFlag, message: string) {
    if (!this.debugFlags.has(component)) return;
    const normalized = stripTrailingNewline(message);
    this.emit("debug", component, normalized);
    // Legacy string log event
    this.emit("log", `[${component}] ${normalized}`);
  }

  async listen(port = 0, host = "127.0.0.1"): Promise<net.AddressInfo> {
    if (this.server) throw new Error("server is already listening");

    const server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.handleSocket(socket);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    server.on("error", (err) => this.emit("error", err));

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server is not bound to a TCP port");
    }
    this.emitDebug("server", `listening on ${address.address}:${address.port}`);
    return address;
  }

  address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== "string" ? address : null;
  }

  /** Serve an already accepted socket */
  handleSocket(socket: net.Socket): HttpConnection {
    const connection = new HttpConnection(socketTransport(socket), this.handler, {
      ...this.options,
      handlerSemaphore: this.semaphore,
    });
    this.connections.add(connection);
    this.emitDebug("server", `accepted ${socket.remoteAddress ?? "?"}:${socket.remotePort ?? 0}`);

    connection.on("debug", (component: DebugFlag, message: string) => {
      this.emit("debug", component, message);
    });
    connection.on("log", (line: string) => this.emit("log", line));
    connection.on("policy-violation", (violation: PolicyViolation) => this.emit("policy-violation", violation));
    connection.on("close", () => {
      this.connections.delete(connection);
    });

    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => connection.receive(chunk));
    socket.on("end", () => connection.receiveEnd());
    socket.on("error", (err) => {
      this.emitDebug("server", `socket error: ${err.message}`);
      connection.abort(err);
    });
    socket.on("close", () => connection.abort(new Error("socket closed")));

    if (this.closing) void connection.shutdown();
    return connection;
  }

  /** Stop accepting, let open connections drain, then resolve */
  async close(): Promise<void> {
    this.closing = true;
    const server = this.server;
    this.server = null;

    const stopped = server
      ? new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        })
      : Promise.resolve();

    await Promise.all(Array.from(this.connections, (connection) => connection.shutdown()));
    await stopped;
    this.emitDebug("server", "closed");
  }
}

export function createServer(handler: Handler, options: EngineOptions = {}): HttpServer {
  return new HttpServer(handler, options);
}

import { setTimeout as delay } from "node:timers/promises";

import { HttpConnection, type ConnectionOptions } from "../../src/connection/connection.ts";
import type { Handler } from "../../src/connection/handler.ts";
import { MemoryTransport } from "../../src/testing.ts";

export type OpenConnection = {
  connection: HttpConnection;
  transport: MemoryTransport;
  send: (data: string | Buffer) => void;
};

/** A connection over a MemoryTransport, fed by hand */
export function openConnection(handler: Handler, options: ConnectionOptions = {}): OpenConnection {
  const transport = new MemoryTransport();
  const connection = new HttpConnection(transport, handler, options);
  return {
    connection,
    transport,
    send: (data) => connection.receive(typeof data === "string" ? Buffer.from(data, "latin1") : data),
  };
}

/**
 * Poll until `predicate` holds. The poll timer keeps the event loop alive
 * while the engine's own (unref'd) timers are pending.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await delay(2);
  }
}

/** Await `promise`, failing after `ms` */
export async function within<T>(promise: Promise<T>, ms = 2000): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** A promise the test resolves by hand */
export function gate(): { promise: Promise<void>; open: () => void } {
  let open = () => {};
  const promise = new Promise<void>((resolve) => {
    open = () => resolve();
  });
  return { promise, open };
}

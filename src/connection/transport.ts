import type net from "net";

/**
 * Bidirectional byte channel a connection writes to.
 *
 * Input flows the other way, through `HttpConnection.receive()` and
 * `HttpConnection.receiveEnd()`.
 */
export interface Transport {
  /** resolves once the channel can take more data */
  write(chunk: Buffer): Promise<void>;
  /** flush and half-close the write side */
  end(): void;
  destroy(error?: Error): void;
  /** stop delivering input */
  pause(): void;
  resume(): void;
}

export function socketTransport(socket: net.Socket): Transport {
  let waiters: Array<{ resolve: () => void; reject: (err: Error) => void }> = [];

  const flushWaiters = (err?: Error) => {
    const pending = waiters;
    waiters = [];
    for (const waiter of pending) {
      if (err) waiter.reject(err);
      else waiter.resolve();
    }
  };

  socket.on("drain", () => flushWaiters());
  socket.on("close", () => flushWaiters(new Error("socket closed")));

  return {
    write(chunk) {
      if (socket.destroyed || !socket.writable) {
        return Promise.reject(new Error("socket is not writable"));
      }
      if (socket.write(chunk)) return Promise.resolve();
      return new Promise<void>((resolve, reject) => {
        waiters.push({ resolve, reject });
      });
    },
    end() {
      // drop the read side too once everything written was flushed
      if (!socket.destroyed) socket.end(() => socket.destroy());
    },
    destroy(error) {
      socket.destroy(error);
    },
    pause() {
      socket.pause();
    },
    resume() {
      socket.resume();
    },
  };
}

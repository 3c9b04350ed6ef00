import { BodyError } from "../errors.ts";
import { sizeHintOf, type SizeHint } from "./body.ts";
import type { BodyLength } from "./types.ts";

export const DEFAULT_BODY_HIGH_WATER_BYTES = 64 * 1024;

/**
 * Narrow capability handed to body consumers: pull the next chunk, or ask
 * how many bytes may follow. Single consumption.
 */
export interface BodySource extends AsyncIterable<Buffer> {
  /** next chunk, or null once the body ended */
  read(): Promise<Buffer | null>;
  readonly sizeHint: SizeHint;
}

export type BodyStreamOptions = {
  length: BodyLength;
  /** queued bytes at which the producer is told to pause */
  highWaterBytes?: number;
  /** called once, on the first read (used for 100-continue) */
  onDemand?: () => void;
  /** called when the queue drains below the high water mark after being full */
  onDrain?: () => void;
};

type Waiter = {
  resolve: (chunk: Buffer | null) => void;
  reject: (err: Error) => void;
};

/**
 * Bounded queue between the connection (producer) and a handler (consumer)
 *
 * `push()` returns false once the queue holds `highWaterBytes`; the
 * connection then pauses its transport until `onDrain` fires.
 */
export class BodyStream implements BodySource {
  private readonly queue: Buffer[] = [];
  private queuedBytes = 0;
  private ended = false;
  private failure: Error | null = null;
  private discarding = false;
  private waiter: Waiter | null = null;
  private claimed = false;
  private demanded = false;
  private full = false;
  private receivedBytes = 0;
  private readonly highWaterBytes: number;
  private readonly length: BodyLength;

  constructor(private readonly options: BodyStreamOptions) {
    this.length = options.length;
    this.highWaterBytes = options.highWaterBytes ?? DEFAULT_BODY_HIGH_WATER_BYTES;
  }

  get sizeHint(): SizeHint {
    const hint = sizeHintOf(this.length);
    if (hint.upper === null) return { lower: this.queuedBytes, upper: this.ended ? this.queuedBytes : null };
    const left = Math.max(0, hint.upper - this.receivedBytes) + this.queuedBytes;
    return { lower: left, upper: left };
  }

  get bufferedBytes() {
    return this.queuedBytes;
  }

  /** whether the producer side has finished (ended, failed or discarded) */
  get settled() {
    return this.ended || this.failure !== null || this.discarding;
  }

  /** whether a consumer asked for data */
  get wanted() {
    return this.demanded;
  }

  get isDiscarding() {
    return this.discarding;
  }

  push(chunk: Buffer): boolean {
    if (this.settled || chunk.length === 0) return !this.full;
    this.receivedBytes += chunk.length;

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve(chunk);
      return true;
    }

    this.queue.push(chunk);
    this.queuedBytes += chunk.length;
    if (this.queuedBytes >= this.highWaterBytes) this.full = true;
    return !this.full;
  }

  end() {
    if (this.settled) return;
    this.ended = true;
    if (this.waiter && this.queue.length === 0) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve(null);
    }
  }

  fail(err: Error) {
    if (this.failure || this.ended || this.discarding) return;
    this.failure = err;
    this.queue.length = 0;
    this.queuedBytes = 0;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.reject(err);
    }
  }

  /** Drop queued and future bytes; later reads fail */
  discard() {
    if (this.discarding) return;
    const wasSettled = this.settled;
    this.discarding = true;
    this.queue.length = 0;
    this.queuedBytes = 0;
    this.full = false;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      if (wasSettled) waiter.resolve(null);
      else waiter.reject(new BodyError("aborted", "request body discarded"));
    }
  }

  async read(): Promise<Buffer | null> {
    this.claimed = true;
    if (!this.demanded) {
      this.demanded = true;
      this.options.onDemand?.();
    }

    const next = this.queue.shift();
    if (next) {
      this.queuedBytes -= next.length;
      if (this.full && this.queuedBytes < this.highWaterBytes) {
        this.full = false;
        this.options.onDrain?.();
      }
      return next;
    }

    if (this.failure) throw this.failure;
    if (this.ended) return null;
    if (this.discarding) throw new BodyError("aborted", "request body discarded");
    if (this.waiter) throw new Error("concurrent body reads are not supported");

    return new Promise<Buffer | null>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<Buffer> {
    if (this.claimed) throw new Error("body stream already consumed");
    return iterateSource(this);
  }
}

async function* iterateSource(source: Pick<BodySource, "read">): AsyncGenerator<Buffer> {
  while (true) {
    const chunk = await source.read();
    if (chunk === null) return;
    yield chunk;
  }
}

/** Adapt a single-use async iterable (e.g. a decompression pipeline) to a BodySource */
export class IterableBody implements BodySource {
  private readonly iterator: AsyncIterator<Buffer>;
  private claimed = false;

  constructor(
    iterable: AsyncIterable<Buffer>,
    readonly sizeHint: SizeHint = { lower: 0, upper: null },
  ) {
    this.iterator = iterable[Symbol.asyncIterator]();
  }

  async read(): Promise<Buffer | null> {
    this.claimed = true;
    const next = await this.iterator.next();
    return next.done ? null : next.value;
  }

  [Symbol.asyncIterator](): AsyncIterator<Buffer> {
    if (this.claimed) throw new Error("body stream already consumed");
    return iterateSource(this);
  }
}

/** Read a whole body, failing once it exceeds `maxBytes` */
export async function collectBody(source: BodySource, maxBytes = Infinity): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  while (true) {
    const chunk = await source.read();
    if (chunk === null) break;
    if (total + chunk.length > maxBytes) {
      throw new BodyError("payload-overflow", `body exceeds ${maxBytes} bytes`);
    }
    total += chunk.length;
    chunks.push(chunk);
  }
  return chunks.length === 1 ? chunks[0]! : Buffer.concat(chunks, total);
}

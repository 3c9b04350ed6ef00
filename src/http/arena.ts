export const DEFAULT_ARENA_SLAB_BYTES = 16 * 1024;

/**
 * Per-connection bump allocator for message heads.
 *
 * Bytes of the head currently being parsed are appended to the active slab.
 * `seal()` hands out a view of those bytes and moves the bump pointer past
 * them, so a sealed view is never written again: once the slab is full a
 * fresh slab is allocated and the old one lives on for as long as a header
 * map still references it.
 */
export class HeadArena {
  private slab: Buffer;
  private used = 0;
  private start = 0;

  constructor(private readonly slabBytes = DEFAULT_ARENA_SLAB_BYTES) {
    if (!Number.isInteger(slabBytes) || slabBytes <= 0) {
      throw new RangeError(`arena slab size must be > 0 (got ${slabBytes})`);
    }
    this.slab = Buffer.allocUnsafe(slabBytes);
  }

  /** bytes of the head under construction */
  get length() {
    return this.used - this.start;
  }

  append(bytes: Buffer) {
    if (bytes.length === 0) return;
    if (this.used + bytes.length > this.slab.length) {
      this.grow(bytes.length);
    }
    bytes.copy(this.slab, this.used);
    this.used += bytes.length;
  }

  /** Current head bytes (the view moves if the arena grows) */
  view(): Buffer {
    return this.slab.subarray(this.start, this.used);
  }

  byteAt(offset: number): number {
    return this.slab[this.start + offset] ?? -1;
  }

  seal(): Buffer {
    const out = this.view();
    this.start = this.used;
    return out;
  }

  /** Drop the head under construction */
  discard() {
    this.used = this.start;
  }

  private grow(extra: number) {
    const current = this.used - this.start;
    const size = Math.max(this.slabBytes, (current + extra) * 2);
    const next = Buffer.allocUnsafe(size);
    this.slab.copy(next, 0, this.start, this.used);
    this.slab = next;
    this.start = 0;
    this.used = current;
  }
}

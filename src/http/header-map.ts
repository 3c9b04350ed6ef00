import { HeaderEncodingError } from "../errors.ts";

// RFC 9110 tchar
const TOKEN_CHARS = new Uint8Array(256);
for (const ch of "!#$%&'*+-.^_`|~") TOKEN_CHARS[ch.charCodeAt(0)] = 1;
for (let c = 0x30; c <= 0x39; c += 1) TOKEN_CHARS[c] = 1;
for (let c = 0x41; c <= 0x5a; c += 1) TOKEN_CHARS[c] = 1;
for (let c = 0x61; c <= 0x7a; c += 1) TOKEN_CHARS[c] = 1;

export function isTokenByte(b: number): boolean {
  return TOKEN_CHARS[b] === 1;
}

export function isToken(value: string): boolean {
  if (value.length === 0) return false;
  for (let i = 0; i < value.length; i += 1) {
    if (!isTokenByte(value.charCodeAt(i))) return false;
  }
  return true;
}

/** HTAB, SP and visible ASCII */
function isTextByte(b: number): boolean {
  return b === 0x09 || (b >= 0x20 && b <= 0x7e);
}

export type HeaderValueInput = string | number | Buffer;

export type HeaderInit =
  | HeaderMap
  | Iterable<readonly [string, HeaderValueInput]>
  | Record<string, HeaderValueInput | readonly HeaderValueInput[]>;

type HeaderEntry = {
  /** name as received or appended */
  name: string;
  /** lowercased name */
  key: string;
  /** buffer holding the value bytes */
  source: Buffer;
  start: number;
  end: number;
};

function toValueBuffer(name: string, value: HeaderValueInput): Buffer {
  const buf = Buffer.isBuffer(value)
    ? value
    : Buffer.from(String(value), "latin1");
  for (const b of buf) {
    if (b === 0x0d || b === 0x0a || b === 0x00) {
      throw new TypeError(`invalid header value for ${name}`);
    }
  }
  return buf;
}

function isHeaderRecord(
  init: HeaderInit,
): init is Record<string, HeaderValueInput | readonly HeaderValueInput[]> {
  return !(Symbol.iterator in init);
}

/**
 * Ordered, case-insensitive header multimap
 *
 * Values are raw bytes held as offset+length into a retained buffer (for
 * parsed heads: the arena slab the head was read into).
 */
export class HeaderMap implements Iterable<[string, Buffer]> {
  private entries_: HeaderEntry[] = [];

  static from(init?: HeaderInit): HeaderMap {
    const map = new HeaderMap();
    if (!init) return map;

    if (init instanceof HeaderMap) {
      for (const entry of init.entries_) map.entries_.push({ ...entry });
      return map;
    }

    if (isHeaderRecord(init)) {
      for (const [name, value] of Object.entries(init)) {
        if (Array.isArray(value)) {
          for (const item of value) map.append(name, item);
        } else if (typeof value === "string" || typeof value === "number" || Buffer.isBuffer(value)) {
          map.append(name, value);
        }
      }
      return map;
    }

    for (const [name, value] of init) map.append(name, value);
    return map;
  }

  get size() {
    return this.entries_.length;
  }

  append(name: string, value: HeaderValueInput): this {
    if (!isToken(name)) {
      throw new TypeError(`invalid header name: ${JSON.stringify(name)}`);
    }
    const source = toValueBuffer(name, value);
    this.entries_.push({
      name,
      key: name.toLowerCase(),
      source,
      start: 0,
      end: source.length,
    });
    return this;
  }

  /**
   * Append a value that references `source[start, end)` without copying.
   * The caller is responsible for having validated name and value bytes.
   */
  appendSlice(name: string, source: Buffer, start: number, end: number): this {
    this.entries_.push({ name, key: name.toLowerCase(), source, start, end });
    return this;
  }

  set(name: string, value: HeaderValueInput): this {
    this.delete(name);
    return this.append(name, value);
  }

  has(name: string): boolean {
    const key = name.toLowerCase();
    return this.entries_.some((entry) => entry.key === key);
  }

  /** Remove every value for `name`, returning how many were removed */
  delete(name: string): number {
    const key = name.toLowerCase();
    const before = this.entries_.length;
    this.entries_ = this.entries_.filter((entry) => entry.key !== key);
    return before - this.entries_.length;
  }

  clear() {
    this.entries_.length = 0;
  }

  get(name: string): Buffer | undefined {
    const key = name.toLowerCase();
    const entry = this.entries_.find((e) => e.key === key);
    return entry ? entry.source.subarray(entry.start, entry.end) : undefined;
  }

  getAll(name: string): Buffer[] {
    const key = name.toLowerCase();
    const out: Buffer[] = [];
    for (const entry of this.entries_) {
      if (entry.key === key) out.push(entry.source.subarray(entry.start, entry.end));
    }
    return out;
  }

  /** First value as text; throws HeaderEncodingError for non-text bytes */
  text(name: string): string | undefined {
    const value = this.get(name);
    return value === undefined ? undefined : decodeText(name, value);
  }

  textAll(name: string): string[] {
    return this.getAll(name).map((value) => decodeText(name, value));
  }

  /**
   * Lowercased comma-separated list elements across every value of `name`
   * (e.g. Connection, Transfer-Encoding)
   */
  tokens(name: string): string[] {
    const out: string[] = [];
    for (const value of this.getAll(name)) {
      for (const part of value.toString("latin1").split(",")) {
        const token = part.trim().toLowerCase();
        if (token) out.push(token);
      }
    }
    return out;
  }

  names(): string[] {
    return this.entries_.map((entry) => entry.name);
  }

  *entries(): IterableIterator<[string, Buffer]> {
    for (const entry of this.entries_) {
      yield [entry.name, entry.source.subarray(entry.start, entry.end)];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, Buffer]> {
    return this.entries();
  }

  /**
   * Lowercased record with repeated values comma-joined (set-cookie values
   * are newline-joined since they cannot be combined)
   */
  toRecord(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const entry of this.entries_) {
      const value = entry.source.toString("latin1", entry.start, entry.end);
      const existing = out[entry.key];
      if (existing === undefined) {
        out[entry.key] = value;
      } else {
        out[entry.key] = existing + (entry.key === "set-cookie" ? "\n" : ", ") + value;
      }
    }
    return out;
  }

  clone(): HeaderMap {
    return HeaderMap.from(this);
  }
}

function decodeText(name: string, value: Buffer): string {
  for (const b of value) {
    if (!isTextByte(b)) throw new HeaderEncodingError(name);
  }
  return value.toString("latin1");
}

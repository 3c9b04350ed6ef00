import { BodyError } from "../../src/errors.ts";
import { ChunkedDecoder, encodeChunked } from "../../src/http/chunked.ts";
import { HeaderMap } from "../../src/http/header-map.ts";
import type { Outcome, SplitTarget } from "./types.ts";

function decode(pieces: Buffer[]): Outcome {
  const decoder = new ChunkedDecoder({ maxChunkSize: 4096, trailerLimits: { maxHeaderBytes: 512, maxHeaderCount: 8 } });
  const body: Buffer[] = [];
  try {
    for (let i = 0; i < pieces.length; i++) {
      const out = decoder.feed(pieces[i]!);
      body.push(...out.chunks);
      if (out.done) {
        const leftover = Buffer.concat([out.leftover, ...pieces.slice(i + 1)]);
        const trailers = Array.from(decoder.trailers, ([name, value]) => `${name}=${value.toString("hex")}`);
        return {
          label: "decoded",
          detail: [Buffer.concat(body).toString("hex"), trailers.join("|"), leftover.toString("hex")].join("#"),
        };
      }
    }
    decoder.finish();
    throw new Error("chunked: finish() accepted an unterminated body");
  } catch (err) {
    if (err instanceof BodyError) return { label: `error:${err.kind}`, detail: err.message };
    throw err;
  }
}

export const chunkedTarget: SplitTarget = {
  name: "chunked",
  description: "chunked bodies decode the same however the input is split",
  maxLen: 4096,
  seeds: [
    encodeChunked([Buffer.from("hello"), Buffer.from(" world")]),
    encodeChunked([Buffer.from("a")], new HeaderMap().append("x-checksum", "abc")),
    Buffer.from("5;ext=1\r\nhello\r\n0\r\n\r\nGET / HTTP/1.1\r\n"),
  ],
  decode,
};

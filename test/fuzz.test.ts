import assert from "node:assert/strict";
import test from "node:test";

import { checkSplitInvariance, SplitMismatchError } from "../fuzz/check.ts";
import { mutateBuffer } from "../fuzz/mutate.ts";
import { XorShift32 } from "../fuzz/rng.ts";
import { targets } from "../fuzz/targets/index.ts";
import type { SplitTarget } from "../fuzz/targets/types.ts";

test("fuzz: every seed decodes the same under random splits", () => {
  for (const target of Object.values(targets)) {
    const rng = new XorShift32(7);
    for (const seed of target.seeds) {
      for (let round = 0; round < 25; round++) {
        checkSplitInvariance(target, seed, rng);
      }
    }
  }
});

test("fuzz: seeds reach the decoded outcome", () => {
  const rng = new XorShift32(1);
  assert.equal(checkSplitInvariance(targets["request-parser"]!, targets["request-parser"]!.seeds[0]!, rng).label, "parsed");
  assert.equal(checkSplitInvariance(targets["response-parser"]!, targets["response-parser"]!.seeds[0]!, rng).label, "parsed");
  assert.equal(checkSplitInvariance(targets["chunked"]!, targets["chunked"]!.seeds[0]!, rng).label, "decoded");
});

test("fuzz: mutated inputs stay within the target length", () => {
  const rng = new XorShift32(3);
  const target = targets["request-parser"]!;
  for (let i = 0; i < 200; i++) {
    const input = mutateBuffer(target.seeds[i % target.seeds.length]!, rng, { maxLen: 64 });
    assert.ok(input.length <= 64);
  }
});

test("fuzz: a decoder that depends on the split is reported", () => {
  const countsPieces: SplitTarget = {
    name: "pieces",
    description: "reports how many reads it saw",
    maxLen: 16,
    seeds: [],
    decode: (pieces) => ({ label: "counted", detail: String(pieces.length) }),
  };
  const input = Buffer.from("abcdefgh");
  // some seed eventually cuts the input at least once
  let caught: unknown = null;
  const rng = new XorShift32(11);
  for (let i = 0; i < 50 && caught === null; i++) {
    try {
      checkSplitInvariance(countsPieces, input, rng);
    } catch (err) {
      caught = err;
    }
  }
  assert.ok(caught instanceof SplitMismatchError);
  assert.equal(caught.whole.detail, "1");
  assert.equal(caught.split.detail, String(caught.pieces.length));
  assert.equal(caught.pieces.reduce((sum, n) => sum + n, 0), 8);
});

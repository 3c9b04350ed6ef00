import { XorShift32 } from "../rng.ts";

/** Cut `input` into 1..8 pieces at random offsets */
export function randomSplit(input: Buffer, rng: XorShift32): Buffer[] {
  if (input.length < 2) return [input];
  const cuts = new Set<number>();
  const count = rng.int(0, 7);
  for (let i = 0; i < count; i++) cuts.add(rng.int(1, input.length - 1));

  const offsets = [...cuts].sort((a, b) => a - b);
  const pieces: Buffer[] = [];
  let last = 0;
  for (const at of offsets) {
    pieces.push(input.subarray(last, at));
    last = at;
  }
  pieces.push(input.subarray(last));
  return pieces;
}

import type { XorShift32 } from "./rng.ts";
import { randomSplit } from "./targets/split.ts";
import type { Outcome, SplitTarget } from "./targets/types.ts";

export class SplitMismatchError extends Error {
  constructor(
    readonly whole: Outcome,
    readonly split: Outcome,
    readonly pieces: number[],
  ) {
    super(
      `split outcome differs (pieces ${pieces.join("+")}):\n` +
        `  whole: ${whole.label} ${whole.detail}\n` +
        `  split: ${split.label} ${split.detail}`,
    );
    this.name = "SplitMismatchError";
  }
}

/**
 * Decodes `input` whole and cut at random offsets; throws
 * `SplitMismatchError` when the outcomes differ.
 */
export function checkSplitInvariance(target: SplitTarget, input: Buffer, rng: XorShift32): Outcome {
  const whole = target.decode([Buffer.from(input)]);
  const pieces = randomSplit(input, rng);
  const split = target.decode(pieces.map((piece) => Buffer.from(piece)));
  if (split.label !== whole.label || split.detail !== whole.detail) {
    throw new SplitMismatchError(whole, split, pieces.map((piece) => piece.length));
  }
  return whole;
}

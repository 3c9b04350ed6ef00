/** Small deterministic PRNG so fuzz runs replay from a seed */
export class XorShift32 {
  private state: number;

  constructor(seed: number) {
    // zero is a fixed point of xorshift
    this.state = (seed >>> 0) || 0x9e3779b9;
  }

  nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x >>>= 0;
    x ^= x >>> 17;
    x ^= x << 5;
    x >>>= 0;
    this.state = x;
    return x;
  }

  /** Uniform integer in [min, max] */
  int(min: number, max: number): number {
    if (max <= min) return min;
    return min + (this.nextU32() % (max - min + 1));
  }
}

/** One decode of an input, reduced to something two runs can be compared on */
export type Outcome = {
  /** coarse class for the run report, e.g. `parsed` or `error:too-large` */
  label: string;
  /** everything the decode produced; equal inputs must give equal details */
  detail: string;
};

/**
 * A decoder checked for split invariance: the driver feeds each input once
 * whole and once cut into pieces, and the two outcomes must agree.
 */
export type SplitTarget = {
  name: string;
  description: string;
  seeds: readonly Buffer[];
  maxLen: number;
  /** decode `pieces` as consecutive reads from one connection */
  decode(pieces: Buffer[]): Outcome;
};

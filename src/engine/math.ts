// Float products such as 20 * 0.9 or 36 * 4.6 must land on the exact integer,
// so both helpers snap away binary noise first.
const EPSILON = 1e-9;

/** Truncates toward zero for non-negative values. */
export function roundDown(value: number): number {
  return Math.floor(value + EPSILON);
}

/** Rounds non-negative values up to the next integer. */
export function roundUp(value: number): number {
  return Math.ceil(value - EPSILON);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Numeric width used by a store/instrument/strategy graph.
 *  - double: IEEE-754 binary64, values pass through untouched
 *  - single: every stored input and returned result is rounded to binary32
 */
export type Precision = "double" | "single";

export const DEFAULT_PRECISION: Precision = "double";

export function roundTo(precision: Precision, x: number): number {
  return precision === "single" ? Math.fround(x) : x;
}

/** Machine epsilon for the given width. */
export function epsilonOf(precision: Precision): number {
  return precision === "single" ? 2 ** -23 : Number.EPSILON;
}

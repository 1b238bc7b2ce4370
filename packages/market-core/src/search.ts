/** Index of the first element >= x in an ascending array (xs.length if none). */
export function lowerBound(xs: readonly number[], x: number): number {
  let lo = 0;
  let hi = xs.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (xs[mid] < x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Inserts x keeping xs ascending and unique. Returns false if x was already present. */
export function insertSorted(xs: number[], x: number): boolean {
  const i = lowerBound(xs, x);
  if (i < xs.length && xs[i] === x) return false;
  xs.splice(i, 0, x);
  return true;
}

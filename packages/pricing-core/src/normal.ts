// Standard normal CDF and density for the Black-Scholes engine

const SQRT_2PI = Math.sqrt(2 * Math.PI);

/** Fast erf approximation (Abramowitz–Stegun 7.1.26), |error| < 1.5e-7 */
export function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const a1 = 0.254829592, a2 = -0.284496736, a3 = 1.421413741, a4 = -1.453152027, a5 = 1.061405429;
  const p = 0.3275911;
  const ax = Math.abs(x);
  const t = 1 / (1 + p * ax);
  const y = 1 - (((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t) * Math.exp(-ax * ax);
  return sign * y;
}

export function normCdf(x: number): number {
  if (x > 10) return 1;
  if (x < -10) return 0;
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

export function normPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / SQRT_2PI;
}

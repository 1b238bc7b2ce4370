import {
  DEFAULT_PRECISION,
  EmptyDataError,
  InsufficientDataError,
  MissingGridPointError,
  OutOfRangeError,
  epsilonOf,
  roundTo,
  type Precision,
  type RatePoint,
  type SurfaceAxis,
  type VolPoint,
} from "core-types";
import { assertFinite, assertNonNegative, assertPositive } from "./guards";
import { insertSorted, lowerBound } from "./search";

export interface MarketDataStoreOptions {
  precision?: Precision;
}

const gridKey = (strike: number, maturity: number) => `${strike}|${maturity}`;

/**
 * Market environment used for pricing: a yield curve (time -> rate) and a
 * volatility surface ((strike, maturity) -> vol).
 *
 * Rates: flat outside the curve, linear inside.
 * Vols: exact hit, else single-point flat surface, else bilinear on the
 * known strike/maturity grid (no extrapolation).
 */
export class MarketDataStore {
  readonly precision: Precision;

  // yield curve as parallel arrays, ascending by time
  private readonly curveTimes: number[] = [];
  private readonly curveRates: number[] = [];

  private readonly surface = new Map<string, number>();
  private readonly knownStrikes: number[] = [];
  private readonly knownMaturities: number[] = [];

  constructor(options: MarketDataStoreOptions = {}) {
    this.precision = options.precision ?? DEFAULT_PRECISION;
  }

  addRate(time: number, rate: number): void {
    assertNonNegative(time, "addRate.time");
    assertNonNegative(rate, "addRate.rate");

    const t = this.round(time);
    const r = this.round(rate);
    const i = lowerBound(this.curveTimes, t);
    if (i < this.curveTimes.length && this.curveTimes[i] === t) {
      this.curveRates[i] = r;
      return;
    }
    this.curveTimes.splice(i, 0, t);
    this.curveRates.splice(i, 0, r);
  }

  addVolatilityPoint(strike: number, maturity: number, vol: number): void {
    assertPositive(strike, "addVolatilityPoint.strike");
    assertNonNegative(maturity, "addVolatilityPoint.maturity");
    assertNonNegative(vol, "addVolatilityPoint.vol");

    const k = this.round(strike);
    const t = this.round(maturity);
    this.surface.set(gridKey(k, t), this.round(vol));
    insertSorted(this.knownStrikes, k);
    insertSorted(this.knownMaturities, t);
  }

  getRate(time: number): number {
    assertFinite(time, "getRate.time");

    const n = this.curveTimes.length;
    if (n === 0) {
      throw new EmptyDataError("Yield curve is empty");
    }
    if (n === 1) {
      return this.curveRates[0];
    }

    const t = this.round(time);
    const upper = lowerBound(this.curveTimes, t);
    if (upper === 0) return this.curveRates[0];
    if (upper === n) return this.curveRates[n - 1];
    if (this.curveTimes[upper] === t) return this.curveRates[upper];

    const t0 = this.curveTimes[upper - 1];
    const t1 = this.curveTimes[upper];
    const r0 = this.curveRates[upper - 1];
    const r1 = this.curveRates[upper];

    if (t1 - t0 < epsilonOf(this.precision)) {
      return r0;
    }

    const alpha = (t - t0) / (t1 - t0);
    return this.round(r0 + alpha * (r1 - r0));
  }

  getVolatility(strike: number, maturity: number): number {
    assertFinite(strike, "getVolatility.strike");
    assertFinite(maturity, "getVolatility.maturity");

    const k = this.round(strike);
    const t = this.round(maturity);

    const exact = this.surface.get(gridKey(k, t));
    if (exact !== undefined) {
      return exact;
    }

    const nK = this.knownStrikes.length;
    const nT = this.knownMaturities.length;

    // flat surface: one quote covers every query
    if (nK === 1 && nT === 1) {
      return this.gridValue(this.knownStrikes[0], this.knownMaturities[0]);
    }
    if (nK < 2 || nT < 2) {
      throw new InsufficientDataError(
        `Insufficient data for interpolation: ${nK} strike(s), ${nT} maturity(ies)`
      );
    }

    const [k0, k1] = bracket(this.knownStrikes, k, "strike");
    const [t0, t1] = bracket(this.knownMaturities, t, "maturity");
    const onStrikeLine = k0 === k1;
    const onMaturityLine = t0 === t1;

    if (onStrikeLine && onMaturityLine) {
      return this.gridValue(k0, t0);
    }

    const v00 = this.gridValue(k0, t0);
    const v01 = onMaturityLine ? v00 : this.gridValue(k0, t1);
    const v10 = onStrikeLine ? v00 : this.gridValue(k1, t0);
    const v11 = onStrikeLine ? v01 : onMaturityLine ? v10 : this.gridValue(k1, t1);

    const x = onStrikeLine ? 0 : (k - k0) / (k1 - k0);
    const y = onMaturityLine ? 0 : (t - t0) / (t1 - t0);

    return this.round(
      (1 - x) * (1 - y) * v00 +
      (1 - x) * y * v01 +
      x * (1 - y) * v10 +
      x * y * v11
    );
  }

  /** Independent deep copy; later writes to either store are not shared. */
  clone(): MarketDataStore {
    const copy = new MarketDataStore({ precision: this.precision });
    copy.curveTimes.push(...this.curveTimes);
    copy.curveRates.push(...this.curveRates);
    for (const [key, vol] of this.surface) copy.surface.set(key, vol);
    copy.knownStrikes.push(...this.knownStrikes);
    copy.knownMaturities.push(...this.knownMaturities);
    return copy;
  }

  ratePoints(): RatePoint[] {
    return this.curveTimes.map((time, i) => ({ time, rate: this.curveRates[i] }));
  }

  volatilityPoints(): VolPoint[] {
    const out: VolPoint[] = [];
    for (const strike of this.knownStrikes) {
      for (const maturity of this.knownMaturities) {
        const vol = this.surface.get(gridKey(strike, maturity));
        if (vol !== undefined) out.push({ strike, maturity, vol });
      }
    }
    return out;
  }

  strikes(): number[] {
    return [...this.knownStrikes];
  }

  maturities(): number[] {
    return [...this.knownMaturities];
  }

  private gridValue(strike: number, maturity: number): number {
    const vol = this.surface.get(gridKey(strike, maturity));
    if (vol === undefined) {
      throw new MissingGridPointError(strike, maturity);
    }
    return vol;
  }

  private round(x: number): number {
    return roundTo(this.precision, x);
  }
}

/**
 * Neighbouring known values around q. A query sitting on a known value
 * gives a degenerate bracket [q, q].
 */
function bracket(known: readonly number[], q: number, axis: SurfaceAxis): [number, number] {
  const min = known[0];
  const max = known[known.length - 1];
  if (q < min || q > max) {
    throw new OutOfRangeError(axis, q, min, max);
  }
  const i = lowerBound(known, q);
  if (known[i] === q) return [q, q];
  return [known[i - 1], known[i]];
}

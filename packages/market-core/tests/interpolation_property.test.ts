import { describe, it } from "vitest";
import fc from "fast-check";
import { MarketDataStore } from "../src/index";

const rate = fc.double({ min: 0, max: 1, noNaN: true });
const vol = fc.double({ min: 0, max: 2, noNaN: true });

describe("yield curve properties", () => {
  it("a single point answers every query", () => {
    const arb = fc.record({
      t: fc.double({ min: 0, max: 30, noNaN: true }),
      r: rate,
      q: fc.double({ min: -1e6, max: 1e6, noNaN: true }),
    });

    fc.assert(fc.property(arb, ({ t, r, q }) => {
      const md = new MarketDataStore();
      md.addRate(t, r);
      return md.getRate(q) === r;
    }), { numRuns: 200 });
  });

  it("two points: midpoint is the mean, outside is flat", () => {
    const arb = fc.record({
      t0: fc.double({ min: 0, max: 50, noNaN: true }),
      gap: fc.double({ min: 0.01, max: 50, noNaN: true }),
      r0: rate,
      r1: rate,
      beyond: fc.double({ min: 0.001, max: 10, noNaN: true }),
    });

    fc.assert(fc.property(arb, ({ t0, gap, r0, r1, beyond }) => {
      const t1 = t0 + gap;
      const md = new MarketDataStore();
      md.addRate(t0, r0);
      md.addRate(t1, r1);

      const mid = md.getRate((t0 + t1) / 2);
      return (
        Math.abs(mid - (r0 + r1) / 2) <= 1e-12 &&
        md.getRate(t0 - beyond) === r0 &&
        md.getRate(t1 + beyond) === r1
      );
    }), { numRuns: 200 });
  });
});

describe("volatility surface properties", () => {
  const gridArb = fc.record({
    k0: fc.double({ min: 1, max: 200, noNaN: true }),
    dk: fc.double({ min: 1, max: 100, noNaN: true }),
    t0: fc.double({ min: 0, max: 5, noNaN: true }),
    dt: fc.double({ min: 0.1, max: 5, noNaN: true }),
    v00: vol,
    v01: vol,
    v10: vol,
    v11: vol,
  });

  it("corners come back exactly and the centre is the corner mean", () => {
    fc.assert(fc.property(gridArb, ({ k0, dk, t0, dt, v00, v01, v10, v11 }) => {
      const k1 = k0 + dk;
      const t1 = t0 + dt;
      const md = new MarketDataStore();
      md.addVolatilityPoint(k0, t0, v00);
      md.addVolatilityPoint(k0, t1, v01);
      md.addVolatilityPoint(k1, t0, v10);
      md.addVolatilityPoint(k1, t1, v11);

      const centre = md.getVolatility((k0 + k1) / 2, (t0 + t1) / 2);
      const expected = (v00 + v01 + v10 + v11) / 4;
      return (
        md.getVolatility(k0, t0) === v00 &&
        md.getVolatility(k1, t1) === v11 &&
        Math.abs(centre - expected) <= 1e-12
      );
    }), { numRuns: 200 });
  });

  it("interpolated vols stay within the corner range", () => {
    const arb = fc.record({
      grid: gridArb,
      x: fc.double({ min: 0, max: 1, noNaN: true }),
      y: fc.double({ min: 0, max: 1, noNaN: true }),
    });

    fc.assert(fc.property(arb, ({ grid, x, y }) => {
      const { k0, dk, t0, dt, v00, v01, v10, v11 } = grid;
      const md = new MarketDataStore();
      md.addVolatilityPoint(k0, t0, v00);
      md.addVolatilityPoint(k0, t0 + dt, v01);
      md.addVolatilityPoint(k0 + dk, t0, v10);
      md.addVolatilityPoint(k0 + dk, t0 + dt, v11);

      const k = Math.min(k0 + x * dk, k0 + dk);
      const t = Math.min(t0 + y * dt, t0 + dt);
      const v = md.getVolatility(k, t);
      const lo = Math.min(v00, v01, v10, v11);
      const hi = Math.max(v00, v01, v10, v11);
      return v >= lo - 1e-12 && v <= hi + 1e-12;
    }), { numRuns: 200 });
  });
});

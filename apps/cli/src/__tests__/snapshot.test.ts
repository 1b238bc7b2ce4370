import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { applyOverrides, seedMarketData } from "../market/snapshot";

const snapshot = { spotPrice: 100, volatility: 0.2, riskFreeRate: 0.05 };

describe("seedMarketData", () => {
  it("seeds one rate and one vol point at the option's maturity", () => {
    const md = seedMarketData(snapshot, 110, 0.5);

    expect(md.ratePoints()).toEqual([{ time: 0.5, rate: 0.05 }]);
    expect(md.volatilityPoints()).toEqual([{ strike: 110, maturity: 0.5, vol: 0.2 }]);
    // flat in both directions
    expect(md.getRate(3)).toBe(0.05);
    expect(md.getVolatility(90, 2)).toBe(0.2);
  });

  it("honours the requested precision", () => {
    const md = seedMarketData(snapshot, 110, 0.5, "single");
    expect(md.precision).toBe("single");
    expect(md.getVolatility(110, 0.5)).toBe(Math.fround(0.2));
  });
});

describe("applyOverrides", () => {
  it("replaces only the given fields", () => {
    expect(applyOverrides(snapshot, { volatility: 0.25 })).toEqual({
      spotPrice: 100,
      volatility: 0.25,
      riskFreeRate: 0.05,
    });
    expect(applyOverrides(snapshot, {})).toEqual(snapshot);
  });

  it("validates the result", () => {
    expect(() => applyOverrides(snapshot, { spotPrice: 0 })).toThrow(ZodError);
    expect(() => applyOverrides(snapshot, { volatility: -0.1 })).toThrow(ZodError);
  });
});

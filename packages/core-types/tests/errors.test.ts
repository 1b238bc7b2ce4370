import { describe, it, expect } from "vitest";
import {
  EmptyDataError,
  InvalidArgumentError,
  MissingGridPointError,
  OutOfRangeError,
  PricingError,
  UnsupportedError,
  isPricingError,
} from "../src/index";

describe("pricing errors", () => {
  it("carry their kind and a kind-derived name", () => {
    const err = new InvalidArgumentError("bad strike");
    expect(err).toBeInstanceOf(PricingError);
    expect(err).toBeInstanceOf(Error);
    expect(err.kind).toBe("InvalidArgument");
    expect(err.name).toBe("InvalidArgumentError");
    expect(err.message).toBe("bad strike");
  });

  it("out-of-range errors name the axis and bounds", () => {
    const err = new OutOfRangeError("maturity", 0.5, 1, 2);
    expect(err.kind).toBe("OutOfRange");
    expect(err.axis).toBe("maturity");
    expect(err.value).toBe(0.5);
    expect(err.message).toBe("maturity 0.5 outside known range [1, 2]");
  });

  it("missing grid point errors keep the coordinates", () => {
    const err = new MissingGridPointError(100, 2);
    expect(err.strike).toBe(100);
    expect(err.maturity).toBe(2);
    expect(err.message).toBe("Missing volatility point at (K=100, T=2)");
  });

  it("isPricingError separates pricing failures from other errors", () => {
    expect(isPricingError(new EmptyDataError("empty"))).toBe(true);
    expect(isPricingError(new UnsupportedError("nope"))).toBe(true);
    expect(isPricingError(new Error("other"))).toBe(false);
    expect(isPricingError("string")).toBe(false);
  });
});

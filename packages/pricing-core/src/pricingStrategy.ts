import { UnsupportedError, roundTo, type Greeks, type Precision } from "core-types";
import type { MarketDataStore } from "market-core";
import type { Instrument } from "./instrument";

/**
 * Valuation method for instruments (analytic formulas, lattices, ...).
 * Strategies are shared between instruments, so they must not keep
 * per-call state; anything that needs isolation goes through clone().
 */
export abstract class PricingStrategy {
  abstract readonly name: string;
  readonly precision: Precision;

  protected constructor(precision: Precision) {
    this.precision = precision;
  }

  /** Unit price (per 1 notional). */
  abstract price(instrument: Instrument, market: MarketDataStore): number;

  /** Not every method produces sensitivities. */
  greeks(_instrument: Instrument, _market: MarketDataStore): Greeks {
    throw new UnsupportedError(`Greeks calculation not implemented for ${this.name}`);
  }

  abstract clone(): PricingStrategy;

  protected round(x: number): number {
    return roundTo(this.precision, x);
  }
}

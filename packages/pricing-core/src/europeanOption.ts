import {
  DEFAULT_PRECISION,
  InvalidArgumentError,
  UnconfiguredError,
  roundTo,
  type ContractTerms,
  type Greeks,
  type Precision,
} from "core-types";
import { MarketDataStore } from "market-core";
import type { Instrument } from "./instrument";
import type { PricingStrategy } from "./pricingStrategy";

export interface EuropeanOptionOptions {
  precision?: Precision;
}

export function validateTerms(terms: ContractTerms): void {
  const checks: Array<[number, string]> = [
    [terms.strike, "Strike price must be positive"],
    [terms.maturity, "Time to maturity must be positive"],
    [terms.spot, "Stock spot price must be positive"],
    [terms.notional, "Contract notional must be positive"],
  ];
  for (const [value, message] of checks) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidArgumentError(`${message} (got ${value})`);
    }
  }
}

/** European-style equity option; exercisable at maturity only. */
export class EuropeanOption implements Instrument {
  readonly precision: Precision;
  private readonly contract: Readonly<ContractTerms>;
  private strategy: PricingStrategy | null = null;
  private market: MarketDataStore;

  constructor(terms: ContractTerms, options: EuropeanOptionOptions = {}) {
    this.precision = options.precision ?? DEFAULT_PRECISION;
    const round = (x: number) => roundTo(this.precision, x);
    const contract: ContractTerms = {
      notional: round(terms.notional),
      strike: round(terms.strike),
      maturity: round(terms.maturity),
      spot: round(terms.spot),
      isCall: terms.isCall,
    };
    validateTerms(contract);
    this.contract = Object.freeze(contract);
    this.market = new MarketDataStore({ precision: this.precision });
  }

  price(): number {
    const strategy = this.requireStrategy();
    return roundTo(this.precision, strategy.price(this, this.market) * this.contract.notional);
  }

  greeks(): Greeks {
    return this.requireStrategy().greeks(this, this.market);
  }

  attachMarketData(market: MarketDataStore): void {
    this.assertPrecision("market data", market.precision);
    this.market = market.clone();
  }

  attachStrategy(strategy: PricingStrategy): void {
    this.assertPrecision("pricing strategy", strategy.precision);
    this.strategy = strategy;
  }

  validate(): void {
    validateTerms(this.contract);
  }

  terms(): Readonly<ContractTerms> {
    return this.contract;
  }

  private requireStrategy(): PricingStrategy {
    if (!this.strategy) {
      throw new UnconfiguredError("Pricing strategy not set for European option");
    }
    return this.strategy;
  }

  private assertPrecision(what: string, precision: Precision): void {
    if (precision !== this.precision) {
      throw new InvalidArgumentError(
        `Precision mismatch: option is ${this.precision}, ${what} is ${precision}`
      );
    }
  }
}

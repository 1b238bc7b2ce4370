import type { ContractTerms, Greeks, Precision } from "core-types";
import type { MarketDataStore } from "market-core";
import type { PricingStrategy } from "./pricingStrategy";

/**
 * A priceable contract. Implementations own their terms and a market
 * snapshot, and delegate all math to an attached PricingStrategy.
 */
export interface Instrument {
  readonly precision: Precision;

  price(): number;

  greeks(): Greeks;

  /** Stores a copy of the given market; later changes to `market` are not seen. */
  attachMarketData(market: MarketDataStore): void;

  /** Holds the strategy by reference; clone it first for isolated use. */
  attachStrategy(strategy: PricingStrategy): void;

  validate(): void;

  terms(): Readonly<ContractTerms>;
}

export * from "./errors";
export * from "./precision";

export interface ContractTerms {
  notional: number;
  strike: number;
  maturity: number; // years
  spot: number;
  isCall: boolean;
}

export interface Greeks {
  delta: number;
  gamma: number;
  vega: number;   // per 1 vol point
  theta: number;  // per calendar day
  rho: number;    // per 1% rate move
}

export type GreekName = keyof Greeks;

export const GREEK_NAMES: readonly GreekName[] = ["delta", "gamma", "vega", "theta", "rho"];

/** Observed market state for one symbol, as supplied by a data provider. */
export interface MarketSnapshot {
  spotPrice: number;
  volatility: number;
  riskFreeRate: number;
}

export interface RatePoint {
  time: number;
  rate: number;
}

export interface VolPoint {
  strike: number;
  maturity: number;
  vol: number;
}

import type { ContractTerms, Greeks, MarketSnapshot, Precision } from "core-types";
import { AnalyticBlackScholes, EuropeanOption } from "pricing-core";
import { seedMarketData } from "./market/snapshot";

export interface PricingRequest {
  symbol?: string;
  snapshot: MarketSnapshot;
  strike: number;
  maturity: number;
  notional: number;
  isCall: boolean;
  precision: Precision;
}

export interface PricingReport {
  symbol?: string;
  snapshot: MarketSnapshot;
  terms: Readonly<ContractTerms>;
  precision: Precision;
  price: number;
  greeks: Greeks;
}

export function priceOption(req: PricingRequest): PricingReport {
  const { snapshot, strike, maturity, notional, isCall, precision } = req;

  const option = new EuropeanOption(
    { notional, strike, maturity, spot: snapshot.spotPrice, isCall },
    { precision }
  );
  const market = seedMarketData(snapshot, strike, maturity, precision);
  option.attachStrategy(new AnalyticBlackScholes({ precision }));
  option.attachMarketData(market);

  return {
    symbol: req.symbol,
    snapshot,
    terms: option.terms(),
    precision,
    price: option.price(),
    greeks: option.greeks(),
  };
}

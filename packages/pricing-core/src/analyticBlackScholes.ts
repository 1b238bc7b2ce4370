/**
 * Black-Scholes pricing for European options on a non-dividend stock.
 * Conventions:
 *  - Vega: per 1 vol point (0.01 absolute)
 *  - Theta: per calendar day (annual theta / 365)
 *  - Rho: per 1% rate move
 */
import { DEFAULT_PRECISION, type Greeks, type Precision } from "core-types";
import type { MarketDataStore } from "market-core";
import type { Instrument } from "./instrument";
import { normCdf, normPdf } from "./normal";
import { PricingStrategy } from "./pricingStrategy";

const DAYS_PER_YEAR = 365;
const PER_POINT = 0.01;

export interface BlackScholesInputs {
  spot: number;
  strike: number;
  T: number;      // time to expiry in years
  r: number;      // risk-free rate (decimal)
  vol: number;    // annualized volatility (decimal)
  isCall: boolean;
}

export interface BlackScholesResult extends Greeks {
  price: number;
  d1: number;
  d2: number;
}

export function blackScholes(inputs: BlackScholesInputs): BlackScholesResult {
  const { spot, strike, T, r, vol, isCall } = inputs;

  const sqrtT = Math.sqrt(T);
  const volT = vol * sqrtT;
  const df = Math.exp(-r * T);

  if (volT === 0) {
    return intrinsicLimit(inputs, df);
  }

  const d1 = (Math.log(spot / strike) + (r + 0.5 * vol * vol) * T) / volT;
  const d2 = d1 - volT;

  const Nd1 = normCdf(d1);
  const Nd2 = normCdf(d2);
  const Nmd1 = normCdf(-d1);
  const Nmd2 = normCdf(-d2);
  const nd1 = normPdf(d1);

  const decay = -(spot * vol * nd1) / (2 * sqrtT);

  const gamma = nd1 / (spot * vol * sqrtT);
  const vega = spot * sqrtT * nd1 * PER_POINT;

  if (isCall) {
    return {
      price: spot * Nd1 - strike * df * Nd2,
      delta: Nd1,
      gamma,
      vega,
      theta: (decay - r * strike * df * Nd2) / DAYS_PER_YEAR,
      rho: strike * T * df * Nd2 * PER_POINT,
      d1,
      d2,
    };
  }

  return {
    price: strike * df * Nmd2 - spot * Nmd1,
    delta: Nd1 - 1,
    gamma,
    vega,
    theta: (decay + r * strike * df * Nmd2) / DAYS_PER_YEAR,
    rho: -strike * T * df * Nmd2 * PER_POINT,
    d1,
    d2,
  };
}

/**
 * No diffusion: the option is worth discounted intrinsic on the forward.
 * N(d1) and N(d2) collapse to a step in S - K·e^(-rT), taking 1/2 at the money.
 */
function intrinsicLimit(inputs: BlackScholesInputs, df: number): BlackScholesResult {
  const { spot, strike, T, r, isCall } = inputs;
  const moneyness = spot - strike * df;
  const step = moneyness > 0 ? 1 : moneyness < 0 ? 0 : 0.5;
  const d = moneyness > 0 ? Infinity : moneyness < 0 ? -Infinity : 0;

  if (isCall) {
    return {
      price: Math.max(moneyness, 0),
      delta: step,
      gamma: 0,
      vega: 0,
      theta: (-r * strike * df * step) / DAYS_PER_YEAR,
      rho: strike * T * df * step * PER_POINT,
      d1: d,
      d2: d,
    };
  }

  return {
    price: Math.max(-moneyness, 0),
    delta: step - 1,
    gamma: 0,
    vega: 0,
    theta: (r * strike * df * (1 - step)) / DAYS_PER_YEAR,
    rho: -strike * T * df * (1 - step) * PER_POINT,
    d1: d,
    d2: d,
  };
}

export interface AnalyticBlackScholesOptions {
  precision?: Precision;
}

export class AnalyticBlackScholes extends PricingStrategy {
  readonly name = "analytic-black-scholes";

  constructor(options: AnalyticBlackScholesOptions = {}) {
    super(options.precision ?? DEFAULT_PRECISION);
  }

  price(instrument: Instrument, market: MarketDataStore): number {
    return this.round(blackScholes(this.inputs(instrument, market)).price);
  }

  greeks(instrument: Instrument, market: MarketDataStore): Greeks {
    const res = blackScholes(this.inputs(instrument, market));
    return {
      delta: this.round(res.delta),
      gamma: this.round(res.gamma),
      vega: this.round(res.vega),
      theta: this.round(res.theta),
      rho: this.round(res.rho),
    };
  }

  clone(): AnalyticBlackScholes {
    return new AnalyticBlackScholes({ precision: this.precision });
  }

  private inputs(instrument: Instrument, market: MarketDataStore): BlackScholesInputs {
    const { spot, strike, maturity, isCall } = instrument.terms();
    const r = market.getRate(maturity);
    const vol = market.getVolatility(strike, maturity);
    return { spot, strike, T: maturity, r, vol, isCall };
  }
}

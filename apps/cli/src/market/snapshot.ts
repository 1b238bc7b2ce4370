import { DEFAULT_PRECISION, type MarketSnapshot, type Precision } from "core-types";
import { MarketDataStore } from "market-core";
import { z } from "zod";

export const MarketSnapshotSchema = z.object({
  spotPrice: z.number().finite().positive(),
  volatility: z.number().finite().nonnegative(),
  riskFreeRate: z.number().finite().nonnegative(),
}) satisfies z.ZodType<MarketSnapshot>;

export type SnapshotOverrides = Partial<MarketSnapshot>;

export function applyOverrides(snapshot: MarketSnapshot, overrides: SnapshotOverrides): MarketSnapshot {
  return MarketSnapshotSchema.parse({
    spotPrice: overrides.spotPrice ?? snapshot.spotPrice,
    volatility: overrides.volatility ?? snapshot.volatility,
    riskFreeRate: overrides.riskFreeRate ?? snapshot.riskFreeRate,
  });
}

/** A one-point market: flat curve at the snapshot rate, flat surface at its vol. */
export function seedMarketData(
  snapshot: MarketSnapshot,
  strike: number,
  maturity: number,
  precision: Precision = DEFAULT_PRECISION
): MarketDataStore {
  const market = new MarketDataStore({ precision });
  market.addRate(maturity, snapshot.riskFreeRate);
  market.addVolatilityPoint(strike, maturity, snapshot.volatility);
  return market;
}

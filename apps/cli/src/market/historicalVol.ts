import { InvalidArgumentError } from "core-types";

export const TRADING_DAYS_PER_YEAR = 252;

/**
 * Annualized close-to-close volatility: sample stdev of daily log returns
 * scaled by sqrt(tradingDaysPerYear). Prices must be in chronological order.
 */
export function calculateHistoricalVolatility(
  prices: readonly number[],
  tradingDaysPerYear: number = TRADING_DAYS_PER_YEAR
): number {
  if (prices.length < 3) {
    throw new InvalidArgumentError(
      `Not enough price data to calculate volatility (need 3, got ${prices.length})`
    );
  }
  for (const p of prices) {
    if (!Number.isFinite(p) || p <= 0) {
      throw new InvalidArgumentError(`Invalid price in history: ${p}`);
    }
  }

  const logReturns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    logReturns.push(Math.log(prices[i] / prices[i - 1]));
  }

  const mean = logReturns.reduce((a, b) => a + b, 0) / logReturns.length;
  const variance =
    logReturns.reduce((acc, x) => acc + (x - mean) ** 2, 0) / (logReturns.length - 1);

  return Math.sqrt(variance * tradingDaysPerYear);
}

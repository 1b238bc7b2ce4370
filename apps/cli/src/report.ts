import { GREEK_NAMES } from "core-types";
import type { PricingReport } from "./pricer";

export function formatNumber(x: number, digits = 6): string {
  return String(Number(x.toFixed(digits)));
}

export function formatReport(report: PricingReport, digits = 6): string {
  const n = (x: number) => formatNumber(x, digits);
  const { snapshot, terms, greeks } = report;

  const lines = ["=== Market Data ==="];
  if (report.symbol) lines.push(`Symbol: ${report.symbol}`);
  lines.push(
    `Spot price: ${n(snapshot.spotPrice)}`,
    `Volatility: ${n(snapshot.volatility)}`,
    `Risk-free rate: ${n(snapshot.riskFreeRate)}`,
    "",
    "=== Option Parameters ===",
    `Type: ${terms.isCall ? "call" : "put"}`,
    `Strike: ${n(terms.strike)}`,
    `Maturity (years): ${n(terms.maturity)}`,
    `Notional: ${n(terms.notional)}`,
    "",
    "=== Pricing Results ===",
    `Option Price: ${n(report.price)}`,
    "",
    "=== Greeks ===",
    ...GREEK_NAMES.map((name) => `${name}: ${n(greeks[name])}`)
  );
  return lines.join("\n");
}

import { AppConfigSchema, type AppConfig } from "../config/schema";
import type { HttpClient, QueryParams } from "../market/dataFetcher";

export function testConfig(overrides: { alphaVantageKey?: string; fredKey?: string } = {}): AppConfig {
  return AppConfigSchema.parse({
    providers: {
      alphaVantage: { baseUrl: "https://av.test/query", apiKey: overrides.alphaVantageKey ?? "test-av-key" },
      fred: { baseUrl: "https://fred.test/observations", apiKey: overrides.fredKey ?? "test-fred-key", seriesId: "DTB3" },
    },
    http: { timeoutMs: 1000, rateLimitRetryDelayMs: 15000 },
    fallbacks: { volatility: 0.3, riskFreeRate: 0.05 },
    history: { windowDays: 30, tradingDaysPerYear: 252 },
  });
}

export type Route = (url: string, params: QueryParams) => unknown;

/** In-process HttpClient; a route returning an Error rejects the request. */
export class StubHttp implements HttpClient {
  readonly calls: Array<{ url: string; params: QueryParams }> = [];

  constructor(private readonly route: Route) {}

  async getJson(url: string, params: QueryParams): Promise<unknown> {
    this.calls.push({ url, params });
    const res = this.route(url, params);
    if (res instanceof Error) throw res;
    return res;
  }
}

export function dailySeries(closes: Record<string, number>) {
  const series: Record<string, { "4. close": string }> = {};
  for (const [date, close] of Object.entries(closes)) {
    series[date] = { "4. close": close.toFixed(4) };
  }
  return { "Time Series (Daily)": series };
}

/**
 * Market data retrieval over HTTP:
 *  - spot from Alpha Vantage GLOBAL_QUOTE
 *  - historical vol from Alpha Vantage TIME_SERIES_DAILY closes
 *  - risk-free rate from FRED (3M T-bill, DTB3)
 *
 * Vol and rate degrade to the configured fallbacks; spot never does.
 */
import axios, { type AxiosAdapter } from "axios";
import type { MarketSnapshot } from "core-types";
import { z } from "zod";
import { getApiKey } from "../config/configManager";
import type { AppConfig } from "../config/schema";
import { calculateHistoricalVolatility } from "./historicalVol";
import { MarketSnapshotSchema } from "./snapshot";

export class DataFetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataFetchError";
  }
}

export type QueryParams = Record<string, string | number>;

export interface HttpClient {
  getJson(url: string, params: QueryParams): Promise<unknown>;
}

export interface SnapshotSource {
  fetchStockData(symbol: string): Promise<MarketSnapshot>;
}

export interface HttpClientOptions {
  /** Replaces axios' transport; tests serve responses in process. */
  adapter?: AxiosAdapter;
}

export function createHttpClient(timeoutMs: number, options: HttpClientOptions = {}): HttpClient {
  const client = axios.create({ timeout: timeoutMs, adapter: options.adapter });
  return {
    async getJson(url, params) {
      try {
        const response = await client.get<unknown>(url, { params });
        return response.data;
      } catch (err) {
        const reason = axios.isAxiosError(err) ? err.message : String(err);
        throw new DataFetchError(`GET ${url} failed: ${reason}`);
      }
    },
  };
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const GlobalQuoteSchema = z.object({
  "Global Quote": z.object({
    "05. price": z.string(),
  }),
});

const DailySeriesSchema = z.object({
  "Time Series (Daily)": z.record(z.object({ "4. close": z.string() })),
});

const FredObservationsSchema = z.object({
  observations: z.array(z.object({ value: z.string() })),
});

const ProviderNoticeSchema = z.object({
  Note: z.string().optional(),
  "Error Message": z.string().optional(),
});

const RATE_LIMIT_MARKER = "API call frequency";

function readNotice(data: unknown): { note?: string; error?: string } {
  const parsed = ProviderNoticeSchema.safeParse(data);
  if (!parsed.success) return {};
  return { note: parsed.data.Note, error: parsed.data["Error Message"] };
}

/** Closing prices of the most recent `windowDays` sessions, oldest first. */
export function recentCloses(
  series: Record<string, { "4. close": string }>,
  windowDays: number
): number[] {
  return Object.keys(series)
    .sort()
    .slice(-windowDays)
    .map((date) => Number(series[date]["4. close"]));
}

export interface MarketDataFetcherDeps {
  http?: HttpClient;
  sleep?: (ms: number) => Promise<void>;
}

export class MarketDataFetcher implements SnapshotSource {
  private readonly http: HttpClient;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly cfg: AppConfig, deps: MarketDataFetcherDeps = {}) {
    this.http = deps.http ?? createHttpClient(cfg.http.timeoutMs);
    this.sleep = deps.sleep ?? delay;
  }

  async fetchStockData(symbol: string): Promise<MarketSnapshot> {
    const spotPrice = await this.fetchSpotPrice(symbol);
    const volatility = await this.withFallback(
      "volatility",
      () => this.fetchHistoricalVolatility(symbol),
      this.cfg.fallbacks.volatility
    );
    const riskFreeRate = await this.withFallback(
      "risk-free rate",
      () => this.fetchRiskFreeRate(),
      this.cfg.fallbacks.riskFreeRate
    );

    const snapshot = MarketSnapshotSchema.safeParse({ spotPrice, volatility, riskFreeRate });
    if (!snapshot.success) {
      throw new DataFetchError(`Unusable market data for ${symbol}: ${snapshot.error.message}`);
    }
    return snapshot.data;
  }

  async fetchSpotPrice(symbol: string): Promise<number> {
    const { baseUrl } = this.cfg.providers.alphaVantage;
    const data = await this.http.getJson(baseUrl, {
      function: "GLOBAL_QUOTE",
      symbol,
      apikey: getApiKey(this.cfg, "alphaVantage"),
    });

    const parsed = GlobalQuoteSchema.safeParse(data);
    const price = parsed.success ? Number(parsed.data["Global Quote"]["05. price"]) : NaN;
    if (!Number.isFinite(price) || price <= 0) {
      throw new DataFetchError(`Failed to fetch stock data for ${symbol}`);
    }
    return price;
  }

  async fetchHistoricalVolatility(symbol: string): Promise<number> {
    const { baseUrl } = this.cfg.providers.alphaVantage;
    const params: QueryParams = {
      function: "TIME_SERIES_DAILY",
      symbol,
      apikey: getApiKey(this.cfg, "alphaVantage"),
      outputsize: "compact",
    };

    let data = await this.http.getJson(baseUrl, params);
    let notice = readNotice(data);

    if (notice.note?.includes(RATE_LIMIT_MARKER)) {
      const waitMs = this.cfg.http.rateLimitRetryDelayMs;
      console.warn(`[fetcher] Alpha Vantage rate limit hit, retrying in ${waitMs}ms`);
      await this.sleep(waitMs);
      data = await this.http.getJson(baseUrl, params);
      notice = readNotice(data);
    }

    if (notice.note !== undefined || notice.error !== undefined) {
      const fallback = this.cfg.fallbacks.volatility;
      console.warn(`[fetcher] Alpha Vantage refused ${symbol} (${notice.note ?? notice.error}), using volatility ${fallback}`);
      return fallback;
    }

    const parsed = DailySeriesSchema.safeParse(data);
    if (!parsed.success) {
      throw new DataFetchError("Invalid response format from Alpha Vantage");
    }

    const { windowDays, tradingDaysPerYear } = this.cfg.history;
    const closes = recentCloses(parsed.data["Time Series (Daily)"], windowDays);
    return calculateHistoricalVolatility(closes, tradingDaysPerYear);
  }

  async fetchRiskFreeRate(): Promise<number> {
    const { baseUrl, seriesId } = this.cfg.providers.fred;
    const data = await this.http.getJson(baseUrl, {
      series_id: seriesId,
      api_key: getApiKey(this.cfg, "fred"),
      file_type: "json",
      sort_order: "desc",
      limit: 1,
    });

    const parsed = FredObservationsSchema.safeParse(data);
    const latest = parsed.success ? parsed.data.observations[0] : undefined;
    // FRED reports missing values as "."
    if (latest && latest.value !== ".") {
      const pct = Number(latest.value);
      if (Number.isFinite(pct)) return pct / 100;
    }

    const fallback = this.cfg.fallbacks.riskFreeRate;
    console.warn(`[fetcher] No usable ${seriesId} observation, using rate ${fallback}`);
    return fallback;
  }

  private async withFallback(what: string, fetch: () => Promise<number>, fallback: number): Promise<number> {
    try {
      return await fetch();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[fetcher] Could not fetch ${what}: ${reason}, using ${fallback}`);
      return fallback;
    }
  }
}

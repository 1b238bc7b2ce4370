import { z } from "zod";

export const ProviderSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string(),
});

export const ProvidersSchema = z.object({
  alphaVantage: ProviderSchema,
  fred: ProviderSchema.extend({
    seriesId: z.string().min(1),
  }),
});

export const HttpSchema = z.object({
  timeoutMs: z.number().int().positive(),
  rateLimitRetryDelayMs: z.number().int().nonnegative(),
});

export const FallbacksSchema = z.object({
  volatility: z.number().nonnegative(),
  riskFreeRate: z.number().nonnegative(),
});

export const HistorySchema = z.object({
  windowDays: z.number().int().min(2),
  tradingDaysPerYear: z.number().positive(),
});

export const AppConfigSchema = z.object({
  providers: ProvidersSchema,
  http: HttpSchema,
  fallbacks: FallbacksSchema,
  history: HistorySchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ProviderName = keyof AppConfig["providers"];

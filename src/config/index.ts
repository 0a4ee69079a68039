/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const ConfigSchema = z.object({
  // Data providers (both optional: Yahoo and the default rate cover for them)
  alphaVantageApiKey: z.string().default(""),
  fredApiKey: z.string().default(""),
  priceProvider: z.enum(["alphavantage", "yahoo"]).default("alphavantage"),
  universeUrl: z.string().url().optional(),
  requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
  throttleMs: z.coerce.number().int().min(0).default(800),

  // Pricing
  defaultRiskFreeRate: z.coerce.number().finite().default(0.05),
  zeroVolatilityPolicy: z.enum(["skip", "intrinsic"]).default("skip"),

  // Screening defaults (validated again per run)
  screen: z.object({
    count: z.coerce.number().default(50),
    capital: z.coerce.number().default(1000),
  }),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().default(3000),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    alphaVantageApiKey: env.ALPHA_VANTAGE_API_KEY,
    fredApiKey: env.FRED_API_KEY,
    priceProvider: env.PRICE_PROVIDER,
    universeUrl: env.UNIVERSE_URL || undefined,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    throttleMs: env.THROTTLE_MS,
    defaultRiskFreeRate: env.DEFAULT_RISK_FREE_RATE,
    zeroVolatilityPolicy: env.ZERO_VOLATILITY_POLICY,
    screen: {
      count: env.SCREEN_COUNT,
      capital: env.SCREEN_CAPITAL,
    },
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
  };

  return ConfigSchema.parse(raw);
}

/** Singleton config instance */
export const config = loadConfig();

/**
 * Wires providers, pacing and the pipeline into one screening call
 * shared by the CLI and the HTTP API.
 */

import { ScreeningPipeline } from "./pipeline.js";
import { leaderboard } from "./leaderboard.js";
import { summaryLine, toDisplayRow, type DisplayRow } from "./report.js";
import { createPacingGate, type PacingGate } from "./throttle.js";
import { createPriceProvider } from "../api/market-data/index.js";
import { FredRateProvider } from "../api/rates/fred.js";
import { Sp500UniverseProvider } from "../api/universe/sp500.js";
import { parseScreeningParams } from "../utils/validation.js";
import type { Config } from "../config/index.js";
import type { PriceSeriesProvider, RiskFreeRateProvider, UniverseProvider } from "../types/market.js";
import type {
  RateContext,
  ResultRow,
  ScreeningProgress,
  SkippedSymbol,
  ZeroVolatilityPolicy,
} from "../types/screening.js";

export interface ScreenerDependencies {
  priceProvider: PriceSeriesProvider;
  rateProvider: RiskFreeRateProvider;
  universeProvider: UniverseProvider;
  gate: PacingGate;
  fallbackRate: number;
  zeroVolatilityPolicy: ZeroVolatilityPolicy;
}

/** Observer for presentation layers that render progress */
export interface ProgressObserver {
  onProgress(progress: ScreeningProgress): void;
}

export interface ScreeningReport {
  /** Full-precision leaderboard rows */
  ranked: ResultRow[];
  /** Leaderboard rounded for display */
  leaderboard: DisplayRow[];
  skipped: SkippedSymbol[];
  rate: RateContext;
  capital: number;
  processed: number;
  cancelled: boolean;
  warnings: string[];
  summary: string;
}

export function createDependencies(config: Config): ScreenerDependencies {
  return {
    priceProvider: createPriceProvider({
      priceProvider: config.priceProvider,
      alphaVantageApiKey: config.alphaVantageApiKey,
      requestTimeoutMs: config.requestTimeoutMs,
    }),
    rateProvider: new FredRateProvider({
      apiKey: config.fredApiKey,
      timeoutMs: config.requestTimeoutMs,
    }),
    universeProvider: new Sp500UniverseProvider({
      url: config.universeUrl,
      timeoutMs: config.requestTimeoutMs,
    }),
    gate: createPacingGate(config.throttleMs),
    fallbackRate: config.defaultRiskFreeRate,
    zeroVolatilityPolicy: config.zeroVolatilityPolicy,
  };
}

/**
 * Validate user parameters, screen the universe and rank the results.
 * Throws InvalidConfigurationError before any data is fetched.
 */
export async function runScreen(
  input: unknown,
  deps: ScreenerDependencies,
  options: { observer?: ProgressObserver; signal?: AbortSignal } = {}
): Promise<ScreeningReport> {
  const params = parseScreeningParams(input);

  const universe = await deps.universeProvider.fetchUniverse();
  const pipeline = new ScreeningPipeline({
    priceProvider: deps.priceProvider,
    rateProvider: deps.rateProvider,
    gate: deps.gate,
    fallbackRate: deps.fallbackRate,
    zeroVolatilityPolicy: deps.zeroVolatilityPolicy,
  });

  const { observer } = options;
  if (observer) {
    pipeline.on("progress", (progress) => observer.onProgress(progress));
  }

  const result = await pipeline.run({
    universe: universe.map((m) => m.symbol),
    count: params.count,
    capital: params.capital,
    signal: options.signal,
  });

  const ranked = leaderboard(result.rows);

  return {
    ranked,
    leaderboard: ranked.map(toDisplayRow),
    skipped: result.skipped,
    rate: result.rate,
    capital: result.capital,
    processed: result.processed,
    cancelled: result.cancelled,
    warnings: result.warnings,
    summary: summaryLine(result.capital),
  };
}

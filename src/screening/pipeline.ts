/**
 * Screening Pipeline
 *
 * Walks the first `count` symbols of the universe in order:
 *   1. waits on the pacing gate
 *   2. fetches daily closes
 *   3. estimates volatility and prices a 30-day ATM call
 *   4. converts the price into affordable contracts
 *
 * Each symbol ends as a row or a recorded skip; nothing a single symbol
 * does can abort the run. Progress is emitted after every symbol.
 */

import { EventEmitter } from "eventemitter3";
import { affordableContracts, estimateVolatility, intrinsicCallQuote, priceCall } from "../quant/index.js";
import { InvalidConfigurationError, ScreenerError } from "../utils/errors.js";
import { moduleLogger } from "../utils/logger.js";
import { NoopGate, type PacingGate } from "./throttle.js";
import type { PriceSeries, PriceSeriesProvider, RiskFreeRateProvider } from "../types/market.js";
import type {
  EvaluationContext,
  MarketSnapshot,
  OptionQuote,
  RateContext,
  ResultRow,
  ScreeningProgress,
  ScreeningRequest,
  ScreeningResult,
  SkippedSymbol,
  SymbolOutcome,
  ZeroVolatilityPolicy,
} from "../types/screening.js";

const log = moduleLogger("pipeline");

/** Closes required before a volatility estimate is trusted */
export const MIN_HISTORY = 30;
/** 30-day expiration in years */
export const MATURITY_YEARS = 30 / 365;
export const DEFAULT_RISK_FREE_RATE = 0.05;

export interface ScreeningEvents {
  progress: (progress: ScreeningProgress) => void;
  row: (row: ResultRow) => void;
  skipped: (skip: SkippedSymbol) => void;
}

export interface PipelineOptions {
  priceProvider: PriceSeriesProvider;
  rateProvider: RiskFreeRateProvider;
  gate?: PacingGate;
  fallbackRate?: number;
  zeroVolatilityPolicy?: ZeroVolatilityPolicy;
}

/**
 * Fetch the risk-free rate once for a run.
 * Any failure falls back to `fallbackRate` and produces a warning.
 */
export async function resolveRateContext(
  provider: RiskFreeRateProvider,
  fallbackRate: number = DEFAULT_RISK_FREE_RATE
): Promise<{ context: RateContext; warning?: string }> {
  let rate: number | null = null;
  let detail = "no rate returned";
  try {
    rate = await provider.fetchRiskFreeRate();
  } catch (err) {
    detail = String(err);
  }

  if (rate !== null && Number.isFinite(rate)) {
    log.info(`Risk-free rate from ${provider.name}: ${(rate * 100).toFixed(2)}%`);
    return { context: { rate, source: "provider" } };
  }

  const warning =
    `Failed to fetch risk-free rate from ${provider.name}; ` +
    `using default ${(fallbackRate * 100).toFixed(2)}%`;
  log.warn(warning, { detail });
  return { context: { rate: fallbackRate, source: "default" }, warning };
}

/** ATM call (K = S) for the run's fixed maturity and rate */
export function quoteAtTheMoney(snapshot: MarketSnapshot, ctx: EvaluationContext): OptionQuote {
  const { spot, volatility } = snapshot;
  if (volatility === 0 && ctx.zeroVolatilityPolicy === "intrinsic") {
    return intrinsicCallQuote(spot, spot);
  }
  return priceCall({ S: spot, K: spot, T: ctx.maturity, r: ctx.rate.rate, sigma: volatility });
}

/**
 * Turn one symbol's price history into a row, or say why it was skipped.
 */
export function evaluateSymbol(
  symbol: string,
  index: number,
  series: PriceSeries | null,
  ctx: EvaluationContext
): SymbolOutcome {
  if (series === null) {
    return { status: "skipped", symbol, index, reason: "unavailable" };
  }

  const observations = series.observations;
  if (observations.length < ctx.minHistory) {
    return {
      status: "skipped",
      symbol,
      index,
      reason: "insufficient_history",
      detail: `${observations.length} of ${ctx.minHistory} closes`,
    };
  }

  try {
    const snapshot: MarketSnapshot = {
      symbol,
      spot: observations[observations.length - 1].close,
      volatility: estimateVolatility(series),
    };
    const quote = quoteAtTheMoney(snapshot, ctx);

    return {
      status: "ok",
      row: {
        symbol,
        index,
        spot: snapshot.spot,
        volatility: snapshot.volatility,
        callPrice: quote.price,
        delta: quote.delta,
        vega: quote.vega,
        contracts: affordableContracts(quote.price, ctx.capital),
      },
    };
  } catch (err) {
    if (err instanceof ScreenerError) {
      const reason = err.code === "INSUFFICIENT_DATA" ? "insufficient_history" : "degenerate_inputs";
      return { status: "skipped", symbol, index, reason, detail: err.message };
    }
    throw err;
  }
}

function validateRequest(request: ScreeningRequest): void {
  const issues: string[] = [];
  if (!Number.isFinite(request.capital) || request.capital <= 0) {
    issues.push(`capital must be positive, got ${request.capital}`);
  }
  if (!Number.isInteger(request.count) || request.count <= 0) {
    issues.push(`count must be a positive integer, got ${request.count}`);
  }
  if (issues.length > 0) throw new InvalidConfigurationError(issues);
}

export class ScreeningPipeline extends EventEmitter<ScreeningEvents> {
  private readonly priceProvider: PriceSeriesProvider;
  private readonly rateProvider: RiskFreeRateProvider;
  private readonly gate: PacingGate;
  private readonly fallbackRate: number;
  private readonly zeroVolatilityPolicy: ZeroVolatilityPolicy;

  constructor(options: PipelineOptions) {
    super();
    this.priceProvider = options.priceProvider;
    this.rateProvider = options.rateProvider;
    this.gate = options.gate ?? new NoopGate();
    this.fallbackRate = options.fallbackRate ?? DEFAULT_RISK_FREE_RATE;
    this.zeroVolatilityPolicy = options.zeroVolatilityPolicy ?? "skip";
  }

  /**
   * Screen the first `count` symbols of `universe`.
   *
   * Throws InvalidConfigurationError before fetching anything when
   * capital or count is not positive.
   */
  async run(request: ScreeningRequest): Promise<ScreeningResult> {
    validateRequest(request);

    const symbols = request.universe.slice(0, request.count);
    const total = symbols.length;
    const warnings: string[] = [];

    const { context: rate, warning } = await resolveRateContext(this.rateProvider, this.fallbackRate);
    if (warning) warnings.push(warning);

    const ctx: EvaluationContext = {
      rate,
      capital: request.capital,
      maturity: MATURITY_YEARS,
      minHistory: MIN_HISTORY,
      zeroVolatilityPolicy: this.zeroVolatilityPolicy,
    };

    const rows: ResultRow[] = [];
    const skipped: SkippedSymbol[] = [];
    let processed = 0;
    let cancelled = false;

    log.info(`Screening ${total} symbols via ${this.priceProvider.name}`);

    for (const [index, symbol] of symbols.entries()) {
      if (request.signal?.aborted) {
        cancelled = true;
        log.warn(`Screening cancelled after ${processed} of ${total} symbols`);
        break;
      }

      const outcome = await this.screenSymbol(symbol, index, ctx);
      if (outcome.status === "ok") {
        rows.push(outcome.row);
        this.emit("row", outcome.row);
      } else {
        const { status: _status, ...skip } = outcome;
        skipped.push(skip);
        log.debug(`Skipped ${symbol}: ${skip.reason}`, skip.detail ? { detail: skip.detail } : {});
        this.emit("skipped", skip);
      }

      processed = index + 1;
      this.emit("progress", {
        completed: processed,
        total,
        fraction: processed / total,
        symbol,
      });
    }

    log.info(`Screening done: ${rows.length} priced, ${skipped.length} skipped`);

    return {
      rows,
      skipped,
      rate,
      capital: request.capital,
      processed,
      cancelled,
      warnings,
    };
  }

  private async screenSymbol(
    symbol: string,
    index: number,
    ctx: EvaluationContext
  ): Promise<SymbolOutcome> {
    let series: PriceSeries | null;
    try {
      await this.gate.wait();
      series = await this.priceProvider.fetchPriceSeries(symbol);
    } catch (err) {
      return { status: "skipped", symbol, index, reason: "provider_error", detail: String(err) };
    }

    try {
      return evaluateSymbol(symbol, index, series, ctx);
    } catch (err) {
      return { status: "skipped", symbol, index, reason: "degenerate_inputs", detail: String(err) };
    }
  }
}

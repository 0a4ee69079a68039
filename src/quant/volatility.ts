/**
 * Historical volatility from daily closes.
 */

import type { PriceSeries } from "../types/market.js";
import { InsufficientDataError } from "../utils/errors.js";

export const TRADING_DAYS_PER_YEAR = 252;

/** Daily log returns ln(P_t / P_{t-1}) */
export function logReturns(closes: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    returns.push(Math.log(closes[i] / closes[i - 1]));
  }
  return returns;
}

/** Sample standard deviation (n - 1 divisor) */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const sqDiffs = values.map((v) => (v - mean) ** 2);
  return Math.sqrt(sqDiffs.reduce((s, v) => s + v, 0) / (values.length - 1));
}

/**
 * Annualized volatility over every return in the series.
 * Two prices give a single return and therefore a volatility of 0.
 */
export function estimateVolatility(series: PriceSeries): number {
  const closes = series.observations.map((o) => o.close);
  if (closes.length < 2) {
    throw new InsufficientDataError(closes.length);
  }
  return sampleStdDev(logReturns(closes)) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

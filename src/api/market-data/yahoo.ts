/**
 * Yahoo Finance Market Data — Free Fallback
 *
 * Uses Yahoo Finance's public chart API for daily adjusted closes.
 * No API key required. Used when no Alpha Vantage key is configured.
 */

import { z } from "zod";
import { fetchJson } from "../http.js";
import { moduleLogger } from "../../utils/logger.js";
import type { PriceObservation, PriceSeries, PriceSeriesProvider } from "../../types/market.js";

const log = moduleLogger("yahoo");

const YAHOO_BASE = "https://query1.finance.yahoo.com/v8/finance/chart";

const nullableNumbers = z.array(z.number().nullable());

const ChartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(z.object({ close: nullableNumbers.optional() })).optional(),
            adjclose: z.array(z.object({ adjclose: nullableNumbers.optional() })).optional(),
          }),
        })
      )
      .nullable(),
  }),
});

export interface YahooOptions {
  timeoutMs: number;
  range?: string;
}

/** Parse a chart body into ascending, de-duplicated daily observations */
export function parseChart(symbol: string, payload: unknown): PriceSeries | null {
  const parsed = ChartSchema.safeParse(payload);
  if (!parsed.success) return null;

  const result = parsed.data.chart.result?.[0];
  if (!result?.timestamp) return null;

  // Prefer split/dividend-adjusted closes; fall back to raw closes
  const closes =
    result.indicators.adjclose?.[0]?.adjclose ?? result.indicators.quote?.[0]?.close;
  if (!closes) return null;

  const byDate = new Map<string, number>();
  result.timestamp.forEach((ts, i) => {
    const close = closes[i];
    if (close != null && Number.isFinite(close) && close > 0) {
      byDate.set(new Date(ts * 1000).toISOString().slice(0, 10), close);
    }
  });
  if (byDate.size === 0) return null;

  const observations: PriceObservation[] = [...byDate.entries()]
    .map(([date, close]) => ({ date, close }))
    .sort((a, b) => a.date.localeCompare(b.date));

  return { symbol, observations };
}

export class YahooPriceProvider implements PriceSeriesProvider {
  readonly name = "Yahoo Finance";
  private readonly options: YahooOptions;

  constructor(options: YahooOptions) {
    this.options = options;
  }

  async fetchPriceSeries(symbol: string): Promise<PriceSeries | null> {
    // Yahoo spells class shares with a dash (BRK-B)
    const yahooSymbol = symbol.replace(/\./g, "-");
    const range = this.options.range ?? "6mo";
    const url = `${YAHOO_BASE}/${encodeURIComponent(yahooSymbol)}?interval=1d&range=${range}`;

    try {
      const json = await fetchJson(url, { timeoutMs: this.options.timeoutMs });
      const series = parseChart(symbol, json);
      if (!series) {
        log.warn(`Yahoo returned no data for ${symbol}`);
        return null;
      }
      log.debug(`Yahoo: ${series.observations.length} closes for ${symbol}`);
      return series;
    } catch (err) {
      log.error(`Yahoo chart fetch failed for ${symbol}`, { error: String(err) });
      return null;
    }
  }
}

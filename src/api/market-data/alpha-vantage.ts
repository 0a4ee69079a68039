/**
 * Alpha Vantage daily adjusted closes.
 *
 * `outputsize=compact` returns the latest 100 trading days. The free tier
 * answers over-quota requests with HTTP 200 and a "Note"/"Information"
 * body instead of a time series; those count as unavailable.
 */

import { z } from "zod";
import { fetchJson, redactUrl } from "../http.js";
import { moduleLogger } from "../../utils/logger.js";
import type { PriceObservation, PriceSeries, PriceSeriesProvider } from "../../types/market.js";

const log = moduleLogger("alpha-vantage");

const ALPHA_VANTAGE_BASE = "https://www.alphavantage.co/query";

const DailyAdjustedSchema = z.object({
  "Time Series (Daily)": z.record(
    z.string(),
    z.object({ "5. adjusted close": z.string() }).passthrough()
  ),
});

const NoticeSchema = z.object({
  Note: z.string().optional(),
  Information: z.string().optional(),
  "Error Message": z.string().optional(),
});

export interface AlphaVantageOptions {
  apiKey: string;
  timeoutMs: number;
  outputSize?: "compact" | "full";
}

/** Parse a TIME_SERIES_DAILY_ADJUSTED body into ascending observations */
export function parseDailyAdjusted(symbol: string, payload: unknown): PriceSeries | null {
  const parsed = DailyAdjustedSchema.safeParse(payload);
  if (!parsed.success) return null;

  const observations: PriceObservation[] = [];
  for (const [date, bar] of Object.entries(parsed.data["Time Series (Daily)"])) {
    const close = Number(bar["5. adjusted close"]);
    if (Number.isFinite(close) && close > 0) {
      observations.push({ date, close });
    }
  }
  if (observations.length === 0) return null;

  observations.sort((a, b) => a.date.localeCompare(b.date));
  return { symbol, observations };
}

export class AlphaVantagePriceProvider implements PriceSeriesProvider {
  readonly name = "Alpha Vantage";
  private readonly options: AlphaVantageOptions;

  constructor(options: AlphaVantageOptions) {
    this.options = options;
  }

  async fetchPriceSeries(symbol: string): Promise<PriceSeries | null> {
    const url =
      `${ALPHA_VANTAGE_BASE}?function=TIME_SERIES_DAILY_ADJUSTED` +
      `&symbol=${encodeURIComponent(symbol)}` +
      `&outputsize=${this.options.outputSize ?? "compact"}` +
      `&apikey=${encodeURIComponent(this.options.apiKey)}`;

    try {
      const json = await fetchJson(url, { timeoutMs: this.options.timeoutMs });
      const series = parseDailyAdjusted(symbol, json);
      if (!series) {
        const notice = NoticeSchema.safeParse(json);
        const message = notice.success
          ? notice.data.Note ?? notice.data.Information ?? notice.data["Error Message"]
          : undefined;
        log.warn(`Alpha Vantage returned no series for ${symbol}`, message ? { notice: message } : {});
        return null;
      }
      log.debug(`Alpha Vantage: ${series.observations.length} closes for ${symbol}`);
      return series;
    } catch (err) {
      log.error(`Alpha Vantage fetch failed for ${symbol} (${redactUrl(url)})`, { error: String(err) });
      return null;
    }
  }
}

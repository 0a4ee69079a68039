/**
 * FRED risk-free rate — 1-month Treasury constant maturity (DGS1MO).
 *
 * FRED publishes percent values as strings and marks market holidays
 * with ".", so the latest numeric observation wins.
 */

import { z } from "zod";
import { fetchJson, redactUrl } from "../http.js";
import { moduleLogger } from "../../utils/logger.js";
import type { RiskFreeRateProvider } from "../../types/market.js";

const log = moduleLogger("fred");

const FRED_BASE = "https://api.stlouisfed.org/fred/series/observations";

const FredObservationsSchema = z.object({
  observations: z.array(
    z.object({
      date: z.string(),
      value: z.string(),
    })
  ),
});

export interface FredRateProviderOptions {
  apiKey: string;
  seriesId?: string;
  timeoutMs: number;
}

/** Latest numeric percent value, as a decimal fraction */
export function parseLatestRate(payload: unknown): number | null {
  const parsed = FredObservationsSchema.safeParse(payload);
  if (!parsed.success) return null;

  for (let i = parsed.data.observations.length - 1; i >= 0; i--) {
    const { value } = parsed.data.observations[i];
    const pct = Number(value);
    if (value.trim() !== "" && Number.isFinite(pct)) {
      return pct / 100;
    }
  }
  return null;
}

export class FredRateProvider implements RiskFreeRateProvider {
  readonly name = "FRED";
  private readonly options: FredRateProviderOptions;

  constructor(options: FredRateProviderOptions) {
    this.options = options;
  }

  async fetchRiskFreeRate(): Promise<number | null> {
    if (!this.options.apiKey) {
      log.warn("FRED_API_KEY not set, risk-free rate unavailable");
      return null;
    }

    const seriesId = this.options.seriesId ?? "DGS1MO";
    const url =
      `${FRED_BASE}?series_id=${encodeURIComponent(seriesId)}` +
      `&api_key=${encodeURIComponent(this.options.apiKey)}&file_type=json`;

    try {
      const json = await fetchJson(url, { timeoutMs: this.options.timeoutMs });
      const rate = parseLatestRate(json);
      if (rate === null) {
        log.warn(`FRED returned no usable ${seriesId} observation`);
      }
      return rate;
    } catch (err) {
      log.error(`FRED rate fetch failed (${redactUrl(url)})`, { error: String(err) });
      return null;
    }
  }
}

import { AlphaVantagePriceProvider } from "./alpha-vantage.js";
import { YahooPriceProvider } from "./yahoo.js";
import type { PriceSeriesProvider } from "../../types/market.js";

export interface PriceProviderSettings {
  priceProvider: "alphavantage" | "yahoo";
  alphaVantageApiKey: string;
  requestTimeoutMs: number;
}

/** Alpha Vantage when a key is configured and not overridden, else Yahoo */
export function createPriceProvider(settings: PriceProviderSettings): PriceSeriesProvider {
  if (settings.priceProvider === "alphavantage" && settings.alphaVantageApiKey) {
    return new AlphaVantagePriceProvider({
      apiKey: settings.alphaVantageApiKey,
      timeoutMs: settings.requestTimeoutMs,
    });
  }
  return new YahooPriceProvider({ timeoutMs: settings.requestTimeoutMs });
}

/**
 * Market data type definitions.
 * Covers daily price history, the ticker universe, and provider interfaces.
 */

/** One daily adjusted close */
export interface PriceObservation {
  date: string; // YYYY-MM-DD
  close: number;
}

/** Daily adjusted closes for one symbol, ascending by date, no duplicate dates */
export interface PriceSeries {
  symbol: string;
  observations: PriceObservation[];
}

/** Member of the screening universe */
export interface UniverseMember {
  symbol: string;
  name?: string;
  sector?: string;
}

/**
 * Daily price history source.
 * Resolves to null when the symbol is unavailable for any reason.
 */
export interface PriceSeriesProvider {
  readonly name: string;
  fetchPriceSeries(symbol: string): Promise<PriceSeries | null>;
}

/**
 * Annualized short-term risk-free rate as a decimal (0.05 = 5%).
 * Resolves to null when the rate cannot be obtained.
 */
export interface RiskFreeRateProvider {
  readonly name: string;
  fetchRiskFreeRate(): Promise<number | null>;
}

/** Ordered set of symbols available for screening */
export interface UniverseProvider {
  readonly name: string;
  fetchUniverse(): Promise<UniverseMember[]>;
}

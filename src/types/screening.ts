/**
 * Screening pipeline type definitions.
 * All numbers are full precision; rounding happens in the report layer.
 */

/** Per-symbol inputs to the pricer */
export interface MarketSnapshot {
  readonly symbol: string;
  readonly spot: number;
  readonly volatility: number;
}

/** Risk-free rate shared read-only by every symbol of one run */
export interface RateContext {
  readonly rate: number;
  readonly source: "provider" | "default";
}

/** Pricer output for one snapshot */
export interface OptionQuote {
  price: number;
  delta: number; // ∂C/∂S = Φ(d1)
  vega: number;  // ∂C/∂σ per unit of σ
}

/** One successfully evaluated symbol */
export interface ResultRow {
  readonly symbol: string;
  /** Position in the screened universe, used to break ranking ties */
  readonly index: number;
  readonly spot: number;
  readonly volatility: number;
  readonly callPrice: number;
  readonly delta: number;
  readonly vega: number;
  readonly contracts: number;
}

export type SkipReason =
  | "unavailable"          // provider returned nothing
  | "insufficient_history" // fewer than the trusted number of closes
  | "degenerate_inputs"    // zero volatility or non-finite pricer inputs
  | "provider_error";      // provider threw despite its contract

export interface SkippedSymbol {
  symbol: string;
  index: number;
  reason: SkipReason;
  detail?: string;
}

export type SymbolOutcome =
  | { status: "ok"; row: ResultRow }
  | ({ status: "skipped" } & SkippedSymbol);

/** What happens when a symbol's estimated volatility is zero */
export type ZeroVolatilityPolicy = "skip" | "intrinsic";

/** Fixed contract terms and run-wide inputs for evaluating one symbol */
export interface EvaluationContext {
  rate: RateContext;
  capital: number;
  /** Time to expiration in years */
  maturity: number;
  minHistory: number;
  zeroVolatilityPolicy: ZeroVolatilityPolicy;
}

export interface ScreeningProgress {
  completed: number;
  total: number;
  /** completed / total, in [0, 1] */
  fraction: number;
  symbol: string;
}

export interface ScreeningRequest {
  universe: readonly string[];
  count: number;
  capital: number;
  signal?: AbortSignal;
}

export interface ScreeningResult {
  /** Successful rows in evaluation order */
  rows: ResultRow[];
  skipped: SkippedSymbol[];
  rate: RateContext;
  capital: number;
  /** Symbols actually attempted */
  processed: number;
  cancelled: boolean;
  warnings: string[];
}

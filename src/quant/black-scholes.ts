/**
 * Black-Scholes Option Pricing Model
 *
 * Analytical price, delta and vega of a European call on a
 * non-dividend-paying underlying, continuous compounding.
 *
 * Reference: Black, F. & Scholes, M. (1973)
 */

import type { OptionQuote } from "../types/screening.js";
import { DegenerateInputsError } from "../utils/errors.js";

/**
 * Standard normal CDF (cumulative distribution function).
 * Uses Abramowitz & Stegun erf approximation (equation 7.1.26)
 * with relation: Φ(x) = (1 + erf(x/√2)) / 2
 */
export function normalCDF(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  const z = Math.abs(x) / Math.SQRT2;
  const t = 1.0 / (1.0 + p * z);
  const y =
    1.0 -
    ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-z * z);

  return 0.5 * (1.0 + sign * y);
}

/** Standard normal PDF (probability density function) */
export function normalPDF(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

/** Black-Scholes input parameters */
export interface BSParams {
  /** Current underlying price */
  S: number;
  /** Strike price */
  K: number;
  /** Time to expiration in years */
  T: number;
  /** Risk-free interest rate (annualized, e.g. 0.05 for 5%) */
  r: number;
  /** Volatility (annualized, e.g. 0.25 for 25%) */
  sigma: number;
}

/** Calculate d1 and d2 intermediate values */
export function calcD1D2(params: BSParams): { d1: number; d2: number } {
  const { S, K, T, r, sigma } = params;

  const inputs: Array<[string, number]> = [["S", S], ["K", K], ["T", T], ["r", r], ["sigma", sigma]];
  for (const [name, value] of inputs) {
    if (!Number.isFinite(value)) {
      throw new DegenerateInputsError(`${name} must be finite, got ${value}`);
    }
  }
  if (T <= 0 || sigma <= 0) {
    throw new DegenerateInputsError(
      `T and sigma must be positive (T=${T}, sigma=${sigma})`
    );
  }
  if (S <= 0 || K <= 0) {
    throw new DegenerateInputsError(
      `S and K must be positive (S=${S}, K=${K})`
    );
  }

  const sqrtT = Math.sqrt(T);
  const d1 = (Math.log(S / K) + (r + 0.5 * sigma * sigma) * T) / (sigma * sqrtT);
  const d2 = d1 - sigma * sqrtT;

  return { d1, d2 };
}

/**
 * European call price with delta and vega.
 *
 * C = S·N(d1) - K·e^(-rT)·N(d2)
 * Δ = N(d1)
 * ν = S·N'(d1)·√T
 *
 * Throws DegenerateInputsError when σ or T is not positive.
 */
export function priceCall(params: BSParams): OptionQuote {
  const { S, K, T, r } = params;
  const { d1, d2 } = calcD1D2(params);

  const price = S * normalCDF(d1) - K * Math.exp(-r * T) * normalCDF(d2);

  return {
    // The erf approximation can leave a deep-OTM price a hair below zero
    price: Math.max(price, 0),
    delta: normalCDF(d1),
    vega: S * normalPDF(d1) * Math.sqrt(T),
  };
}

/**
 * Quote for a call with no time value (σ = 0 or T = 0).
 */
export function intrinsicCallQuote(S: number, K: number): OptionQuote {
  const intrinsic = Math.max(S - K, 0);
  return {
    price: intrinsic,
    delta: intrinsic > 0 ? 1 : 0,
    vega: 0,
  };
}

/**
 * Quant Engine — barrel export
 */

export * from "./black-scholes.js";
export * from "./volatility.js";
export * from "./affordability.js";

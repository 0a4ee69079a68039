/**
 * Reporting boundary: rounding for display, the run summary, and the
 * terminal table. Everything upstream stays at full precision.
 */

import Table from "cli-table3";
import type { ResultRow } from "../types/screening.js";

export interface DisplayRow {
  ticker: string;
  price: number;
  volatility: number;
  callPrice: number;
  delta: number;
  vega: number;
  contracts: number;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function toDisplayRow(row: ResultRow): DisplayRow {
  return {
    ticker: row.symbol,
    price: roundTo(row.spot, 2),
    volatility: roundTo(row.volatility, 4),
    callPrice: roundTo(row.callPrice, 2),
    delta: roundTo(row.delta, 4),
    vega: roundTo(row.vega, 4),
    contracts: row.contracts,
  };
}

/** Human-readable note echoing the capital used and the fixed assumptions */
export function summaryLine(capital: number): string {
  return (
    "Assumes ATM strike price and 30-day expiration. " +
    "Volatility is based on all fetched daily adjusted closes (minimum 30 closes). " +
    `You entered $${capital.toFixed(2)} in liquidity; contract affordability ` +
    "is based on that (1 contract = 100 shares)."
  );
}

export function renderLeaderboardTable(rows: readonly ResultRow[]): string {
  const table = new Table({
    head: ["#", "Ticker", "Price", "Volatility", "Call Price", "Delta", "Vega", "Contracts You Can Afford"],
    colAligns: ["right", "left", "right", "right", "right", "right", "right", "right"],
    style: { head: [], border: [] },
  });

  rows.forEach((row, i) => {
    const d = toDisplayRow(row);
    table.push([
      String(i + 1),
      d.ticker,
      d.price.toFixed(2),
      d.volatility.toFixed(4),
      d.callPrice.toFixed(2),
      d.delta.toFixed(4),
      d.vega.toFixed(4),
      String(d.contracts),
    ]);
  });

  return table.toString();
}

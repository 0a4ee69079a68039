/** Shares of underlying per listed equity option contract */
export const CONTRACT_MULTIPLIER = 100;

/**
 * Whole contracts that `capital` buys at `callPrice` per share.
 * Zero for a non-positive or non-finite price or capital; capped at
 * Number.MAX_SAFE_INTEGER when the price is vanishingly small.
 */
export function affordableContracts(callPrice: number, capital: number): number {
  if (!Number.isFinite(callPrice) || !Number.isFinite(capital)) return 0;
  if (callPrice <= 0 || capital <= 0) return 0;
  const contracts = Math.floor(capital / (callPrice * CONTRACT_MULTIPLIER));
  return Math.min(contracts, Number.MAX_SAFE_INTEGER);
}

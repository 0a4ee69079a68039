/**
 * Input validation utilities.
 */

import { z } from "zod";
import { InvalidConfigurationError } from "./errors.js";

/** Bounds the presentation layer offers for a screening run */
export const SCREEN_COUNT_MIN = 25;
export const SCREEN_COUNT_MAX = 150;
export const CAPITAL_MIN = 100;

/** Validate a stock ticker symbol (class shares such as BRK.B allowed) */
export const TickerSchema = z
  .string()
  .min(1)
  .max(10)
  .regex(/^[A-Z][A-Z.\-]{0,9}$/, "Ticker must be 1-10 uppercase letters, '.' or '-'");

/** Validate the two user parameters of a screening run */
export const ScreeningParamsSchema = z.object({
  count: z.coerce
    .number()
    .int("Symbol count must be a whole number")
    .min(SCREEN_COUNT_MIN, `Symbol count must be at least ${SCREEN_COUNT_MIN}`)
    .max(SCREEN_COUNT_MAX, `Symbol count must be at most ${SCREEN_COUNT_MAX}`),
  capital: z.coerce
    .number()
    .finite()
    .min(CAPITAL_MIN, `Capital must be at least $${CAPITAL_MIN}`),
});

export type ScreeningParams = z.infer<typeof ScreeningParamsSchema>;

/**
 * Parse screening parameters, throwing InvalidConfigurationError
 * with one message per failing field.
 */
export function parseScreeningParams(input: unknown): ScreeningParams {
  const result = ScreeningParamsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => issue.message)
    );
  }
  return result.data;
}

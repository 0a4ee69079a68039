/**
 * Error taxonomy for the screener core.
 *
 * Provider unavailability is not an error: providers return null.
 */

export type ScreenerErrorCode =
  | "INSUFFICIENT_DATA"
  | "DEGENERATE_INPUTS"
  | "INVALID_CONFIGURATION";

export class ScreenerError extends Error {
  readonly code: ScreenerErrorCode;

  constructor(code: ScreenerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Fewer than 2 prices: no return can be computed */
export class InsufficientDataError extends ScreenerError {
  constructor(observations: number) {
    super(
      "INSUFFICIENT_DATA",
      `Need at least 2 prices to compute a return, got ${observations}`
    );
  }
}

/** Pricer inputs for which d1/d2 are undefined */
export class DegenerateInputsError extends ScreenerError {
  constructor(message: string) {
    super("DEGENERATE_INPUTS", message);
  }
}

/** Screening parameters rejected before the run starts */
export class InvalidConfigurationError extends ScreenerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIGURATION", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

#!/usr/bin/env node
/**
 * ATM Call Screener — command-line entry point.
 *
 * Prices a 30-day at-the-money call for each of the first N symbols of
 * the S&P 500, ranks them by model value and shows how many contracts
 * the given capital buys.
 *
 * Start: npm start -- --count 50 --capital 1000
 */

import { Command } from "commander";
import { config } from "./config/index.js";
import { createDependencies, runScreen, type ProgressObserver } from "./screening/service.js";
import { renderLeaderboardTable } from "./screening/report.js";
import { InvalidConfigurationError } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

const program = new Command();

program
  .name("atm-call-screener")
  .description("Rank S&P 500 stocks by Black-Scholes value of a 30-day ATM call")
  .option("-n, --count <n>", "Number of stocks to analyze (25-150)", String(config.screen.count))
  .option("-c, --capital <usd>", "Available trading liquidity in USD (min 100)", String(config.screen.capital))
  .parse();

const opts = program.opts<{ count: string; capital: string }>();

/** Logs every tenth symbol and the last one */
const progressLogger: ProgressObserver = {
  onProgress({ completed, total, fraction, symbol }) {
    if (completed % 10 === 0 || completed === total) {
      logger.info(`Progress ${(fraction * 100).toFixed(0)}% (${completed}/${total}, last: ${symbol})`);
    }
  },
};

async function main(): Promise<void> {
  logger.info("═══ ATM Call Screener ═══");
  logger.info(`Environment: ${config.nodeEnv}`);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Received SIGINT, stopping after the current symbol...");
    controller.abort();
  });

  const report = await runScreen(
    { count: opts.count, capital: opts.capital },
    createDependencies(config),
    { observer: progressLogger, signal: controller.signal }
  );

  for (const warning of report.warnings) {
    logger.warn(warning);
  }
  logger.info(
    `Calculation complete: ${report.ranked.length} ranked, ${report.skipped.length} skipped, ` +
    `r=${(report.rate.rate * 100).toFixed(2)}% (${report.rate.source})`
  );

  if (report.ranked.length === 0) {
    logger.info("No results: every screened symbol was skipped");
    return;
  }

  console.log(`\nTop ${report.ranked.length} by Black-Scholes Call Price`);
  console.log(renderLeaderboardTable(report.ranked));
  console.log(`\nNote: ${report.summary}`);
}

main().catch((err) => {
  if (err instanceof InvalidConfigurationError) {
    for (const issue of err.issues) logger.error(issue);
    process.exit(2);
  }
  logger.error("Fatal error", { error: err });
  process.exit(1);
});

/**
 * Express API for running screens on demand.
 *
 *   GET  /api/health    — liveness
 *   GET  /api/universe  — symbols available for screening
 *   POST /api/screen    — body { count, capital }; runs a screen and
 *                         returns the ranked leaderboard
 *
 * Screens are sequential and paced, so only one runs at a time.
 */

import express, { type Express, type Response } from "express";
import { z, ZodError } from "zod";
import { runScreen, type ScreenerDependencies } from "../screening/service.js";
import { InvalidConfigurationError } from "../utils/errors.js";
import { moduleLogger } from "../utils/logger.js";

const log = moduleLogger("server");

/** Shape only; values are validated by runScreen */
const ScreenRequestSchema = z.object({
  count: z.unknown(),
  capital: z.unknown(),
});

function sendError(res: Response, err: unknown): void {
  if (err instanceof InvalidConfigurationError) {
    res.status(400).json({ success: false, error: err.message, issues: err.issues });
    return;
  }
  if (err instanceof ZodError) {
    res.status(400).json({ success: false, error: "Invalid request", issues: err.issues.map((i) => i.message) });
    return;
  }
  log.error("Request failed", { error: String(err) });
  res.status(500).json({ success: false, error: String(err) });
}

export function createApp(deps: ScreenerDependencies): Express {
  const app = express();
  let screenInFlight = false;

  app.use(express.json());

  // ── CORS for local development ──────────────────────────────
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ success: true, data: { status: "ok", priceProvider: deps.priceProvider.name } });
  });

  app.get("/api/universe", async (_req, res) => {
    try {
      const universe = await deps.universeProvider.fetchUniverse();
      res.json({ success: true, data: universe });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post("/api/screen", async (req, res) => {
    if (screenInFlight) {
      res.status(409).json({ success: false, error: "A screen is already running" });
      return;
    }

    const parsed = ScreenRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, parsed.error);
      return;
    }

    screenInFlight = true;
    // Stop between symbols if the client goes away
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const report = await runScreen(parsed.data, deps, { signal: controller.signal });
      res.json({
        success: true,
        data: {
          leaderboard: report.leaderboard,
          skipped: report.skipped,
          summary: report.summary,
          warnings: report.warnings,
          rate: report.rate,
          processed: report.processed,
          cancelled: report.cancelled,
        },
      });
    } catch (err) {
      sendError(res, err);
    } finally {
      screenInFlight = false;
    }
  });

  return app;
}

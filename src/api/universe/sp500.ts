/**
 * S&P 500 constituents — the default screening universe.
 *
 * Downloads the public constituents CSV and falls back to the bundled
 * data/universe.json when the download fails or parses to nothing.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { fetchText } from "../http.js";
import { moduleLogger } from "../../utils/logger.js";
import { TickerSchema } from "../../utils/validation.js";
import type { UniverseMember, UniverseProvider } from "../../types/market.js";

const log = moduleLogger("universe");

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const BUNDLED_UNIVERSE_FILE = path.resolve(__dirname, "../../../data/universe.json");

export const DEFAULT_UNIVERSE_URL =
  "https://datahub.io/core/s-and-p-500-companies/r/constituents.csv";

const UniverseFileSchema = z.array(
  z.object({
    symbol: z.string(),
    name: z.string().optional(),
    sector: z.string().optional(),
  })
);

const ConstituentRecordsSchema = z.array(z.record(z.string(), z.string()));

/**
 * Parse a constituents CSV with a `Symbol` column and optional
 * `Security` / `GICS Sector` columns. Rows with invalid or repeated
 * symbols are dropped; file order is kept.
 */
export function parseConstituentsCsv(text: string): UniverseMember[] {
  const records = ConstituentRecordsSchema.parse(
    parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    })
  );

  const seen = new Set<string>();
  const members: UniverseMember[] = [];
  for (const record of records) {
    const symbol = (record["Symbol"] ?? "").toUpperCase();
    if (!TickerSchema.safeParse(symbol).success || seen.has(symbol)) continue;
    seen.add(symbol);

    const member: UniverseMember = { symbol };
    const name = record["Security"];
    const sector = record["GICS Sector"];
    if (name) member.name = name;
    if (sector) member.sector = sector;
    members.push(member);
  }
  return members;
}

export function loadBundledUniverse(file: string = BUNDLED_UNIVERSE_FILE): UniverseMember[] {
  const raw = fs.readFileSync(file, "utf-8");
  return UniverseFileSchema.parse(JSON.parse(raw));
}

export interface Sp500UniverseOptions {
  url?: string;
  timeoutMs: number;
  fallbackFile?: string;
}

export class Sp500UniverseProvider implements UniverseProvider {
  readonly name = "S&P 500";
  private readonly options: Sp500UniverseOptions;

  constructor(options: Sp500UniverseOptions) {
    this.options = options;
  }

  async fetchUniverse(): Promise<UniverseMember[]> {
    const url = this.options.url ?? DEFAULT_UNIVERSE_URL;
    try {
      const csv = await fetchText(url, { timeoutMs: this.options.timeoutMs });
      const members = parseConstituentsCsv(csv);
      if (members.length > 0) {
        log.info(`Loaded ${members.length} constituents from ${url}`);
        return members;
      }
      log.warn(`Constituents CSV at ${url} had no usable rows`);
    } catch (err) {
      log.warn(`Constituents download failed, using bundled list`, { error: String(err) });
    }

    const bundled = loadBundledUniverse(this.options.fallbackFile);
    log.info(`Loaded ${bundled.length} constituents from bundled list`);
    return bundled;
  }
}

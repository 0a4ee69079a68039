import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "http";
import { createApp } from "../../src/server/app.js";
import type { ScreenerDependencies } from "../../src/screening/service.js";
import {
  CountingGate,
  FakePriceProvider,
  FakeRateProvider,
  FakeUniverseProvider,
  wigglySeries,
} from "../helpers/fakes.js";

const symbols = Array.from({ length: 30 }, (_, i) => `S${String(i).padStart(2, "0")}`);

const deps: ScreenerDependencies = {
  priceProvider: new FakePriceProvider(
    Object.fromEntries(symbols.map((s, i) => [s, wigglySeries(s, 10 + i)]))
  ),
  rateProvider: new FakeRateProvider(null),
  universeProvider: new FakeUniverseProvider(symbols.map((symbol) => ({ symbol, sector: "Test" }))),
  gate: new CountingGate(),
  fallbackRate: 0.05,
  zeroVolatilityPolicy: "skip",
};

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createApp(deps).listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error(`Expected a TCP address, got ${String(address)}`);
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function postScreen(body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/api/screen`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("screening API", () => {
  it("GET /api/health reports the price provider", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, data: { status: "ok", priceProvider: "fake" } });
  });

  it("GET /api/universe lists the screenable symbols", async () => {
    const res = await fetch(`${baseUrl}/api/universe`);
    const json = (await res.json()) as { success: boolean; data: Array<{ symbol: string }> };
    expect(json.success).toBe(true);
    expect(json.data).toHaveLength(30);
    expect(json.data[0]).toEqual({ symbol: "S00", sector: "Test" });
  });

  it("POST /api/screen returns the top 25 with the rate fallback warning", async () => {
    const res = await postScreen({ count: 30, capital: 1000 });
    expect(res.status).toBe(200);

    const json = (await res.json()) as {
      success: boolean;
      data: {
        leaderboard: Array<{ ticker: string; callPrice: number }>;
        skipped: unknown[];
        warnings: string[];
        rate: { rate: number; source: string };
        processed: number;
        cancelled: boolean;
        summary: string;
      };
    };
    expect(json.success).toBe(true);
    expect(json.data.processed).toBe(30);
    expect(json.data.skipped).toEqual([]);
    expect(json.data.leaderboard).toHaveLength(25);
    expect(json.data.leaderboard[0].ticker).toBe("S29");
    expect(json.data.leaderboard[24].ticker).toBe("S05");
    expect(json.data.rate).toEqual({ rate: 0.05, source: "default" });
    expect(json.data.warnings).toEqual([
      "Failed to fetch risk-free rate from fake-rate; using default 5.00%",
    ]);
    expect(json.data.cancelled).toBe(false);
  });

  it("POST /api/screen rejects out-of-range parameters with 400", async () => {
    const res = await postScreen({ count: 5, capital: 20 });
    expect(res.status).toBe(400);
    const json = (await res.json()) as { success: boolean; issues: string[] };
    expect(json.success).toBe(false);
    expect(json.issues).toEqual([
      "Symbol count must be at least 25",
      "Capital must be at least $100",
    ]);
  });

  it("POST /api/screen rejects a non-object body with 400", async () => {
    const res = await postScreen([1, 2]);
    expect(res.status).toBe(400);
  });
});

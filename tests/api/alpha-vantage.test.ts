import { describe, it, expect, vi, afterEach } from "vitest";
import {
  AlphaVantagePriceProvider,
  parseDailyAdjusted,
} from "../../src/api/market-data/alpha-vantage.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const body = {
  "Meta Data": { "2. Symbol": "IBM" },
  "Time Series (Daily)": {
    "2024-03-05": { "4. close": "103.00", "5. adjusted close": "102.50" },
    "2024-03-01": { "4. close": "100.00", "5. adjusted close": "99.75" },
    "2024-03-04": { "4. close": "101.00", "5. adjusted close": "100.25" },
  },
};

describe("parseDailyAdjusted", () => {
  it("should return adjusted closes ascending by date", () => {
    expect(parseDailyAdjusted("IBM", body)).toEqual({
      symbol: "IBM",
      observations: [
        { date: "2024-03-01", close: 99.75 },
        { date: "2024-03-04", close: 100.25 },
        { date: "2024-03-05", close: 102.5 },
      ],
    });
  });

  it("should drop unparseable closes", () => {
    const series = parseDailyAdjusted("IBM", {
      "Time Series (Daily)": {
        "2024-03-01": { "5. adjusted close": "n/a" },
        "2024-03-04": { "5. adjusted close": "100.25" },
      },
    });
    expect(series?.observations).toEqual([{ date: "2024-03-04", close: 100.25 }]);
  });

  it("should return null for a rate-limit note or an error body", () => {
    expect(parseDailyAdjusted("IBM", { Note: "Thank you for using Alpha Vantage!" })).toBeNull();
    expect(parseDailyAdjusted("IBM", { "Error Message": "Invalid API call." })).toBeNull();
  });
});

describe("AlphaVantagePriceProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should request the compact adjusted series for the symbol", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => jsonResponse(body));
    vi.stubGlobal("fetch", fetchMock);

    const provider = new AlphaVantagePriceProvider({ apiKey: "test-key", timeoutMs: 1000 });
    const series = await provider.fetchPriceSeries("IBM");

    expect(series?.observations).toHaveLength(3);
    const url = String(fetchMock.mock.calls[0]?.[0]);
    expect(url).toBe(
      "https://www.alphavantage.co/query?function=TIME_SERIES_DAILY_ADJUSTED" +
      "&symbol=IBM&outputsize=compact&apikey=test-key"
    );
  });

  it("should fold HTTP errors into unavailable", async () => {
    vi.stubGlobal("fetch", vi.fn(async (_input: string | URL | Request) => jsonResponse({}, 503)));
    const provider = new AlphaVantagePriceProvider({ apiKey: "test-key", timeoutMs: 1000 });
    expect(await provider.fetchPriceSeries("IBM")).toBeNull();
  });

  it("should fold transport errors into unavailable", async () => {
    vi.stubGlobal("fetch", vi.fn(async (_input: string | URL | Request) => {
      throw new TypeError("fetch failed");
    }));
    const provider = new AlphaVantagePriceProvider({ apiKey: "test-key", timeoutMs: 1000 });
    expect(await provider.fetchPriceSeries("IBM")).toBeNull();
  });

  it("should fold an over-quota body into unavailable", async () => {
    vi.stubGlobal("fetch", vi.fn(async (_input: string | URL | Request) => jsonResponse({ Information: "rate limit" })));
    const provider = new AlphaVantagePriceProvider({ apiKey: "test-key", timeoutMs: 1000 });
    expect(await provider.fetchPriceSeries("IBM")).toBeNull();
  });
});

import { describe, it, expect } from "vitest";
import { runScreen, type ScreenerDependencies } from "../../src/screening/service.js";
import { InvalidConfigurationError } from "../../src/utils/errors.js";
import type { ScreeningProgress } from "../../src/types/screening.js";
import {
  CountingGate,
  FakePriceProvider,
  FakeRateProvider,
  FakeUniverseProvider,
  wigglySeries,
} from "../helpers/fakes.js";

function deps(overrides: Partial<ScreenerDependencies> = {}): ScreenerDependencies {
  const symbols = Array.from({ length: 40 }, (_, i) => `T${String(i).padStart(2, "0")}`);
  const data = Object.fromEntries(
    symbols.map((s, i) => [s, i % 4 === 3 ? null : wigglySeries(s, 20 + i * 5)])
  );
  return {
    priceProvider: new FakePriceProvider(data),
    rateProvider: new FakeRateProvider(0.045),
    universeProvider: new FakeUniverseProvider(symbols.map((symbol) => ({ symbol }))),
    gate: new CountingGate(),
    fallbackRate: 0.05,
    zeroVolatilityPolicy: "skip",
    ...overrides,
  };
}

describe("runScreen", () => {
  it("should rank the screened symbols and round them for display", async () => {
    const report = await runScreen({ count: 30, capital: 2500 }, deps());

    // every fourth symbol has no data: 30 screened, 7 skipped
    expect(report.processed).toBe(30);
    expect(report.skipped).toHaveLength(7);
    expect(report.ranked).toHaveLength(23);
    expect(report.leaderboard).toHaveLength(23);

    // same volatility everywhere, so price follows spot: highest index first
    expect(report.ranked[0].symbol).toBe("T29");
    expect(report.leaderboard[0].ticker).toBe("T29");
    expect(report.leaderboard[0].callPrice).toBe(Math.round(report.ranked[0].callPrice * 100) / 100);
    expect(report.summary).toContain("You entered $2500.00 in liquidity");
    expect(report.rate).toEqual({ rate: 0.045, source: "provider" });
    expect(report.warnings).toEqual([]);
  });

  it("should truncate the leaderboard to 25 rows", async () => {
    const allPresent = Object.fromEntries(
      Array.from({ length: 40 }, (_, i) => {
        const s = `T${String(i).padStart(2, "0")}`;
        return [s, wigglySeries(s, 20 + i)];
      })
    );
    const report = await runScreen(
      { count: 40, capital: 1000 },
      deps({ priceProvider: new FakePriceProvider(allPresent) })
    );
    expect(report.ranked).toHaveLength(25);
    expect(report.ranked[24].symbol).toBe("T15");
  });

  it("should notify the progress observer after each symbol", async () => {
    const seen: ScreeningProgress[] = [];
    await runScreen({ count: 25, capital: 1000 }, deps(), {
      observer: { onProgress: (p) => seen.push(p) },
    });
    expect(seen).toHaveLength(25);
    expect(seen[24].fraction).toBe(1);
  });

  it("should refuse out-of-range parameters before loading the universe", async () => {
    const universeProvider = new FakeUniverseProvider([]);
    await expect(
      runScreen({ count: 10, capital: 50 }, deps({ universeProvider }))
    ).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(universeProvider.calls).toBe(0);
  });

  it("should accept numeric strings from form or CLI input", async () => {
    const report = await runScreen({ count: "25", capital: "100" }, deps());
    expect(report.processed).toBe(25);
    expect(report.capital).toBe(100);
  });
});

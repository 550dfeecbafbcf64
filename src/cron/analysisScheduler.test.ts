import { describe, it, expect, vi } from "vitest";
import { AnalysisScheduler, type ScheduleExpressions } from "./analysisScheduler.js";
import { PriceRefresher } from "../watchlist/priceRefresher.js";
import { BatchAnalyzer } from "../watchlist/batchAnalyzer.js";
import { RateGate } from "../coordination/rateGate.js";
import { ResultCache } from "../cache/resultCache.js";
import { MemoryAnalysisStore } from "../storage/memoryAnalysisStore.js";
import { createErrorIndicatorSet } from "../analysis/indicatorSet.js";

const EXPRESSIONS: ScheduleExpressions = {
  priceRefresh: "*/2 * * * *",
  analysis: "*/30 * * * *",
  cacheSweep: "*/5 * * * *",
};

function setup(prices: Record<string, number>, cache = new ResultCache()) {
  const rateGate = new RateGate({ minIntervalMs: 0 });
  const priceSource = { fetchPrice: vi.fn(async (assetId: string) => prices[assetId] ?? null) };
  const priceRefresher = new PriceRefresher(priceSource, rateGate);
  const analyzer = { analyze: vi.fn(async (assetId: string, price: number) => createErrorIndicatorSet(assetId, price)) };
  const batchAnalyzer = new BatchAnalyzer({ analyzer, rateGate, store: new MemoryAnalysisStore() });
  const scheduler = new AnalysisScheduler(
    { watchlist: ["bitcoin", "ethereum"], priceRefresher, batchAnalyzer, cache },
    EXPRESSIONS
  );
  return { scheduler, priceSource, analyzer };
}

describe("AnalysisScheduler", () => {
  it("rejects an invalid cron expression", () => {
    expect(
      () =>
        new AnalysisScheduler(
          {
            watchlist: [],
            priceRefresher: new PriceRefresher({ fetchPrice: async () => null }, new RateGate({ minIntervalMs: 0 })),
            batchAnalyzer: new BatchAnalyzer({
              analyzer: { analyze: async (assetId, price) => createErrorIndicatorSet(assetId, price) },
              rateGate: new RateGate({ minIntervalMs: 0 }),
              store: new MemoryAnalysisStore(),
            }),
            cache: new ResultCache(),
          },
          { ...EXPRESSIONS, analysis: "every hour" }
        )
    ).toThrow('Invalid cron expression for analysis: "every hour"');
  });

  it("fetches missing prices before analyzing the watchlist", async () => {
    const { scheduler, priceSource, analyzer } = setup({ bitcoin: 60000, ethereum: 3000 });

    const batch = await scheduler.runAnalysisCycle();

    expect(priceSource.fetchPrice).toHaveBeenCalledTimes(2);
    expect(analyzer.analyze).toHaveBeenCalledTimes(2);
    expect(batch?.status).toBe("completed");
    expect(batch?.results.get("ethereum")?.currentPrice).toBe(3000);
  });

  it("skips the cycle when no price is known", async () => {
    const { scheduler, analyzer } = setup({});

    await expect(scheduler.runAnalysisCycle()).resolves.toBeNull();
    expect(analyzer.analyze).not.toHaveBeenCalled();
  });

  it("sweeps expired cache entries", () => {
    let now = 0;
    const cache = new ResultCache({ now: () => now, ttls: { price: 10 } });
    cache.put("bitcoin", "price", 1);
    const { scheduler } = setup({}, cache);

    now = 11;

    expect(scheduler.sweepCache()).toBe(1);
  });

  it("reports job status across start and stop", () => {
    const { scheduler } = setup({});
    expect(scheduler.status().analysis).toEqual({ scheduled: false, isJobRunning: false });

    scheduler.start();
    expect(scheduler.status().priceRefresh.scheduled).toBe(true);

    scheduler.stop();
    expect(scheduler.status().cacheSweep).toEqual({ scheduled: false, isJobRunning: false });
  });
});

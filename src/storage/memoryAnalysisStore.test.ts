import { describe, it, expect } from "vitest";
import { MemoryAnalysisStore } from "./memoryAnalysisStore.js";
import { analysisKey } from "./analysisStore.js";
import { parseStoredIndicatorSet } from "./indicatorSetSchema.js";
import { buildIndicatorSet, createErrorIndicatorSet, EMPTY_INDICATOR_VALUES } from "../analysis/indicatorSet.js";
import { constantCandles } from "../testing/fixtures.js";
import type { IndicatorSet } from "../utils/types.js";

function result(assetId: string, analyzedAt: number): IndicatorSet {
  return buildIndicatorSet({
    assetId,
    currentPrice: 10,
    values: { ...EMPTY_INDICATOR_VALUES, rsi: 42 },
    signals: [],
    priceHistory: constantCandles(3, 10),
    provenance: "provider",
    analyzedAt,
  });
}

describe("MemoryAnalysisStore", () => {
  it("keeps the latest result per asset", async () => {
    const store = new MemoryAnalysisStore();
    await store.save(result("bitcoin", 1));
    await store.save(result("bitcoin", 2));

    expect((await store.getLatest("Bitcoin"))?.analyzedAt).toBe(2);
    expect(await store.listLatest()).toHaveLength(1);
  });

  it("lists newest first", async () => {
    const store = new MemoryAnalysisStore();
    await store.save(result("bitcoin", 1));
    await store.save(result("ethereum", 3));
    await store.save(result("solana", 2));

    expect((await store.listLatest()).map((r) => r.assetId)).toEqual(["ethereum", "solana", "bitcoin"]);
  });

  it("expires results after the TTL", async () => {
    let now = 0;
    const store = new MemoryAnalysisStore(60, () => now);
    await store.save(result("bitcoin", 1));

    now = 60_000;
    expect(await store.getLatest("bitcoin")).not.toBeNull();

    now = 60_001;
    expect(await store.getLatest("bitcoin")).toBeNull();
    expect(await store.listLatest()).toEqual([]);
  });

  it("clears everything", async () => {
    const store = new MemoryAnalysisStore();
    await store.save(result("bitcoin", 1));
    store.clear();
    expect(await store.getLatest("bitcoin")).toBeNull();
  });
});

describe("analysisKey", () => {
  it("lowercases the asset id under the analysis prefix", () => {
    expect(analysisKey(" ETH ")).toBe("analysis:latest:eth");
  });
});

describe("parseStoredIndicatorSet", () => {
  it("reads back a serialized result", () => {
    const original = result("bitcoin", 5);
    expect(parseStoredIndicatorSet(JSON.stringify(original))).toEqual(original);
  });

  it("reads back the error result", () => {
    const original = createErrorIndicatorSet("bitcoin", 7);
    expect(parseStoredIndicatorSet(JSON.stringify(original))?.status).toBe("error");
  });

  it("returns null for invalid JSON", () => {
    expect(parseStoredIndicatorSet("{not json")).toBeNull();
  });

  it("returns null when a field is out of range", () => {
    const stored = { ...result("bitcoin", 5), rsi: 150 };
    expect(parseStoredIndicatorSet(JSON.stringify(stored))).toBeNull();
  });
});

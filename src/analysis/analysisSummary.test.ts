import { describe, it, expect } from "vitest";
import { formatAnalysisSummary, volumeRatio } from "./analysisSummary.js";
import { buildIndicatorSet, createErrorIndicatorSet, EMPTY_INDICATOR_VALUES } from "./indicatorSet.js";

describe("formatAnalysisSummary", () => {
  it("renders the error result", () => {
    const summary = formatAnalysisSummary(createErrorIndicatorSet("bitcoin", 100));

    expect(summary).toBe(
      [
        "TECHNICAL ANALYSIS - bitcoin",
        "Entry quality: VERY POOR (10/100)",
        "Trend: NEUTRAL",
        "Support: $0.00 | Resistance: $0.00",
        "RSI: 50.0 (neutral)",
        "MACD: 0.0000 (bearish)",
        "SMA10/50: $0.00/$0.00",
        "Volume ratio: 1.00x",
        "Data: synthetic estimate (provider unavailable)",
        "Entry signals:",
        "- SUPPORT RESISTANCE [very_weak]: Technical analysis failed - manual review required",
      ].join("\n")
    );
  });

  it("labels oversold RSI and omits empty signal sections", () => {
    const set = buildIndicatorSet({
      assetId: "ethereum",
      currentPrice: 3000,
      values: { ...EMPTY_INDICATOR_VALUES, rsi: 25.04, trend: "bullish", averageVolume20: 100, currentVolume: 250 },
      signals: [],
      priceHistory: [],
      provenance: "provider",
    });

    const lines = formatAnalysisSummary(set).split("\n");

    expect(lines).toContain("RSI: 25.0 (oversold)");
    expect(lines).toContain("Trend: BULLISH");
    expect(lines).toContain("Volume ratio: 2.50x");
    expect(lines).toContain("Entry quality: POOR (30/100)");
    expect(lines).not.toContain("Entry signals:");
    expect(lines).toHaveLength(8);
  });
});

describe("volumeRatio", () => {
  it("is 1 when the average is unknown", () => {
    expect(volumeRatio(createErrorIndicatorSet("x", 1))).toBe(1);
  });
});

import { describe, it, expect } from "vitest";
import { generateEntrySignals } from "./signalGenerator.js";
import { EMPTY_INDICATOR_VALUES } from "./indicatorSet.js";
import type { IndicatorValues } from "../utils/types.js";

// Levels far below the price so the level-based rules stay quiet
function values(overrides: Partial<IndicatorValues>): IndicatorValues {
  return {
    ...EMPTY_INDICATOR_VALUES,
    supportLevel: 50,
    resistanceLevel: 150,
    fibonacci382: 80,
    fibonacci500: 70,
    fibonacci618: 60,
    trendlineSupport: 47.5,
    trendlineResistance: 157.5,
    ...overrides,
  };
}

function techniques(v: IndicatorValues, price: number): string[] {
  return generateEntrySignals(v, price).map((s) => s.technique);
}

describe("generateEntrySignals", () => {
  it("emits nothing for quiet indicators", () => {
    expect(generateEntrySignals(values({}), 100)).toEqual([]);
  });

  it("fires rsi_oversold below 30 with 5% target and stop", () => {
    const [signal] = generateEntrySignals(values({ rsi: 25 }), 100);
    expect(signal).toEqual({
      technique: "rsi_oversold",
      strength: "strong",
      rationale: "RSI indicates oversold conditions - potential bounce",
      targetPrice: 105,
      stopPrice: 95,
      confidence: 0.75,
    });
  });

  it("does not fire rsi_oversold at exactly 30", () => {
    expect(techniques(values({ rsi: 30 }), 100)).toEqual([]);
  });

  it("requires a positive MACD above its signal", () => {
    expect(techniques(values({ macd: 2, macdSignal: 1.8 }), 100)).toEqual(["macd_bullish_crossover"]);
    expect(techniques(values({ macd: -1, macdSignal: -1.5 }), 100)).toEqual([]);
  });

  it("fires the golden cross when SMA10 is above SMA50, including an absent SMA50", () => {
    expect(techniques(values({ sma10: 110, sma50: 100 }), 100)).toEqual(["moving_average_crossover"]);
    expect(techniques(values({ sma10: 110, sma50: 0 }), 100)).toEqual(["moving_average_crossover"]);
    expect(techniques(values({ sma10: 0, sma50: 0 }), 100)).toEqual([]);
  });

  it("targets resistance from near support", () => {
    const [signal] = generateEntrySignals(values({ supportLevel: 99, resistanceLevel: 120 }), 100);
    expect(signal?.technique).toBe("support_resistance");
    expect(signal?.targetPrice).toBe(120);
    expect(signal?.stopPrice).toBeCloseTo(94.05, 10);
    expect(signal?.confidence).toBe(0.65);
  });

  it("targets the 38.2% level from the 61.8% retracement", () => {
    const [signal] = generateEntrySignals(values({ fibonacci618: 100, fibonacci382: 115 }), 100);
    expect(signal?.technique).toBe("fibonacci_retracement");
    expect(signal?.targetPrice).toBe(115);
    expect(signal?.stopPrice).toBe(97);
  });

  it("needs both volume confirmation and a bullish trend for a breakout", () => {
    expect(techniques(values({ volumeConfirmation: true, trend: "neutral" }), 100)).toEqual([]);
    const [signal] = generateEntrySignals(values({ volumeConfirmation: true, trend: "bullish" }), 100);
    expect(signal?.technique).toBe("volume_breakout");
    expect(signal?.strength).toBe("very_strong");
    expect(signal?.targetPrice).toBeCloseTo(115, 10);
    expect(signal?.stopPrice).toBe(88);
  });

  it("fires the trendline bounce only in a bullish trend", () => {
    const near = { trendlineSupport: 99.5, trendlineResistance: 130 };
    expect(techniques(values({ ...near, trend: "bearish" }), 100)).toEqual([]);
    expect(techniques(values({ ...near, trend: "bullish" }), 100)).toEqual(["trendline_bounce"]);
  });

  it("lets several rules fire together in table order", () => {
    const v = values({ rsi: 20, sma10: 105, sma50: 100, supportLevel: 99 });
    expect(techniques(v, 100)).toEqual(["rsi_oversold", "moving_average_crossover", "support_resistance"]);
  });

  it("keeps every confidence within [0, 1]", () => {
    const v = values({
      rsi: 10,
      macd: 1,
      macdSignal: 0.9,
      sma10: 2,
      sma50: 1,
      supportLevel: 100,
      fibonacci618: 100,
      volumeConfirmation: true,
      trend: "bullish",
      trendlineSupport: 100,
    });
    const signals = generateEntrySignals(v, 100);
    expect(signals).toHaveLength(7);
    for (const signal of signals) {
      expect(signal.confidence).toBeGreaterThanOrEqual(0);
      expect(signal.confidence).toBeLessThanOrEqual(1);
    }
  });
});

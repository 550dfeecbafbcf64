import type { EntrySignal, IndicatorValues } from "../utils/types.js";

type SignalRule = (values: IndicatorValues, price: number) => EntrySignal | null;

function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Entry rules. Evaluated independently, so any number may fire.
 */
const RULES: readonly SignalRule[] = [
  (v, price) =>
    v.rsi < 30
      ? {
          technique: "rsi_oversold",
          strength: "strong",
          rationale: "RSI indicates oversold conditions - potential bounce",
          targetPrice: price * 1.05,
          stopPrice: price * 0.95,
          confidence: 0.75,
        }
      : null,

  (v, price) =>
    v.macd > v.macdSignal && v.macd > 0
      ? {
          technique: "macd_bullish_crossover",
          strength: "moderate",
          rationale: "MACD line above signal line - bullish momentum",
          targetPrice: price * 1.08,
          stopPrice: price * 0.92,
          confidence: 0.7,
        }
      : null,

  (v, price) =>
    v.sma10 > v.sma50 && v.sma10 > 0
      ? {
          technique: "moving_average_crossover",
          strength: "strong",
          rationale: "Golden cross - short moving average above long moving average",
          targetPrice: price * 1.1,
          stopPrice: price * 0.9,
          confidence: 0.8,
        }
      : null,

  (v, price) =>
    price <= v.supportLevel * 1.02
      ? {
          technique: "support_resistance",
          strength: "moderate",
          rationale: "Price near support level - potential bounce opportunity",
          targetPrice: v.resistanceLevel,
          stopPrice: v.supportLevel * 0.95,
          confidence: 0.65,
        }
      : null,

  (v, price) =>
    price <= v.fibonacci618 * 1.01
      ? {
          technique: "fibonacci_retracement",
          strength: "moderate",
          rationale: "Price at 61.8% Fibonacci retracement - key support level",
          targetPrice: v.fibonacci382,
          stopPrice: v.fibonacci618 * 0.97,
          confidence: 0.7,
        }
      : null,

  (v, price) =>
    v.volumeConfirmation && v.trend === "bullish"
      ? {
          technique: "volume_breakout",
          strength: "very_strong",
          rationale: "High volume breakout with bullish trend confirmed",
          targetPrice: price * 1.15,
          stopPrice: price * 0.88,
          confidence: 0.85,
        }
      : null,

  (v, price) =>
    price <= v.trendlineSupport * 1.01 && v.trend === "bullish"
      ? {
          technique: "trendline_bounce",
          strength: "strong",
          rationale: "Price bouncing off ascending trendline support",
          targetPrice: v.trendlineResistance,
          stopPrice: v.trendlineSupport * 0.96,
          confidence: 0.78,
        }
      : null,
];

/**
 * Apply the rule table to computed indicators and the live price
 */
export function generateEntrySignals(values: IndicatorValues, currentPrice: number): EntrySignal[] {
  const signals: EntrySignal[] = [];

  for (const rule of RULES) {
    const signal = rule(values, currentPrice);
    if (signal) {
      signals.push({ ...signal, confidence: clampConfidence(signal.confidence) });
    }
  }

  return signals;
}

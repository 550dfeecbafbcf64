import { z } from "zod";
import type { IndicatorSet } from "../utils/types.js";

const PricePointSchema = z.object({
  timestamp: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative(),
});

const EntrySignalSchema = z.object({
  technique: z.enum([
    "rsi_oversold",
    "macd_bullish_crossover",
    "moving_average_crossover",
    "support_resistance",
    "fibonacci_retracement",
    "volume_breakout",
    "trendline_bounce",
  ]),
  strength: z.enum(["very_strong", "strong", "moderate", "weak", "very_weak"]),
  rationale: z.string(),
  targetPrice: z.number(),
  stopPrice: z.number(),
  confidence: z.number().min(0).max(1),
});

// Stored analysis results, validated when read back from Redis
export const IndicatorSetSchema = z.object({
  assetId: z.string(),
  currentPrice: z.number(),
  priceHistory: z.array(PricePointSchema),
  provenance: z.enum(["provider", "cache", "synthetic"]),
  signals: z.array(EntrySignalSchema),
  quality: z.enum(["excellent", "good", "average", "poor", "very_poor"]),
  qualityScore: z.number(),
  status: z.enum(["complete", "error"]),
  analyzedAt: z.number(),
  rsi: z.number().min(0).max(100),
  macd: z.number(),
  macdSignal: z.number(),
  sma10: z.number(),
  sma50: z.number(),
  ema10: z.number(),
  ema50: z.number(),
  supportLevel: z.number(),
  resistanceLevel: z.number(),
  fibonacci382: z.number(),
  fibonacci500: z.number(),
  fibonacci618: z.number(),
  averageVolume20: z.number(),
  currentVolume: z.number(),
  volumeConfirmation: z.boolean(),
  trend: z.enum(["bullish", "bearish", "neutral"]),
  trendlineSupport: z.number(),
  trendlineResistance: z.number(),
});

export function parseStoredIndicatorSet(raw: string): IndicatorSet | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = IndicatorSetSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

import type {
  DataProvenance,
  EntrySignal,
  IndicatorSet,
  IndicatorValues,
  PricePoint,
} from "../utils/types.js";
import { calculateEntryQuality, qualityToScore } from "./qualityScorer.js";

const emptyValues: IndicatorValues = {
  rsi: 50,
  macd: 0,
  macdSignal: 0,
  sma10: 0,
  sma50: 0,
  ema10: 0,
  ema50: 0,
  supportLevel: 0,
  resistanceLevel: 0,
  fibonacci382: 0,
  fibonacci500: 0,
  fibonacci618: 0,
  averageVolume20: 0,
  currentVolume: 0,
  volumeConfirmation: false,
  trend: "neutral",
  trendlineSupport: 0,
  trendlineResistance: 0,
};

export const EMPTY_INDICATOR_VALUES: Readonly<IndicatorValues> = Object.freeze(emptyValues);

/**
 * Assemble a frozen result. Quality is always derived from `signals`.
 */
export function buildIndicatorSet(params: {
  assetId: string;
  currentPrice: number;
  values: IndicatorValues;
  signals: readonly EntrySignal[];
  priceHistory: readonly PricePoint[];
  provenance: DataProvenance;
  analyzedAt?: number;
}): IndicatorSet {
  const quality = calculateEntryQuality(params.signals);

  const result: IndicatorSet = {
    ...params.values,
    assetId: params.assetId,
    currentPrice: params.currentPrice,
    priceHistory: Object.freeze([...params.priceHistory]),
    provenance: params.provenance,
    signals: Object.freeze(params.signals.map((s) => Object.freeze({ ...s }))),
    quality,
    qualityScore: qualityToScore(quality),
    status: "complete",
    analyzedAt: params.analyzedAt ?? Date.now(),
  };
  return Object.freeze(result);
}

/**
 * Result returned when the pipeline fails: very poor, neutral, and a single
 * very weak signal asking for manual review
 */
export function createErrorIndicatorSet(assetId: string, currentPrice: number): IndicatorSet {
  const diagnostic: EntrySignal = {
    technique: "support_resistance",
    strength: "very_weak",
    rationale: "Technical analysis failed - manual review required",
    targetPrice: 0,
    stopPrice: 0,
    confidence: 0,
  };

  const result: IndicatorSet = {
    ...EMPTY_INDICATOR_VALUES,
    assetId,
    currentPrice,
    priceHistory: Object.freeze([]),
    provenance: "synthetic",
    signals: Object.freeze([Object.freeze(diagnostic)]),
    quality: "very_poor",
    qualityScore: qualityToScore("very_poor"),
    status: "error",
    analyzedAt: Date.now(),
  };
  return Object.freeze(result);
}

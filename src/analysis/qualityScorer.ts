import type { EntryQuality, EntrySignal, SignalStrength } from "../utils/types.js";

const STRENGTH_WEIGHTS: Record<SignalStrength, number> = {
  very_strong: 1.0,
  strong: 0.8,
  moderate: 0.6,
  weak: 0.4,
  very_weak: 0.2,
};

const DEFAULT_WEIGHT = 0.5;

const QUALITY_SCORES: Record<EntryQuality, number> = {
  excellent: 95,
  good: 80,
  average: 60,
  poor: 30,
  very_poor: 10,
};

function isSignalStrength(value: string): value is SignalStrength {
  return Object.prototype.hasOwnProperty.call(STRENGTH_WEIGHTS, value);
}

export function getSignalWeight(strength: string): number {
  return isSignalStrength(strength) ? STRENGTH_WEIGHTS[strength] : DEFAULT_WEIGHT;
}

/**
 * Confidence averaged with strength weights; 0 for no signals
 */
export function calculateWeightedScore(signals: readonly EntrySignal[]): number {
  let totalScore = 0;
  let totalWeight = 0;

  for (const signal of signals) {
    const weight = getSignalWeight(signal.strength);
    totalScore += signal.confidence * weight;
    totalWeight += weight;
  }

  return totalWeight > 0 ? totalScore / totalWeight : 0;
}

/**
 * Overall entry quality. No signals at all rates as "poor".
 */
export function calculateEntryQuality(signals: readonly EntrySignal[]): EntryQuality {
  if (signals.length === 0) {
    return "poor";
  }

  const score = calculateWeightedScore(signals);
  if (score >= 0.85) return "excellent";
  if (score >= 0.75) return "good";
  if (score >= 0.6) return "average";
  if (score >= 0.4) return "poor";
  return "very_poor";
}

/**
 * 0-100 score used to rank watchlist entries
 */
export function qualityToScore(quality: EntryQuality): number {
  return QUALITY_SCORES[quality];
}

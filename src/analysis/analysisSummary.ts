import type { IndicatorSet } from "../utils/types.js";

/**
 * Current volume relative to the 20-period average (1 when unknown)
 */
export function volumeRatio(set: IndicatorSet): number {
  return set.averageVolume20 > 0 ? set.currentVolume / set.averageVolume20 : 1;
}

function rsiLabel(rsi: number): string {
  if (rsi < 30) return "oversold";
  if (rsi > 70) return "overbought";
  return "neutral";
}

function upperLabel(value: string): string {
  return value.replace(/_/g, " ").toUpperCase();
}

/**
 * Plain-text report for logs and notifications
 */
export function formatAnalysisSummary(set: IndicatorSet): string {
  const lines = [
    `TECHNICAL ANALYSIS - ${set.assetId}`,
    `Entry quality: ${upperLabel(set.quality)} (${set.qualityScore}/100)`,
    `Trend: ${upperLabel(set.trend)}`,
    `Support: $${set.supportLevel.toFixed(2)} | Resistance: $${set.resistanceLevel.toFixed(2)}`,
    `RSI: ${set.rsi.toFixed(1)} (${rsiLabel(set.rsi)})`,
    `MACD: ${set.macd.toFixed(4)} (${set.macd > set.macdSignal ? "bullish" : "bearish"})`,
    `SMA10/50: $${set.sma10.toFixed(2)}/$${set.sma50.toFixed(2)}`,
    `Volume ratio: ${volumeRatio(set).toFixed(2)}x`,
  ];

  if (set.provenance === "synthetic") {
    lines.push("Data: synthetic estimate (provider unavailable)");
  }

  if (set.signals.length > 0) {
    lines.push("Entry signals:");
    for (const signal of set.signals) {
      lines.push(`- ${upperLabel(signal.technique)} [${signal.strength}]: ${signal.rationale}`);
    }
  }

  return lines.join("\n");
}

/**
 * Indicator Engine
 *
 * Pure technical-indicator math over an ascending price history.
 * Insufficient history yields neutral defaults (RSI 50, zero averages,
 * neutral trend) rather than errors.
 */

import type { IndicatorValues, PricePoint, TrendDirection } from "../utils/types.js";

export const RSI_PERIOD = 14;
export const MACD_FAST = 12;
export const MACD_SLOW = 26;
export const MACD_SIGNAL_RATIO = 0.9;
export const SMA_SHORT = 10;
export const SMA_LONG = 50;
export const VOLUME_PERIOD = 20;
export const TREND_WINDOW = 10;
const SUPPORT_RESISTANCE_SAMPLES = 5;
const VOLUME_CONFIRMATION_RATIO = 1.5;
const TREND_THRESHOLD = 0.02;
const WEEKLY_TREND_THRESHOLD = 5;

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * RSI over the trailing `period` close-to-close differences, simple averages
 */
export function calculateRSI(candles: readonly PricePoint[], period: number = RSI_PERIOD): number {
  if (candles.length < period + 1) {
    return 50;
  }

  let gains = 0;
  let losses = 0;
  for (let i = candles.length - period; i < candles.length; i++) {
    const current = candles[i];
    const previous = candles[i - 1];
    if (!current || !previous) continue;

    const change = current.close - previous.close;
    if (change > 0) {
      gains += change;
    } else {
      losses += Math.abs(change);
    }
  }

  const avgGain = gains / period;
  const avgLoss = losses / period;

  if (avgLoss === 0) {
    return 100;
  }

  const rsi = 100 - 100 / (1 + avgGain / avgLoss);
  return Math.min(100, Math.max(0, rsi));
}

/**
 * Simple moving average of the trailing `period` closes; 0 when too short
 */
export function calculateSMA(candles: readonly PricePoint[], period: number): number {
  if (period <= 0 || candles.length < period) {
    return 0;
  }
  return mean(candles.slice(-period).map((c) => c.close));
}

/**
 * EMA seeded with the SMA of the first `period` closes, then smoothed with
 * 2 / (period + 1) over the remaining closes; 0 when too short
 */
export function calculateEMA(candles: readonly PricePoint[], period: number): number {
  if (period <= 0 || candles.length < period) {
    return 0;
  }

  const multiplier = 2 / (period + 1);
  let ema = mean(candles.slice(0, period).map((c) => c.close));

  for (let i = period; i < candles.length; i++) {
    const candle = candles[i];
    if (!candle) continue;
    ema = candle.close * multiplier + ema * (1 - multiplier);
  }

  return ema;
}

/**
 * MACD line (EMA12 - EMA26). The signal line is approximated as
 * 0.9 x MACD, not a 9-period EMA of the MACD series.
 */
export function calculateMACD(candles: readonly PricePoint[]): { macd: number; signal: number } {
  if (candles.length < MACD_SLOW) {
    return { macd: 0, signal: 0 };
  }

  const macd = calculateEMA(candles, MACD_FAST) - calculateEMA(candles, MACD_SLOW);
  return { macd, signal: macd * MACD_SIGNAL_RATIO };
}

/**
 * Support = mean of the 5 lowest lows, resistance = mean of the 5 highest highs
 */
export function calculateSupportResistance(candles: readonly PricePoint[]): { support: number; resistance: number } {
  if (candles.length === 0) {
    return { support: 0, resistance: 0 };
  }

  const lows = candles.map((c) => c.low).sort((a, b) => a - b);
  const highs = candles.map((c) => c.high).sort((a, b) => b - a);

  return {
    support: mean(lows.slice(0, SUPPORT_RESISTANCE_SAMPLES)),
    resistance: mean(highs.slice(0, SUPPORT_RESISTANCE_SAMPLES)),
  };
}

export interface FibonacciLevels {
  swingHigh: number;
  swingLow: number;
  level382: number;
  level500: number;
  level618: number;
}

/**
 * Retracements measured down from the swing high over the whole window
 */
export function calculateFibonacciLevels(candles: readonly PricePoint[]): FibonacciLevels {
  if (candles.length === 0) {
    return { swingHigh: 0, swingLow: 0, level382: 0, level500: 0, level618: 0 };
  }

  const swingHigh = Math.max(...candles.map((c) => c.high));
  const swingLow = Math.min(...candles.map((c) => c.low));
  const range = swingHigh - swingLow;

  return {
    swingHigh,
    swingLow,
    level382: swingHigh - range * 0.382,
    level500: swingHigh - range * 0.5,
    level618: swingHigh - range * 0.618,
  };
}

export interface VolumeAnalysis {
  averageVolume20: number;
  currentVolume: number;
  volumeConfirmation: boolean;
}

/**
 * Trailing-20 volume average vs. current volume. `liveVolume` (from the
 * provider) wins over the last candle's volume when positive.
 */
export function calculateVolumeAnalysis(
  candles: readonly PricePoint[],
  liveVolume: number | null = null
): VolumeAnalysis {
  if (candles.length < VOLUME_PERIOD) {
    return { averageVolume20: 0, currentVolume: 0, volumeConfirmation: false };
  }

  const averageVolume20 = mean(candles.slice(-VOLUME_PERIOD).map((c) => c.volume));
  const lastVolume = candles[candles.length - 1]?.volume ?? 0;
  const currentVolume = liveVolume !== null && liveVolume > 0 ? liveVolume : lastVolume;

  return {
    averageVolume20,
    currentVolume,
    volumeConfirmation: currentVolume > averageVolume20 * VOLUME_CONFIRMATION_RATIO,
  };
}

/**
 * Mean close of the last 10 candles against the 10 before them
 */
export function calculateTrend(candles: readonly PricePoint[]): TrendDirection {
  if (candles.length < TREND_WINDOW * 2) {
    return "neutral";
  }

  const recentAvg = mean(candles.slice(-TREND_WINDOW).map((c) => c.close));
  const olderAvg = mean(candles.slice(-TREND_WINDOW * 2, -TREND_WINDOW).map((c) => c.close));

  if (recentAvg >= olderAvg * (1 + TREND_THRESHOLD)) {
    return "bullish";
  }
  if (recentAvg <= olderAvg * (1 - TREND_THRESHOLD)) {
    return "bearish";
  }
  return "neutral";
}

/**
 * Upgrade a neutral trend from the 7-day percentage change
 */
export function enhanceTrend(trend: TrendDirection, pctChange7d: number | null): TrendDirection {
  if (trend !== "neutral" || pctChange7d === null) {
    return trend;
  }
  if (pctChange7d > WEEKLY_TREND_THRESHOLD) return "bullish";
  if (pctChange7d < -WEEKLY_TREND_THRESHOLD) return "bearish";
  return trend;
}

/**
 * Full indicator block for one history
 */
export function computeIndicators(
  candles: readonly PricePoint[],
  liveVolume: number | null = null
): IndicatorValues {
  const { macd, signal } = calculateMACD(candles);
  const { support, resistance } = calculateSupportResistance(candles);
  const fibonacci = calculateFibonacciLevels(candles);
  const volume = calculateVolumeAnalysis(candles, liveVolume);

  return {
    rsi: calculateRSI(candles),
    macd,
    macdSignal: signal,
    sma10: calculateSMA(candles, SMA_SHORT),
    sma50: calculateSMA(candles, SMA_LONG),
    ema10: calculateEMA(candles, SMA_SHORT),
    ema50: calculateEMA(candles, SMA_LONG),
    supportLevel: support,
    resistanceLevel: resistance,
    fibonacci382: fibonacci.level382,
    fibonacci500: fibonacci.level500,
    fibonacci618: fibonacci.level618,
    ...volume,
    trend: calculateTrend(candles),
    // Simplified trendlines, not a fitted regression
    trendlineSupport: support * 0.95,
    trendlineResistance: resistance * 1.05,
  };
}

/**
 * Whether timestamps never decrease
 */
export function isChronological(candles: readonly PricePoint[]): boolean {
  for (let i = 1; i < candles.length; i++) {
    const current = candles[i];
    const previous = candles[i - 1];
    if (current && previous && current.timestamp < previous.timestamp) {
      return false;
    }
  }
  return true;
}

/**
 * One OHLC candle
 */
export interface PricePoint {
  readonly timestamp: number; // epoch ms
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Where a price history came from
 */
export type DataProvenance = "provider" | "cache" | "synthetic";

/**
 * Ordered candle series for one asset (ascending timestamps)
 */
export interface PriceHistory {
  readonly assetId: string;
  readonly points: readonly PricePoint[];
  readonly provenance: DataProvenance;
}

export type TrendDirection = "bullish" | "bearish" | "neutral";

export type EntryTechnique =
  | "rsi_oversold"
  | "macd_bullish_crossover"
  | "moving_average_crossover"
  | "support_resistance"
  | "fibonacci_retracement"
  | "volume_breakout"
  | "trendline_bounce";

export type SignalStrength = "very_strong" | "strong" | "moderate" | "weak" | "very_weak";

export type EntryQuality = "excellent" | "good" | "average" | "poor" | "very_poor";

/**
 * Detected entry opportunity
 */
export interface EntrySignal {
  readonly technique: EntryTechnique;
  readonly strength: SignalStrength;
  readonly rationale: string;
  readonly targetPrice: number;
  readonly stopPrice: number;
  readonly confidence: number; // 0-1
}

/**
 * Numeric indicator block. Zero means "not enough history" for the
 * moving averages, MACD and volume fields.
 */
export interface IndicatorValues {
  rsi: number; // 0-100
  macd: number;
  macdSignal: number;
  sma10: number;
  sma50: number;
  ema10: number;
  ema50: number;
  supportLevel: number;
  resistanceLevel: number;
  fibonacci382: number;
  fibonacci500: number;
  fibonacci618: number;
  averageVolume20: number;
  currentVolume: number;
  volumeConfirmation: boolean;
  trend: TrendDirection;
  trendlineSupport: number;
  trendlineResistance: number;
}

export type AnalysisStatus = "complete" | "error";

/**
 * Per-asset analysis result delivered to callers
 */
export interface IndicatorSet extends Readonly<IndicatorValues> {
  readonly assetId: string;
  readonly currentPrice: number;
  readonly priceHistory: readonly PricePoint[];
  readonly provenance: DataProvenance;
  readonly signals: readonly EntrySignal[];
  readonly quality: EntryQuality;
  readonly qualityScore: number; // 0-100
  readonly status: AnalysisStatus;
  readonly analyzedAt: number;
}

/**
 * Scalar market metrics from the coin detail endpoint
 */
export interface MarketMetrics {
  readonly marketCap: number;
  readonly pctChange7d: number;
  readonly pctChange24h: number;
}

/**
 * Watchlist entry handed to the batch analyzer
 */
export interface WatchlistItem {
  assetId: string;
  currentPrice: number;
}

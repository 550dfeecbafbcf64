/**
 * Analysis Orchestrator
 *
 * Per-asset pipeline:
 *   start → fetching → computing_indicators → enhancing →
 *   generating_signals → scoring → done
 * Any failure ends in `error` and yields the fixed error result; the
 * returned promise never rejects.
 */

import { info, warn, error as logError, describeError, logAnalysisResult } from "../utils/logger.js";
import type { IndicatorSet, MarketMetrics, PriceHistory } from "../utils/types.js";
import type { FetchOptions } from "../market/marketDataFetcher.js";
import { computeIndicators, enhanceTrend, isChronological, VOLUME_PERIOD } from "./indicators.js";
import { generateEntrySignals } from "./signalGenerator.js";
import { buildIndicatorSet, createErrorIndicatorSet } from "./indicatorSet.js";

export type AnalysisStage =
  | "start"
  | "fetching"
  | "computing_indicators"
  | "enhancing"
  | "generating_signals"
  | "scoring"
  | "done"
  | "error";

/**
 * Market data the pipeline needs; implemented by MarketDataFetcher
 */
export interface MarketDataSource {
  fetchHistory(assetId: string, currentPrice: number, options?: FetchOptions): Promise<PriceHistory>;
  fetchMetrics(assetId: string, options?: FetchOptions): Promise<MarketMetrics | null>;
  fetchVolume(assetId: string, options?: FetchOptions): Promise<number | null>;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
  onStage?: (stage: AnalysisStage) => void;
}

export class AnalysisOrchestrator {
  constructor(
    private readonly source: MarketDataSource,
    private readonly now: () => number = Date.now
  ) {}

  async analyze(assetId: string, currentPrice: number, options: AnalyzeOptions = {}): Promise<IndicatorSet> {
    const { signal, onStage } = options;
    let stage: AnalysisStage = "start";

    // A failing listener is logged and does not affect the analysis
    const notify = (next: AnalysisStage) => {
      try {
        onStage?.(next);
      } catch (err) {
        warn("AnalysisOrchestrator", `Stage listener failed on ${next} for ${assetId}: ${describeError(err)}`);
      }
    };

    const enter = (next: AnalysisStage) => {
      signal?.throwIfAborted();
      stage = next;
      notify(next);
    };

    try {
      enter("start");
      info("AnalysisOrchestrator", `Starting technical analysis for ${assetId}`);

      enter("fetching");
      const history = await this.source.fetchHistory(assetId, currentPrice, { signal });
      if (!isChronological(history.points)) {
        throw new Error(`Price history for ${assetId} is not in chronological order`);
      }
      const liveVolume =
        history.points.length >= VOLUME_PERIOD ? await this.source.fetchVolume(assetId, { signal }) : null;

      enter("computing_indicators");
      const values = computeIndicators(history.points, liveVolume);

      enter("enhancing");
      if (values.trend === "neutral") {
        const metrics = await this.source.fetchMetrics(assetId, { signal });
        values.trend = enhanceTrend(values.trend, metrics ? metrics.pctChange7d : null);
      }

      enter("generating_signals");
      const signals = generateEntrySignals(values, currentPrice);

      enter("scoring");
      const result = buildIndicatorSet({
        assetId,
        currentPrice,
        values,
        signals,
        priceHistory: history.points,
        provenance: history.provenance,
        analyzedAt: this.now(),
      });

      enter("done");
      logAnalysisResult(result);
      return result;
    } catch (err) {
      logError("AnalysisOrchestrator", `Technical analysis failed for ${assetId} during ${stage}: ${describeError(err)}`);
      notify("error");
      return createErrorIndicatorSet(assetId, currentPrice);
    }
  }
}

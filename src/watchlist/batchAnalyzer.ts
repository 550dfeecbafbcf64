/**
 * Watchlist batch analyzer
 *
 * Runs the analysis pipeline over a whole watchlist with a bounded number
 * of concurrent runs. Holds the rate gate's intensive lock for the batch so
 * non-privileged consumers defer until it finishes.
 */

import { info, warn, describeError } from "../utils/logger.js";
import type { EntryQuality, IndicatorSet, WatchlistItem } from "../utils/types.js";
import type { RateGate } from "../coordination/rateGate.js";
import type { AnalysisStore } from "../storage/analysisStore.js";
import type { AnalyzeOptions } from "../analysis/analysisOrchestrator.js";
import { createErrorIndicatorSet } from "../analysis/indicatorSet.js";

export const WATCHLIST_CALLER = "watchlist-analyzer";

export interface Analyzer {
  analyze(assetId: string, currentPrice: number, options?: AnalyzeOptions): Promise<IndicatorSet>;
}

export interface BatchAnalyzerOptions {
  analyzer: Analyzer;
  rateGate: RateGate;
  store: AnalysisStore;
  concurrency?: number;
  cooldownMs?: number;
  callerId?: string;
  now?: () => number;
}

export type BatchStatus = "completed" | "cancelled" | "skipped";

export interface BatchResult {
  status: BatchStatus;
  results: Map<string, IndicatorSet>;
  qualityCounts: Record<EntryQuality, number>;
  durationMs: number;
}

function emptyQualityCounts(): Record<EntryQuality, number> {
  return { excellent: 0, good: 0, average: 0, poor: 0, very_poor: 0 };
}

export class BatchAnalyzer {
  private readonly analyzer: Analyzer;
  private readonly rateGate: RateGate;
  private readonly store: AnalysisStore;
  private readonly concurrency: number;
  private readonly cooldownMs: number;
  private readonly callerId: string;
  private readonly now: () => number;

  private running = false;
  private lastRunAt: number | null = null;
  private controller: AbortController | null = null;

  constructor(options: BatchAnalyzerOptions) {
    this.analyzer = options.analyzer;
    this.rateGate = options.rateGate;
    this.store = options.store;
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.cooldownMs = options.cooldownMs ?? 0;
    this.callerId = options.callerId ?? WATCHLIST_CALLER;
    this.now = options.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Analyze every item. Skips when a batch is already running, the
   * previous batch started less than `cooldownMs` ago, or another caller
   * holds the intensive lock. A failed analysis is recorded as the error
   * result.
   */
  async analyzeAll(items: readonly WatchlistItem[]): Promise<BatchResult> {
    const startedAt = this.now();
    const results = new Map<string, IndicatorSet>();
    const qualityCounts = emptyQualityCounts();

    if (this.running) {
      info("BatchAnalyzer", "Analysis already in progress, skipping duplicate request");
      return { status: "skipped", results, qualityCounts, durationMs: 0 };
    }
    if (this.lastRunAt !== null && startedAt - this.lastRunAt < this.cooldownMs) {
      info("BatchAnalyzer", "Analysis requested too soon, waiting for cooldown period");
      return { status: "skipped", results, qualityCounts, durationMs: 0 };
    }

    if (!this.rateGate.beginIntensive(this.callerId)) {
      info("BatchAnalyzer", "Another intensive operation holds the rate gate, skipping batch");
      return { status: "skipped", results, qualityCounts, durationMs: 0 };
    }

    this.running = true;
    this.lastRunAt = startedAt;
    const controller = new AbortController();
    this.controller = controller;

    let next = 0;
    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted) {
        const index = next++;
        const item = items[index];
        if (!item) return;

        info("BatchAnalyzer", `Analyzing ${item.assetId} (${index + 1}/${items.length})`);
        let result: IndicatorSet;
        try {
          result = await this.analyzer.analyze(item.assetId, item.currentPrice, { signal: controller.signal });
        } catch (err) {
          warn("BatchAnalyzer", `Analysis of ${item.assetId} failed: ${describeError(err)}`);
          result = createErrorIndicatorSet(item.assetId, item.currentPrice);
        }
        if (controller.signal.aborted) return;

        results.set(item.assetId, result);
        qualityCounts[result.quality]++;
        try {
          await this.store.save(result);
        } catch (err) {
          warn("BatchAnalyzer", `Could not store result for ${item.assetId}: ${describeError(err)}`);
        }
      }
    };

    try {
      const workers = Math.min(this.concurrency, items.length);
      await Promise.all(Array.from({ length: workers }, () => worker()));
    } finally {
      this.rateGate.endIntensive(this.callerId);
      this.running = false;
      this.controller = null;
    }

    const status: BatchStatus = controller.signal.aborted ? "cancelled" : "completed";
    const durationMs = this.now() - startedAt;
    info(
      "BatchAnalyzer",
      `Batch ${status}: ${results.size}/${items.length} analyzed in ${durationMs}ms`,
      qualityCounts
    );

    return { status, results, qualityCounts, durationMs };
  }

  /**
   * Stop scheduling further assets; in-flight runs are discarded
   */
  cancel(): void {
    if (this.controller) {
      info("BatchAnalyzer", "Cancelling batch analysis");
      this.controller.abort();
    }
  }
}

/**
 * Analysis Scheduler
 *
 * Cron jobs:
 * - price refresh: keeps watchlist prices current
 * - analysis: batch technical analysis of the watchlist
 * - cache sweep: drops expired cache entries
 */

import cron, { type ScheduledTask } from "node-cron";
import { info, warn, error as logError } from "../utils/logger.js";
import type { ResultCache } from "../cache/resultCache.js";
import type { BatchAnalyzer, BatchResult } from "../watchlist/batchAnalyzer.js";
import type { PriceRefresher } from "../watchlist/priceRefresher.js";

export interface ScheduleExpressions {
  priceRefresh: string;
  analysis: string;
  cacheSweep: string;
}

export interface AnalysisSchedulerDeps {
  watchlist: readonly string[];
  priceRefresher: PriceRefresher;
  batchAnalyzer: BatchAnalyzer;
  cache: ResultCache;
}

type JobName = "priceRefresh" | "analysis" | "cacheSweep";

interface JobState {
  task: ScheduledTask;
  scheduled: boolean;
  running: boolean;
}

export class AnalysisScheduler {
  private readonly jobs: Record<JobName, JobState>;

  constructor(
    private readonly deps: AnalysisSchedulerDeps,
    expressions: ScheduleExpressions
  ) {
    for (const [name, expression] of Object.entries(expressions)) {
      if (!cron.validate(expression)) {
        throw new Error(`Invalid cron expression for ${name}: "${expression}"`);
      }
    }

    this.jobs = {
      priceRefresh: this.createJob("priceRefresh", expressions.priceRefresh, () => this.runPriceRefresh()),
      analysis: this.createJob("analysis", expressions.analysis, async () => {
        await this.runAnalysisCycle();
      }),
      cacheSweep: this.createJob("cacheSweep", expressions.cacheSweep, async () => {
        this.sweepCache();
      }),
    };
  }

  start(): void {
    for (const [name, job] of Object.entries(this.jobs)) {
      job.task.start();
      job.scheduled = true;
      info("AnalysisCron", `${name} job scheduled`);
    }
  }

  stop(): void {
    for (const job of Object.values(this.jobs)) {
      job.task.stop();
      job.scheduled = false;
    }
    info("AnalysisCron", "Stopped all analysis cron jobs");
  }

  status(): Record<JobName, { scheduled: boolean; isJobRunning: boolean }> {
    return {
      priceRefresh: { scheduled: this.jobs.priceRefresh.scheduled, isJobRunning: this.jobs.priceRefresh.running },
      analysis: { scheduled: this.jobs.analysis.scheduled, isJobRunning: this.jobs.analysis.running },
      cacheSweep: { scheduled: this.jobs.cacheSweep.scheduled, isJobRunning: this.jobs.cacheSweep.running },
    };
  }

  async runPriceRefresh(): Promise<void> {
    await this.deps.priceRefresher.refresh(this.deps.watchlist);
  }

  /**
   * Refresh prices for assets without one, then analyze the whole watchlist
   */
  async runAnalysisCycle(): Promise<BatchResult | null> {
    const missing = this.deps.watchlist.filter((id) => this.deps.priceRefresher.getPrice(id) === null);
    if (missing.length > 0) {
      await this.deps.priceRefresher.refresh(missing);
    }

    const items = this.deps.priceRefresher.watchlistItems(this.deps.watchlist);
    if (items.length === 0) {
      warn("AnalysisCron", "No watchlist prices available, skipping analysis cycle");
      return null;
    }

    return this.deps.batchAnalyzer.analyzeAll(items);
  }

  sweepCache(): number {
    const removed = this.deps.cache.clearExpired();
    const stats = this.deps.cache.stats();
    info(
      "AnalysisCron",
      `Cache sweep removed ${removed} entries (hit ratio ${(stats.hitRatio * 100).toFixed(1)}%)`,
      stats.sizes
    );
    return removed;
  }

  private createJob(name: JobName, expression: string, run: () => Promise<void>): JobState {
    const state: JobState = {
      task: cron.schedule(
        expression,
        async () => {
          // Track running jobs to prevent overlaps
          if (state.running) {
            warn("AnalysisCron", `${name} job already running, skipping this cycle`);
            return;
          }

          state.running = true;
          try {
            await run();
          } catch (err) {
            logError("AnalysisCron", `${name} job failed`, err);
          } finally {
            state.running = false;
          }
        },
        { scheduled: false }
      ),
      scheduled: false,
      running: false,
    };
    return state;
  }
}

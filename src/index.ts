import "dotenv/config";
import type { Redis } from "ioredis";
import { loadConfig } from "./config/config.js";
import { RateGate } from "./coordination/rateGate.js";
import { ResultCache } from "./cache/resultCache.js";
import { MarketDataFetcher } from "./market/marketDataFetcher.js";
import { AnalysisOrchestrator } from "./analysis/analysisOrchestrator.js";
import { formatAnalysisSummary } from "./analysis/analysisSummary.js";
import { BatchAnalyzer } from "./watchlist/batchAnalyzer.js";
import { PriceRefresher } from "./watchlist/priceRefresher.js";
import { AnalysisScheduler } from "./cron/analysisScheduler.js";
import type { AnalysisStore } from "./storage/analysisStore.js";
import { MemoryAnalysisStore } from "./storage/memoryAnalysisStore.js";
import { RedisAnalysisStore } from "./storage/redisAnalysisStore.js";
import { createRedisClient } from "./utils/redisClient.js";
import { info, warn, error } from "./utils/logger.js";

const config = loadConfig();

const rateGate = new RateGate(config.rateGate);
const cache = new ResultCache({
  ttls: {
    ohlc: config.cacheTtl.ohlcMs,
    marketMetrics: config.cacheTtl.marketMetricsMs,
    price: config.cacheTtl.priceMs,
    volume: config.cacheTtl.volumeMs,
  },
});
const fetcher = new MarketDataFetcher({
  cache,
  rateGate,
  baseUrl: config.coingecko.baseUrl,
  apiKey: config.coingecko.apiKey,
  historyTimeoutMs: config.coingecko.historyTimeoutMs,
  metricsTimeoutMs: config.coingecko.metricsTimeoutMs,
  ...config.fetch,
});
const orchestrator = new AnalysisOrchestrator(fetcher);
const priceRefresher = new PriceRefresher(fetcher, rateGate);

let redis: Redis | null = null;
let store: AnalysisStore;
if (config.redis.enabled) {
  redis = createRedisClient(config.redis);
  store = new RedisAnalysisStore(redis, config.redis.analysisTtlSeconds);
} else {
  store = new MemoryAnalysisStore(config.redis.analysisTtlSeconds);
}

const batchAnalyzer = new BatchAnalyzer({
  analyzer: orchestrator,
  rateGate,
  store,
  concurrency: config.analysis.concurrency,
  cooldownMs: config.analysis.cooldownMs,
});

const scheduler = new AnalysisScheduler(
  {
    watchlist: config.analysis.watchlist,
    priceRefresher,
    batchAnalyzer,
    cache,
  },
  config.cron
);

/**
 * Main startup sequence
 */
async function start(): Promise<void> {
  console.log("=".repeat(70));
  console.log("CRYPTO ENTRY SIGNALS");
  console.log("=".repeat(70));
  console.log("");

  if (redis) {
    await redis.connect();
    console.log("✓ Redis analysis store enabled");
  } else {
    console.log("⚠ Redis disabled, analysis results kept in memory");
  }

  info("Main", `Watchlist: ${config.analysis.watchlist.join(", ")}`);

  // Initial cycle so results exist before the first scheduled run
  const batch = await scheduler.runAnalysisCycle();
  if (batch) {
    for (const result of Array.from(batch.results.values())) {
      console.log(`\n${formatAnalysisSummary(result)}`);
    }
  } else {
    warn("Main", "Initial analysis cycle produced no results");
  }

  scheduler.start();

  console.log("\n✓ Crypto Entry Signals started successfully");
  console.log(`  - Price refresh: ${config.cron.priceRefresh}`);
  console.log(`  - Watchlist analysis: ${config.cron.analysis}`);
  console.log(`  - Cache sweep: ${config.cron.cacheSweep}`);
  console.log("");
}

/**
 * Graceful shutdown
 */
async function shutdown(): Promise<void> {
  console.log("\nShutting down Crypto Entry Signals...");

  scheduler.stop();
  batchAnalyzer.cancel();
  if (redis) {
    await redis.quit();
  }
  console.log("✓ Shutdown complete");
  process.exit(0);
}

function handleSignal(): void {
  shutdown().catch((err) => {
    error("Main", "Error during shutdown", err);
    process.exit(1);
  });
}

process.on("SIGINT", handleSignal);
process.on("SIGTERM", handleSignal);

start().catch((err) => {
  error("Main", "Startup failed", err);
  process.exit(1);
});

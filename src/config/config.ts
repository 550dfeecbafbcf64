/**
 * Environment configuration
 *
 * Values come from process.env (populated by dotenv in the entry point).
 * Every setting has a default so the service starts with an empty .env.
 */

export interface CacheTtlConfig {
  ohlcMs: number;
  marketMetricsMs: number;
  priceMs: number;
  volumeMs: number;
}

export interface AppConfig {
  coingecko: {
    baseUrl: string;
    apiKey: string | null;
    historyTimeoutMs: number;
    metricsTimeoutMs: number;
  };
  rateGate: {
    minIntervalMs: number;
    privilegedCallers: string[];
  };
  fetch: {
    maxAttempts: number;
    retryBaseDelayMs: number;
    maxRetryDelayMs: number;
  };
  cacheTtl: CacheTtlConfig;
  analysis: {
    concurrency: number;
    cooldownMs: number;
    watchlist: string[];
  };
  cron: {
    priceRefresh: string;
    analysis: string;
    cacheSweep: string;
  };
  redis: {
    enabled: boolean;
    host: string;
    port: number;
    db: number;
    analysisTtlSeconds: number;
  };
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid integer for ${key}: "${raw}"`);
  }
  return parsed;
}

function listFrom(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    coingecko: {
      baseUrl: env.COINGECKO_BASE_URL || "https://api.coingecko.com/api/v3",
      apiKey: env.COINGECKO_API_KEY || null,
      historyTimeoutMs: intFrom(env, "HISTORY_TIMEOUT_MS", 15000),
      metricsTimeoutMs: intFrom(env, "METRICS_TIMEOUT_MS", 5000),
    },
    rateGate: {
      minIntervalMs: intFrom(env, "RATE_GATE_MIN_INTERVAL_MS", 1000),
      privilegedCallers: listFrom(env, "RATE_GATE_PRIVILEGED_CALLERS", ["technical-analysis"]),
    },
    fetch: {
      maxAttempts: Math.max(1, intFrom(env, "FETCH_MAX_ATTEMPTS", 3)),
      retryBaseDelayMs: intFrom(env, "FETCH_RETRY_BASE_DELAY_MS", 1000),
      maxRetryDelayMs: intFrom(env, "FETCH_MAX_RETRY_DELAY_MS", 8000),
    },
    cacheTtl: {
      ohlcMs: intFrom(env, "CACHE_TTL_OHLC_MS", 30 * 60 * 1000),
      marketMetricsMs: intFrom(env, "CACHE_TTL_MARKET_METRICS_MS", 15 * 60 * 1000),
      priceMs: intFrom(env, "CACHE_TTL_PRICE_MS", 2 * 60 * 1000),
      volumeMs: intFrom(env, "CACHE_TTL_VOLUME_MS", 5 * 60 * 1000),
    },
    analysis: {
      concurrency: Math.max(1, intFrom(env, "ANALYSIS_CONCURRENCY", 2)),
      cooldownMs: intFrom(env, "ANALYSIS_COOLDOWN_MS", 60 * 1000),
      watchlist: listFrom(env, "WATCHLIST", ["bitcoin", "ethereum", "solana"]),
    },
    cron: {
      priceRefresh: env.PRICE_REFRESH_CRON || "*/2 * * * *",
      analysis: env.ANALYSIS_CRON || "*/30 * * * *",
      cacheSweep: env.CACHE_SWEEP_CRON || "*/5 * * * *",
    },
    redis: {
      enabled: env.REDIS_ENABLED === "true",
      host: env.REDIS_HOST || "localhost",
      port: intFrom(env, "REDIS_PORT", 6379),
      db: intFrom(env, "REDIS_DB", 0),
      analysisTtlSeconds: intFrom(env, "ANALYSIS_TTL_SECONDS", 86400),
    },
  };
}

/**
 * Market Data Fetcher
 *
 * Fetches OHLC history and market metrics from CoinGecko through the
 * shared Result Cache and Rate Gate. Provider failures never reach the
 * caller: history degrades to a synthetic series, scalars to null.
 */

import axios, { type AxiosInstance } from "axios";
import type { z } from "zod";
import { info, warn, debug, error as logError, describeError } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import type { MarketMetrics, PriceHistory, PricePoint } from "../utils/types.js";
import type { ResultCache } from "../cache/resultCache.js";
import { ANALYSIS_CALLER, type RateGate } from "../coordination/rateGate.js";
import { normalizeAssetId } from "./assetAliases.js";
import { CoinDetailSchema, OhlcResponseSchema, SimplePriceSchema } from "./providerSchemas.js";
import { estimateVolume, generateSyntheticHistory, type RandomSource } from "./syntheticHistory.js";

export const COINGECKO_API_URL = "https://api.coingecko.com/api/v3";
const HISTORY_DAYS = 30;
const LIVE_PRICE_TOLERANCE = 0.1;

export interface MarketDataFetcherOptions {
  cache: ResultCache;
  rateGate: RateGate;
  http?: AxiosInstance;
  baseUrl?: string;
  apiKey?: string | null;
  callerId?: string;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  maxRetryDelayMs?: number;
  historyTimeoutMs?: number;
  metricsTimeoutMs?: number;
  random?: RandomSource;
  now?: () => number;
}

export interface FetchOptions {
  signal?: AbortSignal;
  callerId?: string;
}

type FailureReason =
  | "denied"
  | "cancelled"
  | "not_found"
  | "rate_limited"
  | "malformed"
  | "http_error"
  | "network_error";

type RequestOutcome<T> = { ok: true; data: T } | { ok: false; reason: FailureReason };

interface CoinSnapshot {
  metrics: MarketMetrics;
  volume: number;
}

/**
 * Replace the last candle's close with the live price when they differ by
 * more than 10%, widening high/low to contain it. Returns a new array.
 */
export function reconcileWithLivePrice(
  points: readonly PricePoint[],
  currentPrice: number
): readonly PricePoint[] {
  const last = points[points.length - 1];
  if (!last || !(currentPrice > 0)) {
    return points;
  }

  const difference = Math.abs(last.close - currentPrice) / currentPrice;
  if (difference <= LIVE_PRICE_TOLERANCE) {
    return points;
  }

  return [
    ...points.slice(0, -1),
    {
      timestamp: last.timestamp,
      open: last.open,
      high: Math.max(last.high, currentPrice),
      low: Math.min(last.low, currentPrice),
      close: currentPrice,
      volume: last.volume,
    },
  ];
}

export class MarketDataFetcher {
  private readonly cache: ResultCache;
  private readonly rateGate: RateGate;
  private readonly http: AxiosInstance;
  private readonly callerId: string;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly historyTimeoutMs: number;
  private readonly metricsTimeoutMs: number;
  private readonly random: RandomSource;
  private readonly now: () => number;

  constructor(options: MarketDataFetcherOptions) {
    this.cache = options.cache;
    this.rateGate = options.rateGate;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? COINGECKO_API_URL,
        headers: {
          "User-Agent": "Crypto-Entry-Signals/1.0",
          ...(options.apiKey ? { "x-cg-demo-api-key": options.apiKey } : {}),
        },
      });
    this.callerId = options.callerId ?? ANALYSIS_CALLER;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 8000;
    this.historyTimeoutMs = options.historyTimeoutMs ?? 15000;
    this.metricsTimeoutMs = options.metricsTimeoutMs ?? 5000;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * 30-day OHLC history. Falls back to a synthetic series on any failure.
   */
  async fetchHistory(assetId: string, currentPrice: number, options: FetchOptions = {}): Promise<PriceHistory> {
    const id = normalizeAssetId(assetId);

    const cached = this.cache.get(id, "ohlc");
    if (cached) {
      return { assetId: id, points: reconcileWithLivePrice(cached, currentPrice), provenance: "cache" };
    }

    info("MarketDataFetcher", `Fetching OHLC data for ${id}`);
    const outcome = await this.request(
      `/coins/${encodeURIComponent(id)}/ohlc`,
      { vs_currency: "usd", days: HISTORY_DAYS },
      `OHLC ${id}`,
      this.historyTimeoutMs,
      OhlcResponseSchema,
      options
    );

    if (!outcome.ok) {
      warn("MarketDataFetcher", `Using synthetic history for ${id} (${outcome.reason})`);
      return this.syntheticHistory(id, currentPrice);
    }

    const points = this.toPricePoints(outcome.data);
    if (points.length === 0) {
      warn("MarketDataFetcher", `No usable OHLC rows for ${id}, using synthetic history`);
      return this.syntheticHistory(id, currentPrice);
    }

    this.cache.put(id, "ohlc", points);
    info("MarketDataFetcher", `Parsed ${points.length} OHLC points for ${id}`);

    return { assetId: id, points: reconcileWithLivePrice(points, currentPrice), provenance: "provider" };
  }

  /**
   * Market cap and percentage changes; null when unavailable
   */
  async fetchMetrics(assetId: string, options: FetchOptions = {}): Promise<MarketMetrics | null> {
    const id = normalizeAssetId(assetId);
    const cached = this.cache.get(id, "marketMetrics");
    if (cached) {
      return cached;
    }

    const snapshot = await this.fetchCoinSnapshot(id, `market metrics ${id}`, options);
    return snapshot?.metrics ?? null;
  }

  /**
   * Current 24h trading volume in USD; null when unavailable
   */
  async fetchVolume(assetId: string, options: FetchOptions = {}): Promise<number | null> {
    const id = normalizeAssetId(assetId);
    const cached = this.cache.get(id, "volume");
    if (cached !== undefined) {
      return cached;
    }

    const snapshot = await this.fetchCoinSnapshot(id, `volume ${id}`, options);
    return snapshot && snapshot.volume > 0 ? snapshot.volume : null;
  }

  /**
   * Instantaneous USD price; null when unavailable
   */
  async fetchPrice(assetId: string, options: FetchOptions = {}): Promise<number | null> {
    const id = normalizeAssetId(assetId);
    const cached = this.cache.get(id, "price");
    if (cached !== undefined) {
      return cached;
    }

    const outcome = await this.request(
      "/simple/price",
      { ids: id, vs_currencies: "usd" },
      `price ${id}`,
      this.metricsTimeoutMs,
      SimplePriceSchema,
      options
    );
    if (!outcome.ok) {
      debug("MarketDataFetcher", `Price unavailable for ${id} (${outcome.reason})`);
      return null;
    }

    const price = outcome.data[id]?.usd;
    if (typeof price !== "number" || price <= 0) {
      return null;
    }

    this.cache.put(id, "price", price);
    return price;
  }

  private async fetchCoinSnapshot(id: string, operation: string, options: FetchOptions): Promise<CoinSnapshot | null> {
    const outcome = await this.request(
      `/coins/${encodeURIComponent(id)}`,
      {
        localization: false,
        tickers: false,
        market_data: true,
        community_data: false,
        developer_data: false,
      },
      operation,
      this.metricsTimeoutMs,
      CoinDetailSchema,
      options
    );

    if (!outcome.ok) {
      debug("MarketDataFetcher", `Could not fetch ${operation} (${outcome.reason})`);
      return null;
    }

    const marketData = outcome.data.market_data;
    const metrics: MarketMetrics = {
      marketCap: marketData.market_cap?.usd ?? 0,
      pctChange7d: marketData.price_change_percentage_7d ?? 0,
      pctChange24h: marketData.price_change_percentage_24h ?? 0,
    };
    const volume = marketData.total_volume?.usd ?? 0;

    this.cache.put(id, "marketMetrics", metrics);
    this.cache.put(id, "volume", volume);

    return { metrics, volume };
  }

  /**
   * GET through the rate gate with retries.
   * 429 backs off exponentially, thrown errors linearly; 404, other
   * statuses and payloads that fail validation are not retried.
   */
  private async request<S extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string | number | boolean>,
    operation: string,
    timeout: number,
    schema: S,
    options: FetchOptions
  ): Promise<RequestOutcome<z.output<S>>> {
    const callerId = options.callerId ?? this.callerId;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const granted = await this.rateGate.acquire(callerId, operation, options.signal);
      if (!granted) {
        return { ok: false, reason: options.signal?.aborted ? "cancelled" : "denied" };
      }

      let retryDelay: number;
      try {
        const response = await this.http.get<unknown>(path, {
          params,
          timeout,
          validateStatus: () => true,
        });
        debug("MarketDataFetcher", `${operation}: HTTP ${response.status}`);

        if (response.status === 200) {
          const parsed = schema.safeParse(response.data);
          if (!parsed.success) {
            logError("MarketDataFetcher", `Malformed payload for ${operation}: ${parsed.error.message}`);
            return { ok: false, reason: "malformed" };
          }
          return { ok: true, data: parsed.data };
        }

        if (response.status === 404) {
          warn("MarketDataFetcher", `${operation}: asset not found (404), check the id mapping`);
          return { ok: false, reason: "not_found" };
        }

        if (response.status !== 429) {
          warn("MarketDataFetcher", `${operation}: unexpected response code ${response.status}`);
          return { ok: false, reason: "http_error" };
        }

        if (attempt === this.maxAttempts) {
          warn("MarketDataFetcher", `${operation}: rate limited (429) after ${attempt} attempts`);
          return { ok: false, reason: "rate_limited" };
        }
        retryDelay = this.retryBaseDelayMs * Math.pow(2, attempt - 1);
        warn("MarketDataFetcher", `${operation}: rate limited (429), retrying in ${retryDelay}ms`);
      } catch (err) {
        if (attempt === this.maxAttempts) {
          logError("MarketDataFetcher", `${operation} failed after ${attempt} attempts: ${describeError(err)}`);
          return { ok: false, reason: "network_error" };
        }
        retryDelay = this.retryBaseDelayMs * attempt;
        warn("MarketDataFetcher", `${operation}: ${describeError(err)}, retrying in ${retryDelay}ms`);
      }

      const waited = await sleep(Math.min(retryDelay, this.maxRetryDelayMs), options.signal);
      if (!waited) {
        return { ok: false, reason: "cancelled" };
      }
    }

    return { ok: false, reason: "network_error" };
  }

  private toPricePoints(rows: z.output<typeof OhlcResponseSchema>): PricePoint[] {
    const sorted = [...rows].sort((a, b) => a.timestamp - b.timestamp);
    const points: PricePoint[] = [];

    for (const row of sorted) {
      const previous = points[points.length - 1];
      if (previous && previous.timestamp === row.timestamp) {
        continue;
      }
      // The OHLC endpoint carries no volume
      points.push({ ...row, volume: estimateVolume(row.close, this.random) });
    }

    return points;
  }

  private syntheticHistory(id: string, currentPrice: number): PriceHistory {
    return {
      assetId: id,
      points: generateSyntheticHistory(currentPrice, this.random, this.now()),
      provenance: "synthetic",
    };
  }
}

/**
 * Redis-backed analysis store
 *
 * Key pattern: analysis:latest:{assetId}, JSON payload, SETEX with TTL
 */

import type { Redis } from "ioredis";
import { debug, warn, describeError } from "../utils/logger.js";
import type { IndicatorSet } from "../utils/types.js";
import { ANALYSIS_KEY_PREFIX, analysisKey, byAnalyzedAtDesc, type AnalysisStore } from "./analysisStore.js";
import { parseStoredIndicatorSet } from "./indicatorSetSchema.js";

export class RedisAnalysisStore implements AnalysisStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number = 86400
  ) {}

  async save(result: IndicatorSet): Promise<void> {
    const key = analysisKey(result.assetId);
    try {
      await this.redis.setex(key, this.ttlSeconds, JSON.stringify(result));
      debug("AnalysisStore", `Stored analysis for ${result.assetId} (${result.quality})`);
    } catch (err) {
      warn("AnalysisStore", `Failed to store analysis for ${result.assetId}: ${describeError(err)}`);
    }
  }

  async getLatest(assetId: string): Promise<IndicatorSet | null> {
    try {
      const raw = await this.redis.get(analysisKey(assetId));
      return raw ? parseStoredIndicatorSet(raw) : null;
    } catch (err) {
      warn("AnalysisStore", `Failed to read analysis for ${assetId}: ${describeError(err)}`);
      return null;
    }
  }

  async listLatest(): Promise<IndicatorSet[]> {
    try {
      const keys = await this.redis.keys(`${ANALYSIS_KEY_PREFIX}*`);
      if (keys.length === 0) return [];

      const values = await this.redis.mget(...keys);
      const results: IndicatorSet[] = [];
      for (const value of values) {
        const parsed = value ? parseStoredIndicatorSet(value) : null;
        if (parsed) {
          results.push(parsed);
        }
      }
      return results.sort(byAnalyzedAtDesc);
    } catch (err) {
      warn("AnalysisStore", `Failed to list analyses: ${describeError(err)}`);
      return [];
    }
  }
}

/**
 * In-memory analysis store
 *
 * Same contract as the Redis store, including expiry. Used when Redis is
 * disabled and by tests.
 */

import type { IndicatorSet } from "../utils/types.js";
import { analysisKey, byAnalyzedAtDesc, type AnalysisStore } from "./analysisStore.js";

export class MemoryAnalysisStore implements AnalysisStore {
  private data: Map<string, IndicatorSet> = new Map();
  private expirations: Map<string, number> = new Map();

  constructor(
    private readonly ttlSeconds: number = 86400,
    private readonly now: () => number = Date.now
  ) {}

  async save(result: IndicatorSet): Promise<void> {
    const key = analysisKey(result.assetId);
    this.data.set(key, result);
    this.expirations.set(key, this.now() + this.ttlSeconds * 1000);
  }

  async getLatest(assetId: string): Promise<IndicatorSet | null> {
    return this.read(analysisKey(assetId));
  }

  async listLatest(): Promise<IndicatorSet[]> {
    const results: IndicatorSet[] = [];
    for (const key of Array.from(this.data.keys())) {
      const value = this.read(key);
      if (value) {
        results.push(value);
      }
    }
    return results.sort(byAnalyzedAtDesc);
  }

  clear(): void {
    this.data.clear();
    this.expirations.clear();
  }

  private read(key: string): IndicatorSet | null {
    const expiration = this.expirations.get(key);
    if (expiration !== undefined && this.now() > expiration) {
      this.data.delete(key);
      this.expirations.delete(key);
      return null;
    }
    return this.data.get(key) ?? null;
  }
}

import type { IndicatorSet } from "../utils/types.js";

export const ANALYSIS_KEY_PREFIX = "analysis:latest:";

export function analysisKey(assetId: string): string {
  return `${ANALYSIS_KEY_PREFIX}${assetId.trim().toLowerCase()}`;
}

/**
 * Latest analysis result per asset
 */
export interface AnalysisStore {
  save(result: IndicatorSet): Promise<void>;
  getLatest(assetId: string): Promise<IndicatorSet | null>;
  listLatest(): Promise<IndicatorSet[]>;
}

/**
 * Sort newest first
 */
export function byAnalyzedAtDesc(a: IndicatorSet, b: IndicatorSet): number {
  return b.analyzedAt - a.analyzedAt;
}

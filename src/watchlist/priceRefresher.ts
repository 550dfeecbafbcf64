import { info, debug } from "../utils/logger.js";
import type { WatchlistItem } from "../utils/types.js";
import type { RateGate } from "../coordination/rateGate.js";
import type { FetchOptions } from "../market/marketDataFetcher.js";

export const PRICE_REFRESH_CALLER = "price-refresher";

export interface PriceSource {
  fetchPrice(assetId: string, options?: FetchOptions): Promise<number | null>;
}

export interface RefreshResult {
  skipped: boolean;
  updated: number;
  failed: string[];
}

/**
 * Keeps the latest known price per watchlist asset. Runs as an ordinary
 * (non-privileged) gate consumer, so it stands down during batch analysis.
 */
export class PriceRefresher {
  private prices: Map<string, number> = new Map();

  constructor(
    private readonly source: PriceSource,
    private readonly rateGate: RateGate,
    private readonly callerId: string = PRICE_REFRESH_CALLER
  ) {}

  async refresh(assetIds: readonly string[]): Promise<RefreshResult> {
    if (this.rateGate.isDeferred(this.callerId)) {
      info(
        "PriceRefresher",
        `Deferring bulk price update - intensive operation by ${this.rateGate.currentIntensiveHolder()} in progress`
      );
      return { skipped: true, updated: 0, failed: [] };
    }

    let updated = 0;
    const failed: string[] = [];

    for (const assetId of assetIds) {
      const price = await this.source.fetchPrice(assetId, { callerId: this.callerId });
      if (price === null) {
        failed.push(assetId);
        continue;
      }
      this.prices.set(assetId, price);
      updated++;
      debug("PriceRefresher", `${assetId}: $${price}`);
    }

    info("PriceRefresher", `Updated ${updated}/${assetIds.length} prices`);
    return { skipped: false, updated, failed };
  }

  getPrice(assetId: string): number | null {
    return this.prices.get(assetId) ?? null;
  }

  /**
   * Watchlist items for the assets with a known price
   */
  watchlistItems(assetIds: readonly string[]): WatchlistItem[] {
    const items: WatchlistItem[] = [];
    for (const assetId of assetIds) {
      const currentPrice = this.prices.get(assetId);
      if (currentPrice !== undefined) {
        items.push({ assetId, currentPrice });
      }
    }
    return items;
  }
}

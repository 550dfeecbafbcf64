import { describe, it, expect } from "vitest";
import { normalizeAssetId } from "./assetAliases.js";

describe("normalizeAssetId", () => {
  it("maps tickers to provider ids case-insensitively", () => {
    expect(normalizeAssetId("BTC")).toBe("bitcoin");
    expect(normalizeAssetId("avax")).toBe("avalanche-2");
    expect(normalizeAssetId(" rndr ")).toBe("render-token");
  });

  it("passes unknown ids through trimmed", () => {
    expect(normalizeAssetId("  dogecoin ")).toBe("dogecoin");
  });
});

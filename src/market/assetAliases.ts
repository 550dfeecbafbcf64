/**
 * Ticker → CoinGecko id aliases. Ids not listed pass through unchanged.
 */
export const ASSET_ALIASES: ReadonlyMap<string, string> = new Map([
  ["btc", "bitcoin"],
  ["eth", "ethereum"],
  ["bnb", "binancecoin"],
  ["ada", "cardano"],
  ["sol", "solana"],
  ["avax", "avalanche-2"],
  ["link", "chainlink"],
  ["ltc", "litecoin"],
  ["arb", "arbitrum"],
  ["op", "optimism"],
  ["fet", "fetch-ai"],
  ["rndr", "render-token"],
  ["sui", "sui"],
  ["c", "celsius-degree-token"],
]);

/**
 * Resolve an asset id to the provider's canonical id
 */
export function normalizeAssetId(assetId: string): string {
  const trimmed = assetId.trim();
  return ASSET_ALIASES.get(trimmed.toLowerCase()) ?? trimmed;
}

import { z } from "zod";

// OHLC endpoint: [[timestamp, open, high, low, close], ...]
export const OhlcRowSchema = z
  .array(z.number())
  .min(5)
  .transform(([timestamp, open, high, low, close]) => ({
    timestamp: timestamp ?? 0,
    open: open ?? 0,
    high: high ?? 0,
    low: low ?? 0,
    close: close ?? 0,
  }));

export const OhlcResponseSchema = z.array(OhlcRowSchema).min(1);

export type OhlcRow = z.infer<typeof OhlcRowSchema>;

const UsdValueSchema = z.object({ usd: z.number().nullable().optional() }).passthrough();

// Coin detail endpoint (market_data=true)
export const CoinDetailSchema = z
  .object({
    market_data: z
      .object({
        price_change_percentage_7d: z.number().nullable().optional(),
        price_change_percentage_24h: z.number().nullable().optional(),
        market_cap: UsdValueSchema.optional(),
        total_volume: UsdValueSchema.optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type CoinDetail = z.infer<typeof CoinDetailSchema>;

// Simple price endpoint: { [id]: { usd: price } }
export const SimplePriceSchema = z.record(z.string(), UsdValueSchema);

/**
 * Synthetic price history
 *
 * Stand-in series used when the provider cannot be reached, so the
 * indicator engine always has a plausible 30-day history to work on.
 * Results are tagged with provenance "synthetic" by the fetcher.
 */

import type { PricePoint } from "../utils/types.js";

/**
 * Uniform random source in [0, 1)
 */
export type RandomSource = () => number;

export const SYNTHETIC_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

const DAILY_VOLATILITY = 0.05;
const OPEN_JITTER = 0.01;
const WICK_EXTENSION = 0.03;

/**
 * Deterministic PRNG (mulberry32) for reproducible synthetic series
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Estimate trading volume from the price tier.
 * Higher-priced (large-cap) coins get lower unit volumes.
 */
export function estimateVolume(price: number, random: RandomSource = Math.random): number {
  if (price > 10000) {
    return 500_000 + random() * 2_000_000;
  } else if (price > 1000) {
    return 1_000_000 + random() * 5_000_000;
  } else if (price > 100) {
    return 2_000_000 + random() * 10_000_000;
  } else if (price > 1) {
    return 5_000_000 + random() * 20_000_000;
  }
  return 10_000_000 + random() * 50_000_000;
}

/**
 * Build a daily series ending today whose last close equals `currentPrice`
 */
export function generateSyntheticHistory(
  currentPrice: number,
  random: RandomSource = Math.random,
  now: number = Date.now(),
  days: number = SYNTHETIC_DAYS
): PricePoint[] {
  if (days <= 0 || !(currentPrice > 0)) {
    return [];
  }

  // Closes walked backward from today
  const closes = new Array<number>(days);
  let close = currentPrice;
  for (let i = days - 1; i >= 0; i--) {
    closes[i] = close;
    const dailyChange = (random() * 2 - 1) * DAILY_VOLATILITY;
    close = close / (1 + dailyChange);
  }

  const today = now - (now % DAY_MS);

  return closes.map((dayClose, i) => {
    const open = dayClose * (1 + (random() * 2 - 1) * OPEN_JITTER);
    const high = Math.max(open, dayClose) * (1 + random() * WICK_EXTENSION);
    const low = Math.min(open, dayClose) * (1 - random() * WICK_EXTENSION);

    return {
      timestamp: today - (days - 1 - i) * DAY_MS,
      open,
      high,
      low,
      close: dayClose,
      volume: estimateVolume(dayClose, random),
    };
  });
}

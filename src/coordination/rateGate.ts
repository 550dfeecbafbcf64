/**
 * Rate Gate
 *
 * Process-wide coordinator for calls to the market-data provider.
 * - Grants are spaced at least `minIntervalMs` apart
 * - One caller at a time may hold the intensive-operation lock; other
 *   callers are denied (not queued) until it is released
 * - Privileged callers pass through another caller's intensive window
 */

import { info, warn, debug } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";

export interface RateGateOptions {
  minIntervalMs: number;
  privilegedCallers?: readonly string[];
  now?: () => number;
}

export const ANALYSIS_CALLER = "technical-analysis";

export class RateGate {
  private readonly minIntervalMs: number;
  private readonly privileged: ReadonlySet<string>;
  private readonly now: () => number;

  private lastCallAt = 0;
  private intensiveHolder: string | null = null;

  constructor(options: RateGateOptions) {
    this.minIntervalMs = options.minIntervalMs;
    this.privileged = new Set(options.privilegedCallers ?? [ANALYSIS_CALLER]);
    this.now = options.now ?? Date.now;
  }

  /**
   * Wait for the next free slot and claim it. Resolves `false` when the
   * caller is locked out by another caller's intensive operation or when
   * `signal` aborts while waiting.
   */
  async acquire(callerId: string, operation: string, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (this.isDeferred(callerId)) {
        info("RateGate", `[${callerId}] Deferring ${operation} - intensive operation by ${this.intensiveHolder} in progress`);
        return false;
      }

      const wait = this.timeUntilNextSlot();
      if (wait <= 0) {
        this.lastCallAt = this.now();
        debug("RateGate", `[${callerId}] API call authorized for ${operation}`);
        return true;
      }

      debug("RateGate", `[${callerId}] Waiting ${wait}ms for ${operation}`);
      const completed = await sleep(wait, signal);
      if (!completed) {
        info("RateGate", `[${callerId}] Wait cancelled for ${operation}`);
        return false;
      }
      // Another waiter may have taken the slot while we slept; re-check
    }
  }

  /**
   * Whether `acquire` would be granted right now without waiting.
   * Does not claim the slot.
   */
  tryAcquire(callerId: string, _operation: string): boolean {
    if (this.isDeferred(callerId)) {
      return false;
    }
    return this.timeUntilNextSlot() <= 0;
  }

  timeUntilNextSlot(): number {
    return Math.max(0, this.minIntervalMs - (this.now() - this.lastCallAt));
  }

  /**
   * Take the intensive-operation lock. Returns `false`, leaving the lock
   * untouched, when another caller already holds it.
   */
  beginIntensive(callerId: string): boolean {
    if (this.intensiveHolder !== null && this.intensiveHolder !== callerId) {
      warn("RateGate", `${callerId} cannot start intensive API operations - ${this.intensiveHolder} holds the lock`);
      return false;
    }
    this.intensiveHolder = callerId;
    info("RateGate", `${callerId} starting intensive API operations - others should defer`);
    return true;
  }

  endIntensive(callerId: string): void {
    if (this.intensiveHolder !== callerId) {
      return;
    }
    this.intensiveHolder = null;
    info("RateGate", `${callerId} completed intensive API operations`);
  }

  currentIntensiveHolder(): string | null {
    return this.intensiveHolder;
  }

  /**
   * Whether another caller's intensive operation currently locks this caller out
   */
  isDeferred(callerId: string): boolean {
    return (
      this.intensiveHolder !== null &&
      this.intensiveHolder !== callerId &&
      !this.privileged.has(callerId)
    );
  }
}

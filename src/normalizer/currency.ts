import type { CurrencyRate } from "../config/schema.js";
import { toMs } from "../time.js";

/**
 * The rate in effect at `at`: the latest `effectiveFrom <= at` for the
 * currency. Among rates with the same effectiveFrom the one listed last wins.
 */
export function findRate(rates: CurrencyRate[], currency: string, at: string): CurrencyRate | null {
  const atMs = toMs(at);
  let best: CurrencyRate | null = null;
  let bestMs = Number.NEGATIVE_INFINITY;

  for (const rate of rates) {
    if (rate.currency !== currency) continue;
    const from = toMs(rate.effectiveFrom);
    if (from > atMs) continue;
    if (from >= bestMs) {
      best = rate;
      bestMs = from;
    }
  }

  return best;
}

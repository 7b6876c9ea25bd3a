import type { Clock } from './clock.js';

export interface RetryOptions {
  attempts: number;
  intervalMs: number;
  clock: Clock;
  signal?: AbortSignal;
}

/**
 * Check `predicate` up to `attempts` times, sleeping `intervalMs` between misses.
 * Resolves true on the first hit, false once attempts run out or the signal aborts.
 * A predicate that throws counts as a miss.
 */
export async function retryUntil(
  predicate: () => boolean | Promise<boolean>,
  opts: RetryOptions,
): Promise<boolean> {
  for (let attempt = 0; attempt < opts.attempts; attempt++) {
    if (opts.signal?.aborted) return false;
    try {
      if (await predicate()) return true;
    } catch {
      // treated as not-yet
    }
    if (attempt < opts.attempts - 1) {
      await opts.clock.sleep(opts.intervalMs, opts.signal);
    }
  }
  return false;
}

/**
 * pacing.ts
 *
 * Inter-call delays for the external lookups. Lyrics pages are requested
 * one at a time with a random pause in between, never in bulk.
 */

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface PacingPolicy {
  afterIdentity: DelayRange;
  betweenTracks: DelayRange;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const DEFAULT_PACING: PacingPolicy = {
  afterIdentity: { minMs: 2000, maxMs: 4000 },
  betweenTracks: { minMs: 3000, maxMs: 6000 },
};

export const NO_PACING: PacingPolicy = {
  afterIdentity: { minMs: 0, maxMs: 0 },
  betweenTracks: { minMs: 0, maxMs: 0 },
};

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function pickDelay(range: DelayRange, random: () => number = Math.random): number {
  const min = Math.max(0, Math.min(range.minMs, range.maxMs));
  const max = Math.max(0, range.minMs, range.maxMs);
  return Math.round(min + random() * (max - min));
}

/**
 * Waits for a delay drawn from `range`. Returns the delay used.
 */
export async function pause(policy: PacingPolicy, range: DelayRange): Promise<number> {
  const delay = pickDelay(range, policy.random);
  if (delay <= 0) return 0;

  console.log(`[ALBUM] Waiting ${(delay / 1000).toFixed(1)} seconds...`);
  await (policy.sleep ?? defaultSleep)(delay);
  return delay;
}

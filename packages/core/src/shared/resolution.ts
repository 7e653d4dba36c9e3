import type { Resolution } from './protocol.js';

const RESOLUTION_MS = {
  tick: 0,
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000,
  daily: 86_400_000,
} as const satisfies Record<Resolution, number>;

/**
 * Length of one bar at the given resolution. Ticks have no period.
 */
export function resolutionToMs(resolution: Resolution): number {
  return RESOLUTION_MS[resolution];
}

/**
 * Round an epoch-millisecond timestamp down to the start of its bucket.
 */
export function roundDown(timestampMs: number, resolution: Resolution): number {
  const period = resolutionToMs(resolution);
  if (period === 0) {
    return timestampMs;
  }
  return Math.floor(timestampMs / period) * period;
}

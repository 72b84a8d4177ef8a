/**
 * Clamp into [0, 1]. Non-finite input collapses to 0.
 */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

export function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Round to a fixed number of decimals to keep scores stable across runs. */
export function round(value: number, decimals = 6): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/** Hour of day (0-23, UTC) for an epoch-ms timestamp. */
export function hourOfDay(timestamp: number): number {
  return new Date(timestamp).getUTCHours();
}

/**
 * True when `hour` lies in [from, to). A window with from > to wraps past
 * midnight; from === to is an empty window.
 */
export function hourInWindow(hour: number, from: number, to: number): boolean {
  if (from === to) return false;
  if (from < to) return hour >= from && hour < to;
  return hour >= from || hour < to;
}

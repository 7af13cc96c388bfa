// src/utils/statistics.ts
//
// Cursor statistics over resolved series.

import { STATS_DECIMALS } from "../constants";
import type { CursorPair, RangeResult, RangeStats, ResolvedSeries } from "../types/signal";
import { formatSignalKey } from "./signalKey";

/** First index with timestamps[i] >= t */
export function lowerBound(timestamps: ArrayLike<number>, t: number): number {
  let lo = 0;
  let hi = timestamps.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (timestamps[mid] < t) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** First index with timestamps[i] > t */
export function upperBound(timestamps: ArrayLike<number>, t: number): number {
  let lo = 0;
  let hi = timestamps.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (timestamps[mid] <= t) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Sorted [start, end] of the first two cursors, or null with fewer than two */
export function cursorInterval(cursors: CursorPair): [number, number] | null {
  if (cursors.length < 2) return null;
  const [a, b] = cursors;
  return a <= b ? [a, b] : [b, a];
}

/** Index range [from, to) of samples inside the closed interval */
export function sliceIndices(series: ResolvedSeries, start: number, end: number): [number, number] {
  return [lowerBound(series.timestamps, start), upperBound(series.timestamps, end)];
}

/**
 * Count, mean, min, max and population standard deviation of the samples
 * between two cursors (bounds inclusive).
 */
export function computeRange(series: ResolvedSeries, interval: CursorPair): RangeResult {
  const bounds = cursorInterval(interval);
  if (!bounds) return { kind: "no-cursors" };
  const [start, end] = bounds;

  const [from, to] = sliceIndices(series, start, end);
  const count = to - from;
  if (count <= 0) return { kind: "empty-range", start, end };

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (let i = from; i < to; i++) {
    const v = series.values[i];
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const mean = sum / count;

  let squares = 0;
  for (let i = from; i < to; i++) {
    const d = series.values[i] - mean;
    squares += d * d;
  }

  const stats: RangeStats = {
    count,
    mean,
    min,
    max,
    stdDev: Math.sqrt(squares / count),
    start,
    end,
    duration: end - start,
  };
  return { kind: "stats", stats };
}

export interface SeriesRangeResult {
  series: ResolvedSeries;
  result: RangeResult;
}

/** Statistics for every series, in the given order */
export function computeRangeForSeries(
  seriesList: readonly ResolvedSeries[],
  interval: CursorPair
): SeriesRangeResult[] {
  return seriesList.map((series) => ({ series, result: computeRange(series, interval) }));
}

/**
 * Plain-text statistics summary. Series with no samples in range are
 * left out.
 */
export function formatRangeStats(results: readonly SeriesRangeResult[], interval: CursorPair): string {
  const bounds = cursorInterval(interval);
  if (!bounds) return "Cursor Statistics\nAdd 2 cursors to view statistics\n";

  const d = STATS_DECIMALS;
  const [start, end] = bounds;
  const lines = [
    "Cursor Statistics",
    `Time Range: ${start.toFixed(d)}s to ${end.toFixed(d)}s`,
    `Duration: Δt = ${(end - start).toFixed(d)}s`,
  ];

  let shown = 0;
  for (const { series, result } of results) {
    if (result.kind !== "stats") continue;
    const { stats } = result;
    lines.push("");
    lines.push(series.unit ? `${formatSignalKey(series.key)} (${series.unit})` : formatSignalKey(series.key));
    lines.push(`  Average: ${stats.mean.toFixed(d)}`);
    lines.push(`  Maximum: ${stats.max.toFixed(d)}`);
    lines.push(`  Minimum: ${stats.min.toFixed(d)}`);
    lines.push(`  Std Dev: ${stats.stdDev.toFixed(d)}`);
    lines.push(`  Samples: ${stats.count}`);
    shown++;
  }
  if (shown === 0) {
    lines.push("");
    lines.push("No statistics available");
  }
  return lines.join("\n") + "\n";
}

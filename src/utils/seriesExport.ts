// src/utils/seriesExport.ts
//
// CSV and partial JSON export of resolved series, and reading partial
// JSON exports back. Exporters only see resolve() output, never frames
// or definitions.

import { readTextFile, writeJsonFile, writeTextFile } from "../api/files";
import { tlog } from "../api/settings";
import { APP_NAME, APP_VERSION, CSV_DECIMALS } from "../constants";
import type { CursorPair, ResolvedSeries } from "../types/signal";
import { buildCsv } from "./csvBuilder";
import { MissingCursorsError, PartialDataError } from "./errors";
import { formatSignalKey } from "./signalKey";
import { cursorInterval, lowerBound, sliceIndices } from "./statistics";

interface SeriesWindow {
  series: ResolvedSeries;
  timestamps: Float64Array;
  values: Float64Array;
}

function windowOf(series: ResolvedSeries, bounds: [number, number] | null): SeriesWindow {
  if (!bounds) {
    return { series, timestamps: series.timestamps, values: series.values };
  }
  const [from, to] = sliceIndices(series, bounds[0], bounds[1]);
  return {
    series,
    timestamps: series.timestamps.subarray(from, to),
    values: series.values.subarray(from, to),
  };
}

/**
 * Linear interpolation at t. Outside the sampled domain the nearest edge
 * value is held.
 */
export function interpolateAt(timestamps: Float64Array, values: Float64Array, t: number): number {
  const n = timestamps.length;
  const idx = lowerBound(timestamps, t);
  if (idx < n && timestamps[idx] === t) return values[idx];
  if (idx === 0) return values[0];
  if (idx === n) return values[n - 1];

  const t0 = timestamps[idx - 1];
  const t1 = timestamps[idx];
  const v0 = values[idx - 1];
  const v1 = values[idx];
  return v0 + ((v1 - v0) * (t - t0)) / (t1 - t0);
}

/** Column title: "Speed (km/h)", or just "Speed" without a unit */
export function columnLabel(series: ResolvedSeries): string {
  return series.unit ? `${series.key.signalName} (${series.unit})` : series.key.signalName;
}

/**
 * Build CSV content on a unified time base.
 * Columns: Time (s), signal1, signal2, ...
 * One row per distinct timestamp across all series; a series without a
 * sample at that time is linearly interpolated. With an interval each
 * series is first cut to it; an interval with fewer than two cursors is
 * logged and ignored.
 */
export function toCsv(seriesList: readonly ResolvedSeries[], interval?: CursorPair): string {
  const bounds = interval ? cursorInterval(interval) : null;
  if (interval && !bounds) {
    tlog.info(`[seriesExport:toCsv] ${interval.length} cursor(s) set, exporting the full series`);
  }
  const windows = seriesList
    .map((s) => windowOf(s, bounds))
    .filter((w) => w.timestamps.length > 0);

  const tsSet = new Set<number>();
  for (const w of windows) {
    for (const t of w.timestamps) tsSet.add(t);
  }
  const allTimestamps = Array.from(tsSet).sort((a, b) => a - b);

  const headers = ["Time (s)", ...windows.map((w) => columnLabel(w.series))];
  const rows = allTimestamps.map((t) => [
    t.toFixed(CSV_DECIMALS),
    ...windows.map((w) => interpolateAt(w.timestamps, w.values, t).toFixed(CSV_DECIMALS)),
  ]);

  return buildCsv(headers, rows);
}

export async function writeCsv(
  path: string,
  seriesList: readonly ResolvedSeries[],
  interval?: CursorPair
): Promise<void> {
  await writeTextFile(path, toCsv(seriesList, interval));
  tlog.info(`[seriesExport:writeCsv] Exported ${seriesList.length} signal(s) to ${path}`);
}

// ─────────────────────────────────────────
// Partial JSON
// ─────────────────────────────────────────

export interface PartialExportSignal {
  message: string;
  signal: string;
  unit: string;
  time: number[];
  value: number[];
  sample_count: number;
}

export interface PartialExportMetadata {
  export_date: string;
  app_name: string;
  app_version: string;
  log_path: string | null;
  catalog_path: string | null;
}

export interface PartialExportDocument {
  metadata: PartialExportMetadata;
  time_range: { start: number; end: number; duration: number };
  signals: Record<string, PartialExportSignal>;
}

export interface ExportSources {
  logPath: string | null;
  catalogPath: string | null;
}

/**
 * Raw samples of each series between the two cursors, keyed
 * "Message.Signal". Series with nothing in range are left out.
 * @throws MissingCursorsError with fewer than two cursors
 */
export function toPartialJson(
  seriesList: readonly ResolvedSeries[],
  interval: CursorPair,
  sources: ExportSources,
  now: Date = new Date()
): PartialExportDocument {
  const bounds = cursorInterval(interval);
  if (!bounds) throw new MissingCursorsError();
  const [start, end] = bounds;

  const signals: Record<string, PartialExportSignal> = {};
  for (const series of seriesList) {
    const w = windowOf(series, bounds);
    if (w.timestamps.length === 0) continue;
    signals[formatSignalKey(series.key)] = {
      message: series.key.messageName,
      signal: series.key.signalName,
      unit: series.unit,
      time: Array.from(w.timestamps),
      value: Array.from(w.values),
      sample_count: w.timestamps.length,
    };
  }

  return {
    metadata: {
      export_date: now.toISOString(),
      app_name: APP_NAME,
      app_version: APP_VERSION,
      log_path: sources.logPath,
      catalog_path: sources.catalogPath,
    },
    time_range: { start, end, duration: end - start },
    signals,
  };
}

/**
 * Write a partial export. The cursor check runs before anything touches
 * the file system.
 */
export async function writePartialJson(
  path: string,
  seriesList: readonly ResolvedSeries[],
  interval: CursorPair,
  sources: ExportSources
): Promise<PartialExportDocument> {
  const doc = toPartialJson(seriesList, interval, sources);
  await writeJsonFile(path, doc);
  tlog.info(`[seriesExport:writePartialJson] Exported ${Object.keys(doc.signals).length} signal(s) to ${path}`);
  return doc;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((n) => typeof n === "number");
}

function stringOr(v: unknown, fallback: string): string {
  return typeof v === "string" ? v : fallback;
}

function nullableString(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

function finiteOr(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isFinite(v) ? v : fallback;
}

/**
 * Validate a partial export read from disk.
 * @throws PartialDataError when required parts are missing or malformed
 */
export function parsePartialJson(text: string): PartialExportDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new PartialDataError("Partial data file is not valid JSON", { cause: e });
  }
  if (!isPlainObject(parsed) || !isPlainObject(parsed.signals)) {
    throw new PartialDataError("Partial data file has no signals section");
  }

  const meta = isPlainObject(parsed.metadata) ? parsed.metadata : {};
  const range = isPlainObject(parsed.time_range) ? parsed.time_range : {};

  const signals: Record<string, PartialExportSignal> = {};
  for (const [key, raw] of Object.entries(parsed.signals)) {
    if (!isPlainObject(raw) || !isNumberArray(raw.time) || !isNumberArray(raw.value)) {
      throw new PartialDataError(`Signal "${key}" has no time/value arrays`);
    }
    if (raw.time.length !== raw.value.length) {
      throw new PartialDataError(`Signal "${key}" has ${raw.time.length} times but ${raw.value.length} values`);
    }
    signals[key] = {
      message: stringOr(raw.message, ""),
      signal: stringOr(raw.signal, key),
      unit: stringOr(raw.unit, ""),
      time: raw.time,
      value: raw.value,
      sample_count: raw.time.length,
    };
  }

  const start = finiteOr(range.start, 0);
  const end = finiteOr(range.end, start);
  return {
    metadata: {
      export_date: stringOr(meta.export_date, ""),
      app_name: stringOr(meta.app_name, ""),
      app_version: stringOr(meta.app_version, ""),
      log_path: nullableString(meta.log_path),
      catalog_path: nullableString(meta.catalog_path),
    },
    time_range: { start, end, duration: finiteOr(range.duration, end - start) },
    signals,
  };
}

export async function loadPartialJson(path: string): Promise<PartialExportDocument> {
  return parsePartialJson(await readTextFile(path));
}

export interface PartialDataSummary {
  metadata: PartialExportMetadata;
  time_range: PartialExportDocument["time_range"];
  signal_count: number;
  signal_names: string[];
}

export function summarizePartialJson(doc: PartialExportDocument): PartialDataSummary {
  const names = Object.keys(doc.signals);
  return {
    metadata: doc.metadata,
    time_range: doc.time_range,
    signal_count: names.length,
    signal_names: names,
  };
}

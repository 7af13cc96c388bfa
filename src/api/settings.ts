// src/api/settings.ts
// Settings file access and levelled logging

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import TOML from "smol-toml";
import {
  DEFAULT_GRAPH_COUNT,
  DEFAULT_RAW_ROW_LIMIT,
  MAX_GRAPH_COUNT,
  MIN_GRAPH_COUNT,
} from "../constants";
import type { Theme } from "../types/signal";
import { writeTextFile } from "./files";

export type LogLevel = "off" | "info" | "debug" | "verbose";

export interface AppSettings {
  log_level: LogLevel;
  graph_count: number;
  theme: Theme;
  raw_row_limit: number;
}

const LOG_LEVELS: readonly LogLevel[] = ["off", "info", "debug", "verbose"];

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isLogLevel(v: unknown): v is LogLevel {
  return LOG_LEVELS.some((level) => level === v);
}

/**
 * Normalizes settings read from disk, applying defaults for missing or
 * invalid fields
 */
export function normalizeSettings(settings: Record<string, unknown>): AppSettings {
  const graphCount = settings.graph_count;
  const rowLimit = settings.raw_row_limit;
  return {
    log_level: isLogLevel(settings.log_level) ? settings.log_level : "info",
    graph_count:
      typeof graphCount === "number" &&
      Number.isInteger(graphCount) &&
      graphCount >= MIN_GRAPH_COUNT &&
      graphCount <= MAX_GRAPH_COUNT
        ? graphCount
        : DEFAULT_GRAPH_COUNT,
    theme: settings.theme === "light" ? "light" : "dark",
    raw_row_limit:
      typeof rowLimit === "number" && Number.isInteger(rowLimit) && rowLimit > 0
        ? rowLimit
        : DEFAULT_RAW_ROW_LIMIT,
  };
}

/**
 * Where the settings file lives: $CANSCOPE_SETTINGS, else
 * ~/.config/canscope/settings.toml
 */
export function settingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.CANSCOPE_SETTINGS || join(homedir(), ".config", "canscope", "settings.toml");
}

/**
 * Load application settings. A missing file gives the defaults; a file
 * that is not valid TOML is reported and also gives the defaults.
 */
export async function loadSettings(path: string = settingsPath()): Promise<AppSettings> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") {
      return normalizeSettings({});
    }
    throw e;
  }

  try {
    const parsed: unknown = TOML.parse(text);
    return normalizeSettings(isPlainObject(parsed) ? parsed : {});
  } catch (e) {
    tlog.info(`[settings:loadSettings] Ignoring unreadable settings file ${path}: ${e}`);
    return normalizeSettings({});
  }
}

export async function saveSettings(settings: AppSettings, path: string = settingsPath()): Promise<void> {
  await writeTextFile(path, TOML.stringify({ ...settings }));
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

// ─────────────────────────────────────────
// Logging
// ─────────────────────────────────────────

let logThreshold: LogLevel = "info";
let logSink: (line: string) => void = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Set the log level threshold.
 * Levels: "off" | "info" | "debug" | "verbose"
 */
export function setLogLevel(level: LogLevel): void {
  logThreshold = level;
}

export function getLogLevel(): LogLevel {
  return logThreshold;
}

/** Redirect log lines (tests capture them here) */
export function setLogSink(sink: (line: string) => void): void {
  logSink = sink;
}

function emit(level: Exclude<LogLevel, "off">, message: string): void {
  if (logThreshold === "off") return;
  if (LOG_LEVELS.indexOf(level) > LOG_LEVELS.indexOf(logThreshold)) return;
  logSink(`${level.toUpperCase()} ${message}`);
}

/**
 * Levelled logging to stderr, filtered by the current threshold.
 */
export const tlog = {
  info: (message: string): void => emit("info", message),
  debug: (message: string): void => emit("debug", message),
  verbose: (message: string): void => emit("verbose", message),
};

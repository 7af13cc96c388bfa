// src/utils/workspace.ts
//
// Workspace files: source paths, selection, graph count, theme, cursors and
// view range saved as pretty-printed JSON.

import { readTextFile, writeJsonFile } from "../api/files";
import { tlog } from "../api/settings";
import {
  CURSOR_IDS,
  DEFAULT_GRAPH_COUNT,
  MAX_GRAPH_COUNT,
  MIN_GRAPH_COUNT,
  WORKSPACE_EXTENSION,
  WORKSPACE_VERSION,
} from "../constants";
import type { SignalKey, Theme } from "../types/signal";
import { WorkspaceError } from "./errors";
import { formatSignalKey, parseSignalKey } from "./signalKey";

export interface ViewRange {
  x_min: number;
  x_max: number;
}

/** On-disk workspace document */
export interface WorkspaceDocument {
  version: number;
  log_path: string | null;
  catalog_path: string | null;
  /** "Message.Signal" keys in plan order */
  selected_signals: string[];
  graph_count: number;
  theme: Theme;
  cursors: number[];
  view_range: ViewRange | null;
}

export interface WorkspaceState {
  logPath: string | null;
  catalogPath: string | null;
  selection: readonly SignalKey[];
  graphCount: number;
  theme: Theme;
  cursors: readonly number[];
  viewRange: ViewRange | null;
}

export function createWorkspace(state: WorkspaceState): WorkspaceDocument {
  return {
    version: WORKSPACE_VERSION,
    log_path: state.logPath,
    catalog_path: state.catalogPath,
    selected_signals: state.selection.map(formatSignalKey),
    graph_count: state.graphCount,
    theme: state.theme,
    cursors: state.cursors.slice(0, CURSOR_IDS.length),
    view_range: state.viewRange ? { ...state.viewRange } : null,
  };
}

/** Path with the workspace extension appended when it is missing */
export function workspaceFilePath(path: string): string {
  return path.endsWith(WORKSPACE_EXTENSION) ? path : `${path}${WORKSPACE_EXTENSION}`;
}

/** Write a workspace; returns the path actually written */
export async function saveWorkspace(path: string, doc: WorkspaceDocument): Promise<string> {
  const target = workspaceFilePath(path);
  await writeJsonFile(target, doc);
  tlog.info(`[workspace:saveWorkspace] Saved workspace to ${target}`);
  return target;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function optionalPath(value: unknown, field: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") throw new WorkspaceError(`Workspace field "${field}" must be a path`);
  return value;
}

function clampGraphCount(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return DEFAULT_GRAPH_COUNT;
  return Math.min(MAX_GRAPH_COUNT, Math.max(MIN_GRAPH_COUNT, Math.round(value)));
}

/**
 * Check and normalise a parsed workspace. Graph count is clamped to the
 * allowed range and at most two cursors are kept.
 * @throws WorkspaceError for a document that cannot be restored
 */
export function normalizeWorkspace(raw: unknown): WorkspaceDocument {
  if (!isPlainObject(raw)) throw new WorkspaceError("Workspace file must contain a JSON object");

  const version = raw.version ?? WORKSPACE_VERSION;
  if (typeof version !== "number" || version > WORKSPACE_VERSION) {
    throw new WorkspaceError(`Unsupported workspace version ${String(version)}`);
  }

  const selected = raw.selected_signals ?? [];
  if (!Array.isArray(selected)) throw new WorkspaceError('Workspace field "selected_signals" must be a list');
  const keys: string[] = [];
  for (const entry of selected) {
    const key = typeof entry === "string" ? parseSignalKey(entry) : null;
    if (!key) throw new WorkspaceError(`Invalid signal key in workspace: ${JSON.stringify(entry)}`);
    keys.push(formatSignalKey(key));
  }

  const rawCursors = raw.cursors ?? [];
  if (!Array.isArray(rawCursors)) throw new WorkspaceError('Workspace field "cursors" must be a list');
  const cursors = rawCursors
    .filter((c): c is number => typeof c === "number" && Number.isFinite(c))
    .slice(0, CURSOR_IDS.length);

  let viewRange: ViewRange | null = null;
  if (isPlainObject(raw.view_range)) {
    const { x_min, x_max } = raw.view_range;
    if (typeof x_min === "number" && typeof x_max === "number") {
      viewRange = { x_min, x_max };
    }
  }

  return {
    version: WORKSPACE_VERSION,
    log_path: optionalPath(raw.log_path, "log_path"),
    catalog_path: optionalPath(raw.catalog_path, "catalog_path"),
    selected_signals: keys,
    graph_count: clampGraphCount(raw.graph_count),
    theme: raw.theme === "light" ? "light" : "dark",
    cursors,
    view_range: viewRange,
  };
}

export function parseWorkspace(text: string): WorkspaceDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new WorkspaceError("Workspace file is not valid JSON", { cause: e });
  }
  return normalizeWorkspace(parsed);
}

/**
 * Read a workspace file.
 * @throws WorkspaceError when the file is missing or malformed
 */
export async function loadWorkspace(path: string): Promise<WorkspaceDocument> {
  let text: string;
  try {
    text = await readTextFile(path);
  } catch (e) {
    throw new WorkspaceError(`Cannot read workspace file ${path}`, { cause: e });
  }
  return parseWorkspace(text);
}

/** Selected keys of a workspace document */
export function workspaceSelection(doc: WorkspaceDocument): SignalKey[] {
  const keys: SignalKey[] = [];
  for (const text of doc.selected_signals) {
    const key = parseSignalKey(text);
    if (key) keys.push(key);
  }
  return keys;
}

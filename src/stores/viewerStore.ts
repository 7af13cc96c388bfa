// src/stores/viewerStore.ts
//
// Headless viewer state: attached sources, signal selection, cursors, view
// range and theme, with the actions that drive the resolution pipeline,
// statistics, exports and workspaces.

import { createStore } from "zustand/vanilla";
import { tlog, type AppSettings } from "../api/settings";
import { CURSOR_IDS, DEFAULT_GRAPH_COUNT } from "../constants";
import type {
  CursorPair,
  DefinitionInfo,
  DefinitionStore,
  LogInfo,
  LogStore,
  ResolvedSeries,
  SignalKey,
  Theme,
} from "../types/signal";
import { loadCatalog as loadCatalogFromPath } from "../utils/catalogParser";
import { errorMessage, UnknownSignalError, ViewerError } from "../utils/errors";
import { loadFrameLog } from "../utils/frameLog";
import {
  removeFromPlan,
  selectionLimitCheck,
  truncatePlan,
  validateGraphCount,
  type SelectionPlan,
} from "../utils/selectionPlan";
import {
  toCsv,
  toPartialJson,
  writeCsv,
  writePartialJson,
  type PartialExportDocument,
} from "../utils/seriesExport";
import { formatSignalKey } from "../utils/signalKey";
import { SignalPipeline } from "../utils/signalPipeline";
import { computeRangeForSeries, formatRangeStats, type SeriesRangeResult } from "../utils/statistics";
import {
  createWorkspace,
  saveWorkspace,
  workspaceSelection,
  type ViewRange,
  type WorkspaceDocument,
} from "../utils/workspace";

// ─────────────────────────────────────────
// Types
// ─────────────────────────────────────────

export type CursorId = (typeof CURSOR_IDS)[number];

export interface ViewerDeps {
  loadLog?: (path: string) => Promise<LogStore>;
  loadCatalog?: (path: string) => Promise<DefinitionStore>;
  pipeline?: SignalPipeline;
  settings?: Partial<Pick<AppSettings, "graph_count" | "theme">>;
}

export interface RestoreReport {
  restored: SignalKey[];
  /** Keys in the workspace that the reloaded sources no longer provide */
  skipped: SignalKey[];
}

export type AddSignalOutcome = "added" | "duplicate";

export interface ViewerState {
  logPath: string | null;
  catalogPath: string | null;
  logInfo: LogInfo | null;
  catalogInfo: DefinitionInfo | null;
  graphCount: number;
  selection: SelectionPlan;
  theme: Theme;
  cursors: Partial<Record<CursorId, number>>;
  viewRange: ViewRange | null;
  /** Bumped whenever attached sources change; renderers re-resolve on change */
  dataVersion: number;
}

export interface ViewerActions {
  /** Pipeline owning the series cache for this store */
  pipeline: SignalPipeline;

  loadLog: (path: string) => Promise<void>;
  loadCatalog: (path: string) => Promise<void>;

  availableSignals: () => SignalKey[];
  addSignal: (key: SignalKey) => AddSignalOutcome;
  removeSignal: (key: SignalKey) => void;
  clearSelection: () => void;
  setGraphCount: (count: number) => void;

  setTheme: (theme: Theme) => void;
  toggleTheme: () => void;

  setCursor: (id: CursorId, time: number) => void;
  removeCursor: (id: CursorId) => void;
  clearCursors: () => void;
  cursorPair: () => CursorPair;
  setViewRange: (range: ViewRange | null) => void;

  selectedSeries: () => ResolvedSeries[];
  statistics: () => SeriesRangeResult[];
  statisticsText: () => string;

  csvText: (cursorsOnly?: boolean) => string;
  exportCsv: (path: string, cursorsOnly?: boolean) => Promise<void>;
  partialJson: () => PartialExportDocument;
  exportPartialJson: (path: string) => Promise<PartialExportDocument>;

  toWorkspace: () => WorkspaceDocument;
  saveWorkspace: (path: string) => Promise<string>;
  restoreWorkspace: (doc: WorkspaceDocument) => Promise<RestoreReport>;
}

export type ViewerStore = ViewerState & ViewerActions;

// ─────────────────────────────────────────
// Store
// ─────────────────────────────────────────

export function createViewerStore(deps: ViewerDeps = {}) {
  const pipeline = deps.pipeline ?? new SignalPipeline();
  const openLog = deps.loadLog ?? loadFrameLog;
  const openCatalog = deps.loadCatalog ?? loadCatalogFromPath;

  return createStore<ViewerStore>()((set, get) => {
    /**
     * Keep only keys the current sources still provide and decode them
     * again. Returns the keys that were dropped.
     */
    const refreshSelection = (): SignalKey[] => {
      const { selection } = get();
      const kept = selection.filter((key) => pipeline.isAvailable(key));
      const dropped = selection.filter((key) => !pipeline.isAvailable(key));
      for (const key of dropped) {
        tlog.info(`[viewerStore] ${formatSignalKey(key)} is not available in the loaded sources, deselected`);
      }
      for (const key of kept) pipeline.resolve(key);
      set((s) => ({ selection: kept, dataVersion: s.dataVersion + 1 }));
      return dropped;
    };

    const readLog = async (path: string): Promise<LogStore> => {
      try {
        return await openLog(path);
      } catch (e) {
        tlog.info(`[viewerStore:loadLog] Failed to load ${path}: ${errorMessage(e)}`);
        throw e;
      }
    };

    const readCatalog = async (path: string): Promise<DefinitionStore> => {
      try {
        return await openCatalog(path);
      } catch (e) {
        tlog.info(`[viewerStore:loadCatalog] Failed to load ${path}: ${errorMessage(e)}`);
        throw e;
      }
    };

    const attachLog = (path: string, log: LogStore) => {
      pipeline.setLog(log);
      set({ logPath: path, logInfo: log.info() });
    };

    const attachCatalog = (path: string, definitions: DefinitionStore) => {
      pipeline.setDefinitions(definitions);
      set({ catalogPath: path, catalogInfo: definitions.info() });
    };

    return {
      pipeline,

      logPath: null,
      catalogPath: null,
      logInfo: null,
      catalogInfo: null,
      graphCount: validateGraphCount(deps.settings?.graph_count ?? DEFAULT_GRAPH_COUNT),
      selection: [],
      theme: deps.settings?.theme ?? "dark",
      cursors: {},
      viewRange: null,
      dataVersion: 0,

      loadLog: async (path) => {
        attachLog(path, await readLog(path));
        refreshSelection();
      },

      loadCatalog: async (path) => {
        attachCatalog(path, await readCatalog(path));
        refreshSelection();
      },

      availableSignals: () => pipeline.availableSignals(),

      addSignal: (key) => {
        if (!pipeline.isAvailable(key)) {
          throw new UnknownSignalError(key, "is not available in the loaded sources");
        }
        const check = selectionLimitCheck(get().selection, key, get().graphCount);
        if (check.status === "rejected") throw check.error;
        if (check.status === "duplicate") return "duplicate";
        pipeline.resolve(key);
        set({ selection: check.plan });
        return "added";
      },

      removeSignal: (key) => {
        set((s) => ({ selection: removeFromPlan(s.selection, key) }));
      },

      clearSelection: () => {
        set({ selection: [] });
      },

      setGraphCount: (count) => {
        const graphCount = validateGraphCount(count);
        set((s) => ({ graphCount, selection: truncatePlan(s.selection, graphCount) }));
      },

      setTheme: (theme) => {
        set({ theme });
      },

      toggleTheme: () => {
        set((s) => ({ theme: s.theme === "dark" ? "light" : "dark" }));
      },

      setCursor: (id, time) => {
        set((s) => ({ cursors: { ...s.cursors, [id]: time } }));
      },

      removeCursor: (id) => {
        set((s) => {
          const cursors = { ...s.cursors };
          delete cursors[id];
          return { cursors };
        });
      },

      clearCursors: () => {
        set({ cursors: {} });
      },

      cursorPair: () => {
        const { cursors } = get();
        const positions: number[] = [];
        for (const id of CURSOR_IDS) {
          const t = cursors[id];
          if (t !== undefined) positions.push(t);
        }
        return positions;
      },

      setViewRange: (range) => {
        set({ viewRange: range });
      },

      selectedSeries: () => get().selection.map((key) => pipeline.resolve(key)),

      statistics: () => computeRangeForSeries(get().selectedSeries(), get().cursorPair()),

      statisticsText: () => formatRangeStats(get().statistics(), get().cursorPair()),

      csvText: (cursorsOnly = false) =>
        toCsv(get().selectedSeries(), cursorsOnly ? get().cursorPair() : undefined),

      exportCsv: async (path, cursorsOnly = false) => {
        await writeCsv(path, get().selectedSeries(), cursorsOnly ? get().cursorPair() : undefined);
      },

      partialJson: () => {
        const { logPath, catalogPath } = get();
        return toPartialJson(get().selectedSeries(), get().cursorPair(), { logPath, catalogPath });
      },

      exportPartialJson: async (path) => {
        const { logPath, catalogPath } = get();
        return await writePartialJson(path, get().selectedSeries(), get().cursorPair(), {
          logPath,
          catalogPath,
        });
      },

      toWorkspace: () => {
        const s = get();
        return createWorkspace({
          logPath: s.logPath,
          catalogPath: s.catalogPath,
          selection: s.selection,
          graphCount: s.graphCount,
          theme: s.theme,
          cursors: s.cursorPair(),
          viewRange: s.viewRange,
        });
      },

      saveWorkspace: async (path) => await saveWorkspace(path, get().toWorkspace()),

      restoreWorkspace: async (doc) => {
        // Both sources are read before either is attached
        const log = doc.log_path ? await readLog(doc.log_path) : null;
        const definitions = doc.catalog_path ? await readCatalog(doc.catalog_path) : null;
        if (doc.log_path && log) attachLog(doc.log_path, log);
        if (doc.catalog_path && definitions) attachCatalog(doc.catalog_path, definitions);

        set({
          graphCount: validateGraphCount(doc.graph_count),
          theme: doc.theme,
          selection: [],
          cursors: {},
          viewRange: doc.view_range ? { ...doc.view_range } : null,
        });

        const restored: SignalKey[] = [];
        const skipped: SignalKey[] = [];
        for (const key of workspaceSelection(doc)) {
          try {
            if (get().addSignal(key) === "added") restored.push(key);
          } catch (e) {
            if (!(e instanceof ViewerError)) throw e;
            tlog.info(`[viewerStore:restoreWorkspace] Skipping ${formatSignalKey(key)}: ${errorMessage(e)}`);
            skipped.push(key);
          }
        }

        doc.cursors.forEach((t, i) => {
          if (i < CURSOR_IDS.length) get().setCursor(CURSOR_IDS[i], t);
        });

        set((s) => ({ dataVersion: s.dataVersion + 1 }));
        return { restored, skipped };
      },
    };
  });
}

export type ViewerStoreApi = ReturnType<typeof createViewerStore>;

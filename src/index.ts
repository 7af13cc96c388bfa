// src/index.ts
// Public API of canscope

export * from "./types/signal";
export type { Endianness, SignalFormat, CatalogMetadata } from "./types/catalog";
export * from "./constants";

export {
  loadSettings,
  saveSettings,
  normalizeSettings,
  settingsPath,
  setLogLevel,
  getLogLevel,
  setLogSink,
  tlog,
  type AppSettings,
  type LogLevel,
} from "./api/settings";

export * from "./utils/errors";
export { formatSignalKey, parseSignalKey, sameSignalKey } from "./utils/signalKey";
export { extractBits, requiredBits } from "./utils/bits";
export { decodeRaw, decodeSignalValue, muxSelects } from "./utils/signalDecode";
export {
  CatalogDefinitionStore,
  loadCatalog,
  parseCatalogText,
  type ParsedCatalog,
} from "./utils/catalogParser";
export {
  FrameLogStore,
  loadFrameLog,
  parseFrameLogText,
  rawRows,
  type FrameLogFormat,
  type RawFrameRow,
} from "./utils/frameLog";
export { SignalPipeline, decodeSeries, matchAvailable, type SignalInfo } from "./utils/signalPipeline";
export {
  selectionLimitCheck,
  removeFromPlan,
  validateGraphCount,
  truncatePlan,
  colourForIndex,
  type SelectionPlan,
  type SelectionCheck,
} from "./utils/selectionPlan";
export {
  computeRange,
  computeRangeForSeries,
  formatRangeStats,
  cursorInterval,
  type SeriesRangeResult,
} from "./utils/statistics";
export * from "./utils/seriesExport";
export * from "./utils/workspace";
export { createViewerStore } from "./stores/viewerStore";
export type {
  CursorId,
  ViewerDeps,
  ViewerStore,
  ViewerStoreApi,
  ViewerState,
  ViewerActions,
  RestoreReport,
  AddSignalOutcome,
} from "./stores/viewerStore";

// src/constants.ts
// Global constants for canscope
// Add new constants here for maintainability and single source of truth

// =============================================================================
// Application
// =============================================================================

export const APP_NAME = "canscope";
export const APP_VERSION = "1.1.0";

// =============================================================================
// CAN Protocol Constants
// =============================================================================

/** Maximum data bytes for CAN FD frames */
export const CAN_FD_MAX_BYTES = 64;

/** Largest 11-bit identifier; anything above is treated as extended */
export const CAN_MAX_STANDARD_ID = 0x7ff;

// =============================================================================
// Graphs & Selection
// =============================================================================

export const MIN_GRAPH_COUNT = 1;
export const MAX_GRAPH_COUNT = 10;
export const DEFAULT_GRAPH_COUNT = 5;

/** Colour palette for graph slots, assigned by selection order */
export const SIGNAL_COLOURS = [
  "#3b82f6", // blue
  "#ef4444", // red
  "#22c55e", // green
  "#f59e0b", // amber
  "#a855f7", // purple
  "#06b6d4", // cyan
  "#f97316", // orange
  "#ec4899", // pink
  "#84cc16", // lime
  "#64748b", // slate
] as const;

/** Cursor ids; statistics and partial export need both */
export const CURSOR_IDS = [1, 2] as const;

// =============================================================================
// Export & Files
// =============================================================================

/** Decimal places for time and value columns in CSV export */
export const CSV_DECIMALS = 6;

/** Decimal places in the statistics summary */
export const STATS_DECIMALS = 3;

export const WORKSPACE_EXTENSION = ".workspace";
export const WORKSPACE_VERSION = 1;

/** Default row cap for the raw frame listing */
export const DEFAULT_RAW_ROW_LIMIT = 1000;

// src/utils/errors.ts
//
// Error kinds raised by the viewer core. Every error is recoverable at the
// boundary that raises it; `kind` is stable for callers that switch on it.

import type { SignalKey } from "../types/signal";
import { formatSignalKey } from "./signalKey";

export type ViewerErrorKind =
  | "unknown-signal"
  | "decode-error"
  | "limit-exceeded"
  | "missing-cursors"
  | "invalid-graph-count"
  | "log-format"
  | "catalog"
  | "workspace"
  | "partial-data";

export class ViewerError extends Error {
  readonly kind: ViewerErrorKind;

  constructor(kind: ViewerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class UnknownSignalError extends ViewerError {
  readonly key: SignalKey;

  constructor(key: SignalKey, detail = "not found in the loaded definitions") {
    super("unknown-signal", `Signal ${formatSignalKey(key)} ${detail}`);
    this.key = key;
  }
}

export class DecodeError extends ViewerError {
  readonly frameId: number;
  readonly payloadLength: number;
  readonly requiredBits: number;

  constructor(frameId: number, payloadLength: number, requiredBits: number) {
    super(
      "decode-error",
      `Frame 0x${frameId.toString(16).toUpperCase()} has ${payloadLength} bytes, signal needs ${requiredBits} bits`,
    );
    this.frameId = frameId;
    this.payloadLength = payloadLength;
    this.requiredBits = requiredBits;
  }
}

export class LimitExceededError extends ViewerError {
  readonly limit: number;

  constructor(limit: number) {
    super("limit-exceeded", `Maximum ${limit} signals can be selected`);
    this.limit = limit;
  }
}

export class MissingCursorsError extends ViewerError {
  constructor() {
    super("missing-cursors", "Add two cursors to define the time range first");
  }
}

export class InvalidGraphCountError extends ViewerError {
  constructor(count: number, min: number, max: number) {
    super("invalid-graph-count", `Graph count must be an integer between ${min} and ${max}, got ${count}`);
  }
}

export class LogFormatError extends ViewerError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super("log-format", line === undefined ? message : `Line ${line}: ${message}`);
    this.line = line;
  }
}

export class CatalogError extends ViewerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("catalog", message, options);
  }
}

export class WorkspaceError extends ViewerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("workspace", message, options);
  }
}

export class PartialDataError extends ViewerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("partial-data", message, options);
  }
}

/** Message text of any thrown value */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

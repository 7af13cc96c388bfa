// src/types/signal.ts

import type { Endianness } from "./catalog";

/** One message layout from the signal database */
export interface MessageDefinition {
  id: number;
  name: string;
  /** Payload length in bytes */
  length: number;
  isExtended?: boolean;
  transmitter?: string;
}

/**
 * Multiplexer gate: the signal is only present in frames whose selector
 * bits match one of the case key's values ("0", "0-3", "1,2,5").
 */
export interface MuxCondition {
  startBit: number;
  bitLength: number;
  byteOrder: Endianness;
  caseKey: string;
}

export interface SignalDefinition {
  /** Parent message name (reference, the DefinitionStore owns the message) */
  messageName: string;
  name: string;
  startBit: number;
  bitLength: number;
  byteOrder: Endianness;
  signed: boolean;
  scale: number;
  offset: number;
  unit: string;
  min?: number;
  max?: number;
  /** Outermost selector first */
  muxConditions?: MuxCondition[];
}

/** Composite key naming a signal across the loaded database */
export interface SignalKey {
  messageName: string;
  signalName: string;
}

export interface RawFrame {
  id: number;
  /** Seconds since the first frame of the log */
  timestamp: number;
  bytes: Uint8Array;
  isExtended: boolean;
  bus: number;
}

/** Decoded (timestamp, physical value) pairs for one signal */
export interface ResolvedSeries {
  key: SignalKey;
  unit: string;
  timestamps: Float64Array;
  values: Float64Array;
  /** Frames dropped because the payload was too short for the signal */
  skipped: number;
}

/** Zero, one or two cursor positions in seconds */
export type CursorPair = readonly number[];

export interface RangeStats {
  count: number;
  mean: number;
  min: number;
  max: number;
  stdDev: number;
  start: number;
  end: number;
  duration: number;
}

export type RangeResult =
  | { kind: "stats"; stats: RangeStats }
  | { kind: "no-cursors" }
  | { kind: "empty-range"; start: number; end: number };

export type Theme = "dark" | "light";

export interface LogInfo {
  path: string;
  frameCount: number;
  /** Seconds between first and last frame */
  duration: number;
  uniqueIds: number;
}

export interface DefinitionInfo {
  path: string;
  name: string;
  messageCount: number;
  signalCount: number;
}

/** Source of raw frames (frame log, BLF reader, ...) */
export interface LogStore {
  frames(): readonly RawFrame[];
  identifiers(): ReadonlySet<number>;
  info(): LogInfo;
}

/** Source of message and signal definitions (catalog, DBC reader, ...) */
export interface DefinitionStore {
  messages(): ReadonlyMap<number, MessageDefinition>;
  signalsOf(message: MessageDefinition): readonly SignalDefinition[];
  messageByName(name: string): MessageDefinition | undefined;
  info(): DefinitionInfo;
}

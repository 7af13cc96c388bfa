// src/utils/frameLog.ts
// Frame log readers (candump, CSV) and the raw frame listing

import { readTextFile } from "../api/files";
import { tlog } from "../api/settings";
import { CAN_FD_MAX_BYTES } from "../constants";
import type { LogInfo, LogStore, RawFrame } from "../types/signal";
import { formatPayloadHex } from "./csvBuilder";
import { LogFormatError } from "./errors";

export type FrameLogFormat = "candump" | "csv";

/** A frame as read from the file, timestamp not yet normalised */
export interface ParsedFrame extends Omit<RawFrame, "timestamp"> {
  timestampSec: number;
}

const CSV_HEADER_PREFIX = "Time Stamp,ID";
const CANDUMP_LINE = /^\((\d+(?:\.\d+)?)\)\s+(\S+)\s+([0-9A-Fa-f]+)(##?)(\S*)$/;

function parseHexBytes(hex: string, line: number): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9A-Fa-f]*$/.test(hex)) {
    throw new LogFormatError(`Invalid payload "${hex}"`, line);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  if (bytes.length > CAN_FD_MAX_BYTES) {
    throw new LogFormatError(`Payload of ${bytes.length} bytes exceeds ${CAN_FD_MAX_BYTES}`, line);
  }
  return bytes;
}

/** Bus number from the trailing digits of an interface name ("can1" → 1) */
function busFromInterface(iface: string): number {
  const match = iface.match(/(\d+)$/);
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * Detect the log format from its first meaningful line.
 */
export function detectFrameLogFormat(text: string): FrameLogFormat {
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith("#")) continue;
    return line.startsWith(CSV_HEADER_PREFIX) ? "csv" : "candump";
  }
  return "candump";
}

/**
 * Parse candump log text.
 * Format: (timestamp) interface frame_id#data
 * Example: (1234567890.123456) can0 123#DEADBEEF
 * CAN FD frames use ID##<flags><data>; remote frames (ID#R) are skipped.
 */
function parseCandump(text: string): ParsedFrame[] {
  const frames: ParsedFrame[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0 || line.startsWith("#")) continue;

    const match = line.match(CANDUMP_LINE);
    if (!match) {
      throw new LogFormatError(`Not a candump frame: "${line}"`, i + 1);
    }
    const [, ts, iface, idHex, separator, rest] = match;

    let dataHex = rest;
    if (separator === "##") {
      // First nibble after ## carries the FD flags
      dataHex = rest.slice(1);
    } else if (rest.toUpperCase().startsWith("R")) {
      continue;
    }

    frames.push({
      timestampSec: parseFloat(ts),
      id: parseInt(idHex, 16),
      isExtended: idHex.length === 8,
      bus: busFromInterface(iface),
      bytes: parseHexBytes(dataHex, i + 1),
    });
  }
  return frames;
}

/**
 * Parse CSV frame dumps.
 * Format: Time Stamp,ID,Extended,Dir,Bus,LEN,D1,D2,...,Dn
 * Time stamps are in microseconds, ID and data bytes in hex.
 */
function parseCsv(text: string): ParsedFrame[] {
  const frames: ParsedFrame[] = [];
  const lines = text.split(/\r?\n/);
  let headerSeen = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0 || line.startsWith("#")) continue;
    if (!headerSeen) {
      headerSeen = true;
      continue;
    }

    const cells = line.split(",");
    if (cells.length < 6) {
      throw new LogFormatError(`Expected at least 6 columns, got ${cells.length}`, i + 1);
    }
    const [tsCell, idCell, extCell, , busCell, lenCell, ...dataCells] = cells;
    const timestampUs = Number(tsCell);
    const id = parseInt(idCell, 16);
    const len = parseInt(lenCell, 10);
    if (!Number.isFinite(timestampUs) || Number.isNaN(id) || Number.isNaN(len) || len < 0) {
      throw new LogFormatError(`Invalid frame row "${line}"`, i + 1);
    }
    if (dataCells.length < len) {
      throw new LogFormatError(`LEN is ${len} but only ${dataCells.length} data columns`, i + 1);
    }

    frames.push({
      timestampSec: timestampUs / 1_000_000,
      id,
      isExtended: extCell.trim().toLowerCase() === "true",
      bus: parseInt(busCell, 10) || 0,
      bytes: parseHexBytes(dataCells.slice(0, len).map((c) => c.trim()).join(""), i + 1),
    });
  }
  return frames;
}

/**
 * Order frames by time (stable) and shift so the first frame is at zero.
 */
export function normaliseFrames(parsed: ParsedFrame[]): RawFrame[] {
  let ordered = parsed;
  for (let i = 1; i < parsed.length; i++) {
    if (parsed[i].timestampSec < parsed[i - 1].timestampSec) {
      tlog.debug(`[frameLog:normaliseFrames] Log is out of order at frame ${i}, sorting`);
      ordered = [...parsed].sort((a, b) => a.timestampSec - b.timestampSec);
      break;
    }
  }

  const start = ordered.length > 0 ? ordered[0].timestampSec : 0;
  return ordered.map(({ timestampSec, ...rest }) => ({
    ...rest,
    timestamp: timestampSec - start,
  }));
}

export function parseFrameLogText(text: string, format: FrameLogFormat = detectFrameLogFormat(text)): RawFrame[] {
  const parsed = format === "csv" ? parseCsv(text) : parseCandump(text);
  return normaliseFrames(parsed);
}

// =============================================================================
// LogStore
// =============================================================================

export class FrameLogStore implements LogStore {
  private readonly path: string;
  private readonly frameList: readonly RawFrame[];
  private idSet: Set<number> | null = null;

  constructor(path: string, frames: readonly RawFrame[]) {
    this.path = path;
    this.frameList = frames;
  }

  frames(): readonly RawFrame[] {
    return this.frameList;
  }

  identifiers(): ReadonlySet<number> {
    if (!this.idSet) {
      this.idSet = new Set(this.frameList.map((f) => f.id));
    }
    return this.idSet;
  }

  info(): LogInfo {
    const count = this.frameList.length;
    return {
      path: this.path,
      frameCount: count,
      duration: count > 0 ? this.frameList[count - 1].timestamp - this.frameList[0].timestamp : 0,
      uniqueIds: this.identifiers().size,
    };
  }
}

/**
 * Load a frame log from disk. An empty log is rejected: there is nothing
 * to plot and no time base.
 */
export async function loadFrameLog(path: string): Promise<FrameLogStore> {
  const text = await readTextFile(path);
  const frames = parseFrameLogText(text);
  if (frames.length === 0) {
    throw new LogFormatError(`No frames in ${path}`);
  }
  tlog.debug(`[frameLog:loadFrameLog] Loaded ${frames.length} frames from ${path}`);
  return new FrameLogStore(path, frames);
}

// =============================================================================
// Raw listing
// =============================================================================

export interface RawFrameRow {
  timestamp: number;
  id: number;
  id_hex: string;
  dlc: number;
  data_hex: string;
}

/**
 * Frames as undecoded rows, e.g. for a raw data table.
 */
export function rawRows(frames: readonly RawFrame[], limit?: number): RawFrameRow[] {
  const count = limit === undefined ? frames.length : Math.min(limit, frames.length);
  const rows: RawFrameRow[] = [];
  for (let i = 0; i < count; i++) {
    const f = frames[i];
    rows.push({
      timestamp: f.timestamp,
      id: f.id,
      id_hex: `0x${f.id.toString(16).toUpperCase().padStart(3, "0")}`,
      dlc: f.bytes.length,
      data_hex: formatPayloadHex(f.bytes),
    });
  }
  return rows;
}

// src/utils/catalogParser.ts
// TOML signal catalog parser, exposed as a DefinitionStore

import TOML from "smol-toml";
import { readTextFile } from "../api/files";
import { tlog } from "../api/settings";
import {
  TEXT_SIGNAL_FORMATS,
  type CatalogMetadata,
  type Endianness,
} from "../types/catalog";
import type {
  DefinitionInfo,
  DefinitionStore,
  MessageDefinition,
  MuxCondition,
  SignalDefinition,
} from "../types/signal";
import { CAN_MAX_STANDARD_ID } from "../constants";
import { CatalogError } from "./errors";
import { isMuxCaseKey } from "./muxCaseMatch";

// =============================================================================
// Core Types
// =============================================================================

export interface ParsedCatalog {
  metadata: CatalogMetadata;
  defaultByteOrder: Endianness;
  messages: Map<number, MessageDefinition>;
  /** Signals per message name, in catalog order */
  signals: Map<string, SignalDefinition[]>;
}

// =============================================================================
// Utility Functions
// =============================================================================

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function optionalNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function asEndianness(v: unknown): Endianness | undefined {
  return v === "little" || v === "big" ? v : undefined;
}

/**
 * Parse a CAN ID string (hex or decimal) to a number.
 */
export function parseCanId(id: string): number | null {
  const trimmed = id.trim();
  if (/^0x[0-9a-f]+$/i.test(trimmed)) {
    return parseInt(trimmed.slice(2), 16);
  }
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  return null;
}

/** "0x1A0" style label for frames that have no name */
export function formatFrameId(id: number): string {
  return `0x${id.toString(16).toUpperCase()}`;
}

/**
 * Normalise a signal table from TOML. Returns null for text-format
 * signals, which have no physical value to plot.
 */
export function normaliseSignal(
  raw: unknown,
  messageName: string,
  defaultByteOrder: Endianness,
  muxConditions?: MuxCondition[]
): SignalDefinition | null {
  if (!isPlainObject(raw)) {
    throw new CatalogError(`Frame ${messageName}: signal entry is not a table`);
  }
  const name = raw.name;
  const startBit = raw.start_bit;
  const bitLength = raw.bit_length;
  if (typeof name !== "string" || name.length === 0) {
    throw new CatalogError(`Frame ${messageName}: signal without a name`);
  }
  if (
    typeof startBit !== "number" || !Number.isInteger(startBit) || startBit < 0 ||
    typeof bitLength !== "number" || !Number.isInteger(bitLength) || bitLength <= 0
  ) {
    throw new CatalogError(`Signal ${messageName}.${name}: start_bit and bit_length must be non-negative integers`);
  }

  if (TEXT_SIGNAL_FORMATS.some((f) => f === raw.format)) {
    tlog.debug(`[catalogParser:normaliseSignal] Skipping text signal ${messageName}.${name}`);
    return null;
  }

  return {
    messageName,
    name,
    startBit,
    bitLength,
    // byte_order is current, endianness is the older spelling
    byteOrder: asEndianness(raw.byte_order) ?? asEndianness(raw.endianness) ?? defaultByteOrder,
    signed: raw.signed === true,
    scale: optionalNumber(raw.factor) ?? 1,
    offset: optionalNumber(raw.offset) ?? 0,
    unit: typeof raw.unit === "string" ? raw.unit : "",
    min: optionalNumber(raw.min),
    max: optionalNumber(raw.max),
    muxConditions: muxConditions && muxConditions.length > 0 ? muxConditions : undefined,
  };
}

function normaliseSignalList(
  rawSignals: unknown,
  messageName: string,
  defaultByteOrder: Endianness,
  muxConditions?: MuxCondition[]
): SignalDefinition[] {
  if (rawSignals === undefined) return [];
  if (!Array.isArray(rawSignals)) {
    throw new CatalogError(`Frame ${messageName}: signals must be an array of tables`);
  }
  const out: SignalDefinition[] = [];
  for (const raw of rawSignals) {
    const signal = normaliseSignal(raw, messageName, defaultByteOrder, muxConditions);
    if (signal) out.push(signal);
  }
  return out;
}

/**
 * Flatten a mux table into gated signals. Each case's signals carry the
 * selector conditions of every enclosing case.
 */
export function flattenMux(
  mux: unknown,
  messageName: string,
  defaultByteOrder: Endianness,
  parentConditions: MuxCondition[] = []
): SignalDefinition[] {
  if (!isPlainObject(mux)) return [];

  const startBit = optionalNumber(mux.start_bit) ?? 0;
  const bitLength = optionalNumber(mux.bit_length) ?? 8;
  const out: SignalDefinition[] = [];

  for (const [key, caseData] of Object.entries(mux)) {
    if (!isMuxCaseKey(key) || !isPlainObject(caseData)) continue;

    const conditions: MuxCondition[] = [
      ...parentConditions,
      { startBit, bitLength, byteOrder: defaultByteOrder, caseKey: key },
    ];
    out.push(...normaliseSignalList(caseData.signals, messageName, defaultByteOrder, conditions));
    if (caseData.mux) {
      out.push(...flattenMux(caseData.mux, messageName, defaultByteOrder, conditions));
    }
  }
  return out;
}

// =============================================================================
// Catalog Parser
// =============================================================================

/**
 * Parse catalog from TOML text string.
 */
export function parseCatalogText(toml: string): ParsedCatalog {
  let parsed: unknown;
  try {
    parsed = TOML.parse(toml);
  } catch (e) {
    throw new CatalogError(`Invalid catalog TOML: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  if (!isPlainObject(parsed)) {
    throw new CatalogError("Catalog is not a TOML table");
  }

  const meta = isPlainObject(parsed.meta) ? parsed.meta : {};
  const metadata: CatalogMetadata = {
    name: typeof meta.name === "string" ? meta.name : "",
    version: optionalNumber(meta.version) ?? 1,
  };

  const frameSection = isPlainObject(parsed.frame) ? parsed.frame : {};
  const canFrames = isPlainObject(frameSection.can) ? frameSection.can : {};
  const canConfig = isPlainObject(canFrames.config) ? canFrames.config : {};
  const defaultByteOrder = asEndianness(canConfig.default_byte_order) ?? "little";

  const messages = new Map<number, MessageDefinition>();
  const signals = new Map<string, SignalDefinition[]>();

  for (const [idKey, body] of Object.entries(canFrames)) {
    if (idKey === "config") continue;

    const id = parseCanId(idKey);
    if (id === null || !isPlainObject(body)) {
      tlog.info(`[catalogParser:parseCatalogText] Ignoring frame entry "${idKey}"`);
      continue;
    }

    const name = typeof body.name === "string" && body.name.length > 0 ? body.name : formatFrameId(id);
    if (name.includes(".")) {
      throw new CatalogError(`Message name "${name}" must not contain "."`);
    }
    if (signals.has(name)) {
      throw new CatalogError(`Duplicate message name "${name}"`);
    }

    const frameSignals = [
      ...normaliseSignalList(body.signals, name, defaultByteOrder),
      ...flattenMux(body.mux, name, defaultByteOrder),
    ];
    const seen = new Set<string>();
    for (const sig of frameSignals) {
      if (seen.has(sig.name)) {
        throw new CatalogError(`Duplicate signal name "${sig.name}" in message "${name}"`);
      }
      seen.add(sig.name);
    }

    messages.set(id, {
      id,
      name,
      length: optionalNumber(body.length) ?? 8,
      isExtended: typeof body.extended === "boolean" ? body.extended : id > CAN_MAX_STANDARD_ID,
      transmitter: typeof body.transmitter === "string" ? body.transmitter : undefined,
    });
    signals.set(name, frameSignals);
  }

  return { metadata, defaultByteOrder, messages, signals };
}

// =============================================================================
// DefinitionStore
// =============================================================================

export class CatalogDefinitionStore implements DefinitionStore {
  private readonly path: string;
  private readonly catalog: ParsedCatalog;
  private readonly byName: Map<string, MessageDefinition>;

  constructor(path: string, catalog: ParsedCatalog) {
    this.path = path;
    this.catalog = catalog;
    this.byName = new Map([...catalog.messages.values()].map((m) => [m.name, m]));
  }

  messages(): ReadonlyMap<number, MessageDefinition> {
    return this.catalog.messages;
  }

  signalsOf(message: MessageDefinition): readonly SignalDefinition[] {
    return this.catalog.signals.get(message.name) ?? [];
  }

  messageByName(name: string): MessageDefinition | undefined {
    return this.byName.get(name);
  }

  info(): DefinitionInfo {
    let signalCount = 0;
    for (const list of this.catalog.signals.values()) signalCount += list.length;
    return {
      path: this.path,
      name: this.catalog.metadata.name,
      messageCount: this.catalog.messages.size,
      signalCount,
    };
  }
}

/**
 * Load and parse catalog from file path.
 */
export async function loadCatalog(path: string): Promise<CatalogDefinitionStore> {
  const content = await readTextFile(path);
  return new CatalogDefinitionStore(path, parseCatalogText(content));
}

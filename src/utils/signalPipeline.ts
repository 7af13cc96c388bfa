// src/utils/signalPipeline.ts
//
// Signal resolution: matches log identifiers against definitions, decodes
// per-signal series on demand and caches them until the next reload.

import { tlog } from "../api/settings";
import type {
  DefinitionStore,
  LogStore,
  MessageDefinition,
  RawFrame,
  ResolvedSeries,
  SignalDefinition,
  SignalKey,
} from "../types/signal";
import { DecodeError, UnknownSignalError } from "./errors";
import { decodeSignalValue, muxSelects } from "./signalDecode";
import { formatSignalKey } from "./signalKey";

/**
 * Definitions whose identifier occurs in the log. Pure; result keeps the
 * definitions' own order.
 */
export function matchAvailable(
  logIdentifiers: ReadonlySet<number>,
  definitions: ReadonlyMap<number, MessageDefinition>
): Set<MessageDefinition> {
  const matched = new Set<MessageDefinition>();
  for (const [id, message] of definitions) {
    if (logIdentifiers.has(id)) matched.add(message);
  }
  return matched;
}

export interface SignalInfo {
  name: string;
  unit: string;
  min?: number;
  max?: number;
  scale: number;
  offset: number;
}

/**
 * Decode one signal from every frame of its parent message.
 * Frames too short for the signal are skipped and counted; frames whose
 * multiplexer does not select the signal are skipped silently.
 */
export function decodeSeries(
  frames: readonly RawFrame[],
  message: MessageDefinition,
  signal: SignalDefinition
): ResolvedSeries {
  const timestamps: number[] = [];
  const values: number[] = [];
  let skipped = 0;
  let firstError: DecodeError | null = null;

  for (const frame of frames) {
    if (frame.id !== message.id) continue;
    try {
      if (!muxSelects(frame.bytes, signal.muxConditions, frame.id)) continue;
      values.push(decodeSignalValue(frame.bytes, signal, frame.id));
      timestamps.push(frame.timestamp);
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e;
      skipped++;
      firstError ??= e;
    }
  }

  if (firstError) {
    tlog.debug(
      `[signalPipeline:decodeSeries] Skipped ${skipped} frame(s) for ${message.name}.${signal.name}: ${firstError.message}`
    );
  }

  return {
    key: { messageName: message.name, signalName: signal.name },
    unit: signal.unit,
    timestamps: Float64Array.from(timestamps),
    values: Float64Array.from(values),
    skipped,
  };
}

export class SignalPipeline {
  private log: LogStore | null = null;
  private definitions: DefinitionStore | null = null;
  /** Resolved series by message name, then signal name; the pipeline is the only writer */
  private readonly cache = new Map<string, Map<string, ResolvedSeries>>();
  private cachedCount = 0;

  /**
   * Attach a new log. Always invalidates, so nothing decoded from the
   * previous log can be served.
   */
  setLog(log: LogStore | null): void {
    this.invalidate();
    this.log = log;
  }

  /** Attach new definitions; invalidates like setLog */
  setDefinitions(definitions: DefinitionStore | null): void {
    this.invalidate();
    this.definitions = definitions;
  }

  getLog(): LogStore | null {
    return this.log;
  }

  getDefinitions(): DefinitionStore | null {
    return this.definitions;
  }

  /** Drop every cached series */
  invalidate(): void {
    if (this.cachedCount > 0) {
      tlog.debug(`[signalPipeline:invalidate] Dropping ${this.cachedCount} cached series`);
    }
    this.cache.clear();
    this.cachedCount = 0;
  }

  /** Messages present in both the log and the definitions */
  availableMessages(): Set<MessageDefinition> {
    if (!this.log || !this.definitions) return new Set();
    return matchAvailable(this.log.identifiers(), this.definitions.messages());
  }

  /** Keys of every signal of an available message, in definition order */
  availableSignals(): SignalKey[] {
    const defs = this.definitions;
    if (!defs) return [];
    const keys: SignalKey[] = [];
    for (const message of this.availableMessages()) {
      for (const signal of defs.signalsOf(message)) {
        keys.push({ messageName: message.name, signalName: signal.name });
      }
    }
    return keys;
  }

  isAvailable(key: SignalKey): boolean {
    const found = this.lookup(key);
    return found !== null && this.log !== null && this.log.identifiers().has(found.message.id);
  }

  signalInfo(key: SignalKey): SignalInfo | undefined {
    const found = this.lookup(key);
    if (!found) return undefined;
    const { signal } = found;
    return {
      name: signal.name,
      unit: signal.unit,
      min: signal.min,
      max: signal.max,
      scale: signal.scale,
      offset: signal.offset,
    };
  }

  /**
   * Series for a signal key. Decodes on the first request and serves the
   * same object until invalidate().
   * @throws UnknownSignalError if no loaded definition matches the key
   */
  resolve(key: SignalKey): ResolvedSeries {
    const cached = this.cache.get(key.messageName)?.get(key.signalName);
    if (cached) return cached;

    const found = this.lookup(key);
    if (!found) {
      throw new UnknownSignalError(key);
    }

    const frames = this.log ? this.log.frames() : [];
    const series = decodeSeries(frames, found.message, found.signal);
    if (series.timestamps.length === 0) {
      tlog.info(`[signalPipeline:resolve] No samples for ${formatSignalKey(key)} in the loaded log`);
    }
    let bySignal = this.cache.get(key.messageName);
    if (!bySignal) {
      bySignal = new Map();
      this.cache.set(key.messageName, bySignal);
    }
    bySignal.set(key.signalName, series);
    this.cachedCount++;
    return series;
  }

  isCached(key: SignalKey): boolean {
    return this.cache.get(key.messageName)?.has(key.signalName) ?? false;
  }

  get cacheSize(): number {
    return this.cachedCount;
  }

  private lookup(key: SignalKey): { message: MessageDefinition; signal: SignalDefinition } | null {
    const defs = this.definitions;
    if (!defs) return null;
    const message = defs.messageByName(key.messageName);
    if (!message) return null;
    const signal = defs.signalsOf(message).find((s) => s.name === key.signalName);
    return signal ? { message, signal } : null;
  }
}

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { setLogLevel, setLogSink } from "../api/settings";
import type { DefinitionStore, MessageDefinition, RawFrame, SignalDefinition } from "../types/signal";
import { CatalogDefinitionStore, parseCatalogText } from "./catalogParser";
import { UnknownSignalError } from "./errors";
import { FrameLogStore } from "./frameLog";
import { decodeSeries, matchAvailable, SignalPipeline } from "./signalPipeline";

const CATALOG = `
[frame.can."0x100"]
name = "Engine"
signals = [
  { name = "Speed", start_bit = 0, bit_length = 16, factor = 0.1, unit = "km/h" },
  { name = "Temp", start_bit = 16, bit_length = 8, offset = -40, unit = "°C" },
]

[frame.can."0x300"]
name = "Diag"
signals = [{ name = "Code", start_bit = 0, bit_length = 8 }]

[frame.can."0x400"]
name = "Status"

[frame.can."0x400".mux]
start_bit = 0
bit_length = 8

[frame.can."0x400".mux."0"]
signals = [{ name = "Gear", start_bit = 8, bit_length = 8 }]
`;

function frame(id: number, timestamp: number, bytes: number[]): RawFrame {
  return { id, timestamp, bytes: Uint8Array.from(bytes), isExtended: false, bus: 0 };
}

function engineLog(): FrameLogStore {
  return new FrameLogStore("engine.log", [
    frame(0x100, 0, [100, 0, 60]),
    frame(0x200, 0.05, [1]),
    frame(0x100, 0.1, [150, 0, 61]),
    // too short for Temp, long enough for Speed
    frame(0x100, 0.2, [200, 0]),
  ]);
}

function definitions(): CatalogDefinitionStore {
  return new CatalogDefinitionStore("test.toml", parseCatalogText(CATALOG));
}

const SPEED = { messageName: "Engine", signalName: "Speed" };
const TEMP = { messageName: "Engine", signalName: "Temp" };

describe("matchAvailable", () => {
  const engine: MessageDefinition = { id: 0x100, name: "Engine", length: 8 };
  const diag: MessageDefinition = { id: 0x300, name: "Diag", length: 8 };

  it("keeps definitions whose id occurs in the log", () => {
    const ids = new Set([0x100, 0x200]);
    const defs = new Map([
      [0x100, engine],
      [0x300, diag],
    ]);

    const first = matchAvailable(ids, defs);
    const second = matchAvailable(ids, defs);

    expect([...first]).toEqual([engine]);
    expect(second).toEqual(first);
    expect(ids.size).toBe(2);
    expect(defs.size).toBe(2);
  });
});

describe("SignalPipeline", () => {
  let pipeline: SignalPipeline;
  let log: FrameLogStore;

  beforeEach(() => {
    log = engineLog();
    pipeline = new SignalPipeline();
    pipeline.setLog(log);
    pipeline.setDefinitions(definitions());
  });

  it("decodes a signal on first request", () => {
    const series = pipeline.resolve(SPEED);

    expect(series.key).toEqual(SPEED);
    expect(series.unit).toBe("km/h");
    expect(Array.from(series.timestamps)).toEqual([0, 0.1, 0.2]);
    expect(Array.from(series.values)).toEqual([10, 15, 20]);
    expect(series.skipped).toBe(0);
  });

  it("serves the cached series without scanning again", () => {
    const frames = vi.spyOn(log, "frames");

    const first = pipeline.resolve(SPEED);
    const second = pipeline.resolve(SPEED);

    expect(second).toBe(first);
    expect(frames).toHaveBeenCalledTimes(1);
    expect(pipeline.isCached(SPEED)).toBe(true);
    expect(pipeline.cacheSize).toBe(1);
  });

  it("scans again after invalidate", () => {
    const frames = vi.spyOn(log, "frames");
    const first = pipeline.resolve(SPEED);

    pipeline.invalidate();
    expect(pipeline.isCached(SPEED)).toBe(false);

    const second = pipeline.resolve(SPEED);
    expect(second).not.toBe(first);
    expect(second).toEqual(first);
    expect(frames).toHaveBeenCalledTimes(2);
  });

  it("never serves series decoded from a previous log", () => {
    pipeline.resolve(SPEED);
    pipeline.setLog(new FrameLogStore("other.log", [frame(0x100, 0, [50, 0, 0])]));

    expect(pipeline.cacheSize).toBe(0);
    expect(Array.from(pipeline.resolve(SPEED).values)).toEqual([5]);
  });

  it("invalidates when definitions change", () => {
    pipeline.resolve(SPEED);
    pipeline.setDefinitions(definitions());
    expect(pipeline.cacheSize).toBe(0);
  });

  it("skips and counts frames too short for the signal", () => {
    const series = pipeline.resolve(TEMP);

    expect(Array.from(series.timestamps)).toEqual([0, 0.1]);
    expect(Array.from(series.values)).toEqual([20, 21]);
    expect(series.skipped).toBe(1);
  });

  it("resolves a message missing from the log to an empty series", () => {
    const series = pipeline.resolve({ messageName: "Diag", signalName: "Code" });
    expect(series.timestamps).toHaveLength(0);
    expect(series.values).toHaveLength(0);
    expect(pipeline.isCached({ messageName: "Diag", signalName: "Code" })).toBe(true);
  });

  it("rejects keys without a definition", () => {
    expect(() => pipeline.resolve({ messageName: "Engine", signalName: "Nope" })).toThrow(UnknownSignalError);
    expect(() => pipeline.resolve({ messageName: "Nope", signalName: "Speed" })).toThrow(
      "Signal Nope.Speed not found in the loaded definitions"
    );
    expect(pipeline.cacheSize).toBe(0);
  });

  it("rejects every key before definitions are attached", () => {
    const empty = new SignalPipeline();
    empty.setLog(log);
    expect(() => empty.resolve(SPEED)).toThrow(UnknownSignalError);
    expect(empty.availableSignals()).toEqual([]);
  });

  it("lists signals of messages present in the log", () => {
    expect(pipeline.availableSignals()).toEqual([SPEED, TEMP]);
    expect([...pipeline.availableMessages()].map((m) => m.name)).toEqual(["Engine"]);
    expect(pipeline.isAvailable(SPEED)).toBe(true);
    expect(pipeline.isAvailable({ messageName: "Diag", signalName: "Code" })).toBe(false);
  });

  it("describes a signal", () => {
    expect(pipeline.signalInfo(SPEED)).toEqual({ name: "Speed", unit: "km/h", scale: 0.1, offset: 0 });
    expect(pipeline.signalInfo({ messageName: "Engine", signalName: "Nope" })).toBeUndefined();
  });
});

describe("SignalPipeline cache identity", () => {
  function byteSignal(messageName: string, name: string): SignalDefinition {
    return {
      messageName,
      name,
      startBit: 0,
      bitLength: 8,
      byteOrder: "little",
      signed: false,
      scale: 1,
      offset: 0,
      unit: "",
    };
  }

  // Names whose "Message.Signal" text is the same string
  const front: MessageDefinition = { id: 0x100, name: "Engine.Front", length: 8 };
  const engine: MessageDefinition = { id: 0x200, name: "Engine", length: 8 };
  const store: DefinitionStore = {
    messages: () => new Map([
      [front.id, front],
      [engine.id, engine],
    ]),
    signalsOf: (message) =>
      message === front ? [byteSignal(front.name, "Rpm")] : [byteSignal(engine.name, "Front.Rpm")],
    messageByName: (name) => [front, engine].find((m) => m.name === name),
    info: () => ({ path: "memory", name: "", messageCount: 2, signalCount: 2 }),
  };

  it("keeps keys apart when their joined names coincide", () => {
    const pipeline = new SignalPipeline();
    pipeline.setLog(new FrameLogStore("ids.log", [frame(0x100, 0, [11]), frame(0x200, 0.1, [99])]));
    pipeline.setDefinitions(store);

    const first = pipeline.resolve({ messageName: "Engine.Front", signalName: "Rpm" });
    const second = pipeline.resolve({ messageName: "Engine", signalName: "Front.Rpm" });

    expect([...first.values]).toEqual([11]);
    expect([...second.values]).toEqual([99]);
    expect(second).not.toBe(first);
    expect(pipeline.cacheSize).toBe(2);
  });
});

describe("decodeSeries", () => {
  const lines: string[] = [];

  beforeEach(() => {
    lines.length = 0;
    setLogSink((line) => lines.push(line));
    setLogLevel("debug");
  });

  afterEach(() => {
    setLogLevel("info");
  });

  it("logs skipped frames at debug level", () => {
    const defs = definitions();
    const engine = defs.messageByName("Engine");
    const temp = engine ? defs.signalsOf(engine)[1] : undefined;
    expect(engine && temp).toBeTruthy();
    if (!engine || !temp) return;

    decodeSeries(engineLog().frames(), engine, temp);

    expect(lines).toEqual([
      "DEBUG [signalPipeline:decodeSeries] Skipped 1 frame(s) for Engine.Temp: Frame 0x100 has 2 bytes, signal needs 24 bits",
    ]);
  });

  it("drops frames whose multiplexer does not select the signal", () => {
    const defs = definitions();
    const status = defs.messageByName("Status");
    const gear = status ? defs.signalsOf(status)[0] : undefined;
    if (!status || !gear) throw new Error("fixture catalog has no Status.Gear");

    const series = decodeSeries(
      [frame(0x400, 0, [0, 3]), frame(0x400, 0.1, [1, 2]), frame(0x400, 0.2, [0, 4])],
      status,
      gear
    );

    expect(Array.from(series.timestamps)).toEqual([0, 0.2]);
    expect(Array.from(series.values)).toEqual([3, 4]);
    expect(series.skipped).toBe(0);
    expect(lines).toEqual([]);
  });
});

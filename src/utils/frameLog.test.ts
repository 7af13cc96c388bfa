import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LogFormatError } from "./errors";
import { detectFrameLogFormat, loadFrameLog, parseFrameLogText, rawRows } from "./frameLog";

const FIXTURE = fileURLToPath(new URL("../__fixtures__/vehicle.log", import.meta.url));

describe("detectFrameLogFormat", () => {
  it("detects CSV dumps by their header", () => {
    expect(detectFrameLogFormat("# export\nTime Stamp,ID,Extended,Dir,Bus,LEN,D1\n")).toBe("csv");
    expect(detectFrameLogFormat("(1.0) can0 123#00\n")).toBe("candump");
  });
});

describe("parseFrameLogText (candump)", () => {
  it("sorts by time and shifts the first frame to zero", () => {
    const frames = parseFrameLogText("(10.5) can1 123#DEADBEEF\n(10.0) can0 18FEF100#0102\n");

    expect(frames).toHaveLength(2);
    expect(frames[0]).toEqual({
      id: 0x18fef100,
      timestamp: 0,
      bytes: Uint8Array.of(1, 2),
      isExtended: true,
      bus: 0,
    });
    expect(frames[1]).toEqual({
      id: 0x123,
      timestamp: 0.5,
      bytes: Uint8Array.of(0xde, 0xad, 0xbe, 0xef),
      isExtended: false,
      bus: 1,
    });
  });

  it("reads CAN FD payloads and skips remote frames", () => {
    const frames = parseFrameLogText("(1.0) can0 123##1AABB\n(2.0) can0 124#R\n");
    expect(frames.map((f) => Array.from(f.bytes))).toEqual([[0xaa, 0xbb]]);
  });

  it("ignores blank lines and comments", () => {
    const frames = parseFrameLogText("# capture\n\n(1.0) can0 123#01\n");
    expect(frames).toHaveLength(1);
  });

  it("names the line of a malformed entry", () => {
    let caught: unknown;
    try {
      parseFrameLogText("(1.0) can0 123#01\nhello\n");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(LogFormatError);
    expect(caught).toMatchObject({ line: 2, message: 'Line 2: Not a candump frame: "hello"' });
  });

  it("rejects odd-length payloads", () => {
    expect(() => parseFrameLogText("(1.0) can0 123#ABC\n")).toThrow('Line 1: Invalid payload "ABC"');
  });
});

describe("parseFrameLogText (CSV)", () => {
  it("reads microsecond timestamps and hex ids", () => {
    const frames = parseFrameLogText(
      [
        "Time Stamp,ID,Extended,Dir,Bus,LEN,D1,D2,D3",
        "1000000,100,false,Rx,0,2,0A,0B",
        "1500000,7E8,true,Rx,1,3,01,02,03",
      ].join("\n")
    );

    expect(frames).toEqual([
      { id: 0x100, timestamp: 0, bytes: Uint8Array.of(0x0a, 0x0b), isExtended: false, bus: 0 },
      { id: 0x7e8, timestamp: 0.5, bytes: Uint8Array.of(1, 2, 3), isExtended: true, bus: 1 },
    ]);
  });

  it("rejects rows with fewer data columns than LEN", () => {
    expect(() =>
      parseFrameLogText("Time Stamp,ID,Extended,Dir,Bus,LEN,D1\n0,100,false,Rx,0,2,0A\n")
    ).toThrow("Line 2: LEN is 2 but only 1 data columns");
  });
});

describe("loadFrameLog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "canscope-log-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("summarises the fixture log", async () => {
    const log = await loadFrameLog(FIXTURE);
    const info = log.info();

    expect(info.path).toBe(FIXTURE);
    expect(info.frameCount).toBe(9);
    expect(info.uniqueIds).toBe(4);
    expect(info.duration).toBeCloseTo(0.4, 9);
    expect([...log.identifiers()]).toEqual([0x100, 0x200, 0x400, 0x7ff]);
  });

  it("rejects a log without frames", async () => {
    const path = join(dir, "empty.log");
    await writeFile(path, "# nothing here\n");
    await expect(loadFrameLog(path)).rejects.toThrow(LogFormatError);
  });
});

describe("rawRows", () => {
  const frames = parseFrameLogText("(0.0) can0 123#DEADBEEF\n(0.5) can0 18FEF100#01\n(1.0) can0 7#\n");

  it("lists frames without decoding", () => {
    expect(rawRows(frames)).toEqual([
      { timestamp: 0, id: 0x123, id_hex: "0x123", dlc: 4, data_hex: "DE AD BE EF" },
      { timestamp: 0.5, id: 0x18fef100, id_hex: "0x18FEF100", dlc: 1, data_hex: "01" },
      { timestamp: 1, id: 7, id_hex: "0x007", dlc: 0, data_hex: "" },
    ]);
  });

  it("caps the row count", () => {
    expect(rawRows(frames, 2)).toHaveLength(2);
    expect(rawRows(frames, 10)).toHaveLength(3);
  });
});

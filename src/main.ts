// src/main.ts
//
// canscope command line: inspect a frame log against a signal catalog,
// print statistics and export series.

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { loadSettings, setLogLevel, type AppSettings } from "./api/settings";
import { APP_NAME, APP_VERSION, STATS_DECIMALS } from "./constants";
import { createViewerStore, type ViewerStoreApi } from "./stores/viewerStore";
import type { SignalKey, Theme } from "./types/signal";
import { errorMessage } from "./utils/errors";
import { rawRows } from "./utils/frameLog";
import { loadPartialJson, summarizePartialJson } from "./utils/seriesExport";
import { formatSignalKey, parseSignalKey } from "./utils/signalKey";
import { loadWorkspace } from "./utils/workspace";

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
}

interface SourceOptions {
  log?: string;
  catalog?: string;
  workspace?: string;
  signal: SignalKey[];
  from?: number;
  to?: number;
  graphCount?: number;
}

interface OutputOptions extends SourceOptions {
  out?: string;
}

const defaultIo: CliIo = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

// ─────────────────────────────────────────
// Option parsers
// ─────────────────────────────────────────

function parseSeconds(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new InvalidArgumentError("Not a time in seconds.");
  }
  return n;
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return n;
}

function collectSignal(value: string, previous: SignalKey[]): SignalKey[] {
  const key = parseSignalKey(value);
  if (!key) {
    throw new InvalidArgumentError('Expected "Message.Signal".');
  }
  return [...previous, key];
}

function parseTheme(value: string): Theme {
  if (value !== "dark" && value !== "light") {
    throw new InvalidArgumentError('Expected "dark" or "light".');
  }
  return value;
}

function withSources(command: Command): Command {
  return command
    .option("-l, --log <path>", "frame log (candump or CSV)")
    .option("-c, --catalog <path>", "signal catalog (TOML)")
    .option("-w, --workspace <path>", "restore sources, selection and cursors from a workspace")
    .option("-s, --signal <key>", "select a signal as Message.Signal (repeatable)", collectSignal, [])
    .option("--from <seconds>", "first cursor", parseSeconds)
    .option("--to <seconds>", "second cursor", parseSeconds)
    .option("-g, --graph-count <n>", "number of graph slots", parseCount);
}

// ─────────────────────────────────────────
// Session
// ─────────────────────────────────────────

async function openSession(opts: SourceOptions, settings: AppSettings): Promise<ViewerStoreApi> {
  const store = createViewerStore({ settings });

  if (opts.workspace) {
    await store.getState().restoreWorkspace(await loadWorkspace(opts.workspace));
  }
  if (opts.log) await store.getState().loadLog(opts.log);
  if (opts.catalog) await store.getState().loadCatalog(opts.catalog);

  const state = store.getState();
  if (opts.graphCount !== undefined) state.setGraphCount(opts.graphCount);
  for (const key of opts.signal) state.addSignal(key);
  if (opts.from !== undefined) state.setCursor(1, opts.from);
  if (opts.to !== undefined) state.setCursor(2, opts.to);
  return store;
}

function hasCursorRange(opts: SourceOptions): boolean {
  return opts.from !== undefined && opts.to !== undefined;
}

// ─────────────────────────────────────────
// Program
// ─────────────────────────────────────────

export function buildProgram(settings: AppSettings, io: CliIo = defaultIo): Command {
  const print = (line: string) => io.out(`${line}\n`);
  const d = STATS_DECIMALS;

  const program = new Command();
  program
    .name(APP_NAME)
    .description("Decode, inspect and export CAN signals from frame logs")
    .version(APP_VERSION)
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  withSources(program.command("info"))
    .description("summarise the loaded log and catalog")
    .action(async (opts: SourceOptions) => {
      const state = (await openSession(opts, settings)).getState();
      if (state.logInfo) {
        print(`Log: ${state.logInfo.path}`);
        print(`  Frames: ${state.logInfo.frameCount}`);
        print(`  Duration: ${state.logInfo.duration.toFixed(d)} s`);
        print(`  Unique IDs: ${state.logInfo.uniqueIds}`);
      }
      if (state.catalogInfo) {
        const name = state.catalogInfo.name ? ` (${state.catalogInfo.name})` : "";
        print(`Catalog: ${state.catalogInfo.path}${name}`);
        print(`  Messages: ${state.catalogInfo.messageCount}`);
        print(`  Signals: ${state.catalogInfo.signalCount}`);
      }
      print(`Available messages: ${state.pipeline.availableMessages().size}`);
    });

  withSources(program.command("signals"))
    .description("list signals of messages present in the log")
    .action(async (opts: SourceOptions) => {
      const { pipeline } = (await openSession(opts, settings)).getState();
      for (const key of pipeline.availableSignals()) {
        const unit = pipeline.signalInfo(key)?.unit;
        print(unit ? `${formatSignalKey(key)} [${unit}]` : formatSignalKey(key));
      }
    });

  withSources(program.command("raw"))
    .description("list frames without decoding")
    .option("-n, --limit <rows>", "maximum rows", parseCount)
    .action(async (opts: SourceOptions & { limit?: number }) => {
      const { pipeline } = (await openSession(opts, settings)).getState();
      const log = pipeline.getLog();
      if (!log) throw new Error("raw needs --log or --workspace");
      for (const row of rawRows(log.frames(), opts.limit ?? settings.raw_row_limit)) {
        print(`${row.timestamp.toFixed(6)}  ${row.id_hex}  [${row.dlc}]  ${row.data_hex}`);
      }
    });

  withSources(program.command("stats"))
    .description("statistics of the selected signals between --from and --to")
    .action(async (opts: SourceOptions) => {
      io.out((await openSession(opts, settings)).getState().statisticsText());
    });

  withSources(program.command("csv"))
    .description("export the selected signals as CSV (cut to --from/--to when both are given)")
    .option("-o, --out <path>", "write to a file instead of stdout")
    .action(async (opts: OutputOptions) => {
      const state = (await openSession(opts, settings)).getState();
      if (opts.out) {
        await state.exportCsv(opts.out, hasCursorRange(opts));
        print(`Wrote ${opts.out}`);
      } else {
        io.out(state.csvText(hasCursorRange(opts)));
      }
    });

  withSources(program.command("json"))
    .description("export raw samples between --from and --to as JSON")
    .option("-o, --out <path>", "write to a file instead of stdout")
    .action(async (opts: OutputOptions) => {
      const state = (await openSession(opts, settings)).getState();
      if (opts.out) {
        const doc = await state.exportPartialJson(opts.out);
        print(`Wrote ${Object.keys(doc.signals).length} signal(s) to ${opts.out}`);
      } else {
        print(JSON.stringify(state.partialJson(), null, 2));
      }
    });

  program
    .command("summary")
    .description("summarise a JSON export without printing its samples")
    .argument("<file>", "partial JSON export")
    .action(async (file: string) => {
      print(JSON.stringify(summarizePartialJson(await loadPartialJson(file)), null, 2));
    });

  withSources(program.command("workspace"))
    .description("save the session as a workspace file")
    .argument("<output>", "workspace path (.workspace is appended when missing)")
    .option("-t, --theme <theme>", "dark or light", parseTheme)
    .action(async (output: string, opts: SourceOptions & { theme?: Theme }) => {
      const state = (await openSession(opts, settings)).getState();
      if (opts.theme) state.setTheme(opts.theme);
      print(`Saved ${await state.saveWorkspace(output)}`);
    });

  return program;
}

/**
 * Run the CLI. Returns the process exit code; errors are printed, never
 * thrown.
 */
export async function main(argv: readonly string[] = process.argv, io: CliIo = defaultIo): Promise<number> {
  const settings = await loadSettings();
  setLogLevel(settings.log_level);

  try {
    await buildProgram(settings, io).parseAsync(argv);
    return 0;
  } catch (e) {
    // Commander has already printed its own usage errors
    if (e instanceof CommanderError) return e.exitCode;
    io.err(`${APP_NAME}: ${errorMessage(e)}\n`);
    return 1;
  }
}

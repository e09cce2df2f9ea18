#!/usr/bin/env node

import { ExitPromptError } from "@inquirer/core";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import meow from "meow";
import { ConfigurationError } from "./errors.js";
import {
  createPalette,
  formatHeader,
  formatRow,
  nameColumnWidth,
} from "./format.js";
import { DEFAULT_REFRESH_INTERVAL_MS, runLiveSession } from "./live.js";
import { getAdapter, type PlatformAdapter } from "./platform/index.js";
import { Sampler } from "./sampler.js";
import { filterSelect } from "./select.js";
import {
  assertBatchAllowed,
  dispatch,
  reportOutcomes,
  resolveSignal,
  uniqueByPid,
  type Signal,
} from "./signals.js";
import { parseSortKey, sortRecords, type SortKey } from "./sort.js";
import { KeypressInput, TerminalRenderer } from "./tui.js";
import type { ProcessRecord } from "./types.js";

export interface CliFlags {
  filter: string | null;
  signal: string;
  sort: string;
  live: boolean;
  ports: boolean;
  port: string | null;
  interval: number;
  confirmNuke: boolean;
}

export interface RunOptions {
  filter: string | null;
  signal: Signal;
  sort: SortKey;
  live: boolean;
  portMode: boolean;
  port: number | null;
  refreshIntervalMs: number;
  confirmNuke: boolean;
}

const helpText = `
  Usage
    $ reap [options]

  Options
    --filter, -f <text>   Pre-filter processes by name (case-insensitive)
    --signal, -s <sig>    Signal to send (default: KILL)
    --sort <key>          Sort by cpu, memory, pid, name or port (default: cpu)
    --live, -l            Live mode with auto-refreshing process list
    --interval <seconds>  Live mode refresh interval (default: 2)
    --ports, -p           Only show processes listening on TCP ports
    --port <n>            Only show processes listening on port n
    --confirm-nuke        Signal every match without selecting (needs --filter or --port)
    --version, -v         Show version number
    --help, -h            Show this help

  Examples
    $ reap                          Pick processes to kill
    $ reap -f chrome --sort mem     Chrome processes, biggest first
    $ reap -l -s TERM               Live view, send SIGTERM
    $ reap -p --sort port           Processes with listening ports
    $ reap --port 3000 --confirm-nuke
`;

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

const isMain = isEntryPoint();

/**
 * Parse CLI arguments using meow.
 */
export function parseArgs(argv: string[]): CliFlags {
  const cli = meow(helpText, {
    importMeta: import.meta,
    argv: argv.slice(2), // skip 'node' and script path
    flags: {
      filter: {
        type: "string",
        shortFlag: "f",
      },
      signal: {
        type: "string",
        shortFlag: "s",
        default: "KILL",
      },
      sort: {
        type: "string",
        default: "cpu",
      },
      live: {
        type: "boolean",
        shortFlag: "l",
        default: false,
      },
      interval: {
        type: "number",
        default: DEFAULT_REFRESH_INTERVAL_MS / 1000,
      },
      ports: {
        type: "boolean",
        shortFlag: "p",
        default: false,
      },
      port: {
        type: "string",
      },
      confirmNuke: {
        type: "boolean",
        default: false,
      },
    },
    autoHelp: false, // Handle manually to avoid auto-exit during tests
    autoVersion: false, // Handle manually to avoid auto-exit during tests
  });

  // Handle --help and --version manually when running as CLI
  if (isMain) {
    if (argv.includes("--help") || argv.includes("-h")) {
      cli.showHelp(0);
    }
    if (argv.includes("--version") || argv.includes("-v")) {
      cli.showVersion();
    }
  }

  return {
    filter: cli.flags.filter || null,
    signal: cli.flags.signal,
    sort: cli.flags.sort,
    live: cli.flags.live,
    ports: cli.flags.ports,
    port: cli.flags.port ?? null,
    interval: cli.flags.interval,
    confirmNuke: cli.flags.confirmNuke,
  };
}

/**
 * Parse an exact port filter.
 */
export function parsePort(input: string): number {
  const value = input.trim();

  // Reject decimals, letters, signs
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`Invalid port number: ${input}`);
  }

  const port = parseInt(value, 10);
  if (port < 1 || port > 65535) {
    throw new ConfigurationError(`Port out of range (1-65535): ${port}`);
  }
  return port;
}

/**
 * Validate flags into run options. Throws ConfigurationError on bad input.
 */
export function resolveOptions(flags: CliFlags): RunOptions {
  const signal = resolveSignal(flags.signal);
  const sort = parseSortKey(flags.sort);
  const port = flags.port === null ? null : parsePort(flags.port);

  if (flags.live && flags.confirmNuke) {
    throw new ConfigurationError(
      "--live cannot be combined with --confirm-nuke",
    );
  }

  if (!Number.isFinite(flags.interval) || flags.interval <= 0) {
    throw new ConfigurationError(
      `Invalid refresh interval: ${flags.interval} (expected seconds > 0)`,
    );
  }

  return {
    filter: flags.filter,
    signal,
    sort,
    live: flags.live,
    portMode: flags.ports || port !== null, // --port implies --ports
    port,
    refreshIntervalMs: Math.round(flags.interval * 1000),
    confirmNuke: flags.confirmNuke,
  };
}

// Calculate page size as half the terminal height (min 5, max 20)
export function getPageSize(): number {
  const rows = process.stdout.rows || 24;
  return Math.min(20, Math.max(5, Math.floor(rows / 2)));
}

export function isAbortError(err: unknown): boolean {
  if (err instanceof ExitPromptError) return true;
  if (!(err instanceof Error)) return false;
  return (
    err.name === "AbortError" ||
    err.name === "AbortPromptError" ||
    ("code" in err && err.code === "ABORT_ERR")
  );
}

/**
 * Sample according to the run options and sort the result.
 */
export async function collectRecords(
  sampler: Sampler,
  options: RunOptions,
): Promise<ProcessRecord[]> {
  const records = options.portMode
    ? await sampler.sampleWithPorts(options.filter, options.port)
    : await sampler.sample(options.filter);
  return sortRecords(records, options.sort);
}

export function noMatchesMessage(options: RunOptions): string {
  if (options.port !== null) {
    return `No process found listening on port ${options.port}`;
  }
  if (options.portMode) {
    return "No listening TCP processes found";
  }
  return "No processes found";
}

/**
 * Multi-select prompt over the sampled records.
 * Returns null when the operator cancels.
 */
async function selectProcesses(
  records: ProcessRecord[],
  options: RunOptions,
): Promise<ProcessRecord[] | null> {
  const palette = createPalette();
  const layout = {
    nameWidth: nameColumnWidth(process.stdout.columns, options.portMode),
    portMode: options.portMode,
    palette,
  };

  console.log(
    `\nFound ${records.length} process${records.length > 1 ? "es" : ""} ${palette.dim("(Esc to cancel)")}\n`,
  );

  try {
    const picked = await filterSelect({
      message: `Select processes to send ${options.signal.name}:`,
      header: formatHeader(layout),
      pageSize: getPageSize(),
      choices: records.map((record) => ({
        name: record.name,
        label: formatRow(record, layout),
      })),
    });
    if (picked === null) return null;

    const selected: ProcessRecord[] = [];
    for (const index of picked) {
      const record = records[index];
      if (record) selected.push(record);
    }
    return uniqueByPid(selected);
  } catch (err: unknown) {
    if (isAbortError(err)) {
      // Ctrl+C
      return null;
    }
    throw err;
  }
}

/**
 * Full-screen live mode. Terminal state is restored however the session ends.
 */
async function runLiveMode(
  sampler: Sampler,
  options: RunOptions,
): Promise<ProcessRecord[]> {
  const input = new KeypressInput();
  const renderer = new TerminalRenderer({
    portMode: options.portMode,
    signalName: options.signal.name,
  });

  renderer.open();
  input.start();
  try {
    return await runLiveSession({
      refresh: () => collectRecords(sampler, options),
      input,
      renderer,
      refreshIntervalMs: options.refreshIntervalMs,
    });
  } finally {
    input.stop();
    renderer.close();
  }
}

/**
 * Print the targets of a batch kill.
 */
function printTargets(targets: ProcessRecord[], options: RunOptions): void {
  const palette = createPalette();
  const layout = {
    nameWidth: nameColumnWidth(process.stdout.columns, options.portMode),
    portMode: options.portMode,
    palette,
  };

  console.log(`\nProcesses to signal (${targets.length}):\n`);
  console.log(`  ${formatHeader(layout)}`);
  for (const target of targets) {
    console.log(`  ${formatRow(target, layout)}`);
  }
  console.log();
}

/**
 * Sample, select and signal. Returns the process exit code.
 */
export async function run(
  options: RunOptions,
  platform: PlatformAdapter,
  sampler: Sampler = new Sampler(platform, platform),
): Promise<number> {
  // Both guards run before anything is sampled
  if (options.confirmNuke) {
    assertBatchAllowed({ filter: options.filter, port: options.port });
  }
  if (options.live && !process.stdin.isTTY) {
    throw new ConfigurationError("--live requires an interactive terminal");
  }

  let targets: ProcessRecord[];

  if (options.live) {
    targets = await runLiveMode(sampler, options);
  } else {
    const records = await collectRecords(sampler, options);

    if (records.length === 0) {
      console.log(noMatchesMessage(options));
      return 0;
    }

    if (options.confirmNuke) {
      targets = uniqueByPid(records);
      printTargets(targets, options);
    } else {
      const selected = await selectProcesses(records, options);
      if (selected === null) {
        console.log("\nCancelled");
        return 0;
      }
      targets = selected;
    }
  }

  if (targets.length === 0) {
    console.log("No processes selected");
    return 0;
  }

  const outcomes = dispatch(targets, options.signal, (pid, signal) =>
    platform.sendSignal(pid, signal),
  );
  const failed = reportOutcomes(outcomes, options.signal);
  return failed > 0 ? 1 : 0;
}

async function main(): Promise<number> {
  const options = resolveOptions(parseArgs(process.argv));
  return run(options, getAdapter());
}

// Only run when executed directly (not when imported for testing)
if (isMain) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      if (err instanceof ConfigurationError) {
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }
      if (isAbortError(err)) {
        console.log("\nCancelled");
        process.exit(0);
      }
      console.error(err);
      process.exit(1);
    });
}

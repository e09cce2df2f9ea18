import { ConfigurationError, UnknownSignalError } from "./errors.js";
import { createPalette, type Palette } from "./format.js";
import type { ProcessRecord } from "./types.js";

export interface Signal {
  name: NodeJS.Signals;
  number: number;
}

// Numbers follow Linux numbering; delivery goes by name
const SIGNALS: readonly Signal[] = [
  { name: "SIGKILL", number: 9 },
  { name: "SIGTERM", number: 15 },
  { name: "SIGINT", number: 2 },
  { name: "SIGHUP", number: 1 },
  { name: "SIGQUIT", number: 3 },
  { name: "SIGUSR1", number: 10 },
  { name: "SIGUSR2", number: 12 },
  { name: "SIGSTOP", number: 19 },
  { name: "SIGCONT", number: 18 },
];

/**
 * Resolve "KILL", "sigkill", "SIGKILL" or "9" to the same signal.
 */
export function resolveSignal(input: string): Signal {
  const upper = input.trim().toUpperCase();
  const bare = upper.startsWith("SIG") ? upper.slice(3) : upper;

  const signal = SIGNALS.find(
    (s) => s.name === `SIG${bare}` || String(s.number) === bare,
  );
  if (!signal) {
    throw new UnknownSignalError(bare || input);
  }
  return signal;
}

export interface DispatchOutcome {
  record: ProcessRecord;
  success: boolean;
  error?: unknown;
}

export type SendSignal = (pid: number, signal: NodeJS.Signals) => void;

/**
 * Send `signal` to every target in order. A failed send is recorded and the
 * remaining targets are still attempted.
 */
export function dispatch(
  targets: readonly ProcessRecord[],
  signal: Signal,
  send: SendSignal,
): DispatchOutcome[] {
  const outcomes: DispatchOutcome[] = [];
  for (const record of targets) {
    try {
      send(record.pid, signal.name);
      outcomes.push({ record, success: true });
    } catch (error: unknown) {
      outcomes.push({ record, success: false, error });
    }
  }
  return outcomes;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function describeFailure(error: unknown): string {
  switch (errorCode(error)) {
    case "EPERM":
      return "permission denied";
    case "ESRCH":
      return "no such process";
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print one line per outcome and a summary. Returns the number of failures.
 */
export function reportOutcomes(
  outcomes: readonly DispatchOutcome[],
  signal: Signal,
  palette: Palette = createPalette(),
): number {
  let failed = 0;

  for (const { record, success, error } of outcomes) {
    const target = `${palette.bold(record.name)} ${palette.dim(`(PID ${record.pid})`)}`;
    if (success) {
      console.log(`${palette.green(`Sent ${signal.name}`)} to ${target}`);
    } else {
      console.error(
        `${palette.red("Failed to signal")} ${target}: ${describeFailure(error)}`,
      );
      failed++;
    }
  }

  const sent = outcomes.length - failed;
  console.log(
    `\nSignalled ${sent} process${sent !== 1 ? "es" : ""}${failed > 0 ? `, ${failed} failed` : ""}`,
  );

  return failed;
}

/**
 * Collapse records to one per pid, so a process listening on several ports
 * is signalled once.
 */
export function uniqueByPid(records: readonly ProcessRecord[]): ProcessRecord[] {
  const seen = new Set<number>();
  return records.filter((r) => {
    if (seen.has(r.pid)) return false;
    seen.add(r.pid);
    return true;
  });
}

export interface BatchScope {
  filter: string | null;
  port: number | null;
}

/**
 * Refuse a batch kill that would match every process on the host.
 */
export function assertBatchAllowed(scope: BatchScope): void {
  if (!scope.filter && scope.port === null) {
    throw new ConfigurationError(
      "--confirm-nuke requires --filter or --port to limit which processes are signalled",
    );
  }
}

import { spawnSync } from "node:child_process";
import type {
  Listener,
  PlatformAdapter,
  ProcessSnapshotEntry,
} from "./types.js";

type JsonObject = Record<string, unknown>;

// Signals taskkill can stand in for
const TERMINATING_SIGNALS: ReadonlySet<NodeJS.Signals> = new Set<NodeJS.Signals>([
  "SIGTERM",
  "SIGKILL",
  "SIGINT",
  "SIGQUIT",
]);

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Windows platform adapter.
 * Uses PowerShell for the process table and port discovery.
 */
export class WindowsAdapter implements PlatformAdapter {
  /**
   * Snapshot all processes with their total CPU seconds and working set.
   */
  async snapshot(): Promise<ProcessSnapshotEntry[]> {
    const script = `
      Get-Process -ErrorAction SilentlyContinue |
      Select-Object Id, ProcessName, CPU, WorkingSet64 |
      ConvertTo-Json -Compress
    `;

    const items = this.runJson(script, "Failed to query processes via PowerShell.");

    const entries: ProcessSnapshotEntry[] = [];
    for (const item of items) {
      if (typeof item.Id !== "number" || typeof item.ProcessName !== "string") {
        continue;
      }
      entries.push({
        pid: item.Id,
        name: item.ProcessName,
        // CPU is null for processes we may not inspect
        cpuTimeMs: typeof item.CPU === "number" ? Math.round(item.CPU * 1000) : 0,
        rssBytes: typeof item.WorkingSet64 === "number" ? item.WorkingSet64 : 0,
      });
    }
    return entries;
  }

  /**
   * Get all listening TCP sockets using PowerShell.
   */
  listListeners(): Listener[] {
    const script = `
      Get-NetTCPConnection -State Listen -ErrorAction SilentlyContinue |
      Select-Object LocalPort, OwningProcess |
      ConvertTo-Json -Compress
    `;

    const items = this.runJson(
      script,
      "Failed to query listening ports via PowerShell.",
    );

    const listeners: Listener[] = [];
    for (const item of items) {
      if (
        typeof item.LocalPort !== "number" ||
        typeof item.OwningProcess !== "number"
      ) {
        continue;
      }
      listeners.push({
        pid: item.OwningProcess,
        port: item.LocalPort,
        protocol: "TCP",
      });
    }
    return listeners;
  }

  /**
   * Send a signal with process.kill, falling back to taskkill for signals
   * that end the process. Other signals have no Windows equivalent and fail.
   */
  sendSignal(pid: number, signal: NodeJS.Signals): void {
    try {
      process.kill(pid, signal);
    } catch (err: unknown) {
      if (!TERMINATING_SIGNALS.has(signal)) {
        throw err;
      }

      const args = ["/PID", String(pid)];
      if (signal === "SIGKILL") args.push("/F");

      const proc = spawnSync("taskkill", args, { encoding: "utf8" });
      if (proc.status !== 0) {
        throw err; // Re-throw original error
      }
    }
  }

  private runJson(script: string, failure: string): JsonObject[] {
    const proc = spawnSync(
      "powershell",
      ["-NoProfile", "-Command", script],
      { encoding: "utf8" },
    );

    if (proc.error || proc.status !== 0) {
      throw new Error(failure);
    }

    const output = proc.stdout.trim();
    if (!output || output === "null") {
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(output);
    } catch {
      throw new Error(`${failure} Unexpected output.`);
    }

    // PowerShell returns single object (not array) when only one result
    const items: unknown[] = Array.isArray(data) ? data : [data];
    return items.filter(isJsonObject);
  }
}

import { spawnSync, type SpawnSyncReturns } from "node:child_process";
import pidusage from "pidusage";
import psList from "ps-list";
import type {
  Listener,
  PlatformAdapter,
  ProcessSnapshotEntry,
} from "./types.js";

type Usage = Record<number, pidusage.Status>;

/**
 * CPU time and memory for each pid. Pids that exit mid-query are left out.
 */
async function usageFor(pids: number[]): Promise<Usage> {
  if (pids.length === 0) return {};
  try {
    return await pidusage(pids);
  } catch {
    // one vanished pid fails the whole batch
    return usageOneByOne(pids);
  }
}

async function usageOneByOne(pids: number[]): Promise<Usage> {
  const usage: Usage = {};
  for (const pid of pids) {
    try {
      usage[pid] = await pidusage(pid);
    } catch {
      continue; // exited since the listing
    }
  }
  return usage;
}

/**
 * Unix (macOS/Linux) platform adapter.
 * Lists processes with ps-list and pidusage; uses lsof with ss fallback for port discovery.
 */
export class UnixAdapter implements PlatformAdapter {
  /**
   * Snapshot every process with its cumulative CPU time and resident memory.
   */
  async snapshot(): Promise<ProcessSnapshotEntry[]> {
    const processes = await psList();
    const usage = await usageFor(processes.map((p) => p.pid));

    const entries: ProcessSnapshotEntry[] = [];
    for (const { pid, name } of processes) {
      const stat = usage[pid];
      if (!stat) continue;
      entries.push({ pid, name, cpuTimeMs: stat.ctime, rssBytes: stat.memory });
    }
    return entries;
  }

  /**
   * Get all processes listening on TCP ports.
   * Tries lsof first, falls back to ss on Linux.
   */
  listListeners(): Listener[] {
    // Try lsof first (available on macOS, usually on Linux)
    const lsofResult = this.tryLsof();
    if (lsofResult !== null) {
      return lsofResult;
    }

    // Fallback to ss (Linux when lsof unavailable)
    const ssResult = this.trySs();
    if (ssResult !== null) {
      return ssResult;
    }

    throw new Error("Neither lsof nor ss available. Install lsof or iproute2.");
  }

  /**
   * Try to get listeners using lsof.
   * Returns null if lsof is not available.
   */
  private tryLsof(): Listener[] | null {
    const proc = this.run("lsof", ["-iTCP", "-sTCP:LISTEN", "-P", "-n"]);

    if (this.isMissing(proc)) {
      return null; // lsof not available, try fallback
    }
    if (proc.status !== 0) {
      // lsof exits 1 when nothing matches
      return [];
    }

    return this.parseLsofOutput(proc.stdout);
  }

  /**
   * Parse lsof output into listeners.
   */
  parseLsofOutput(output: string): Listener[] {
    const lines = output.split("\n").slice(1); // skip header
    const listeners: Listener[] = [];

    for (const line of lines) {
      if (!line.trim()) continue;

      const parts = line.split(/\s+/);
      // COMMAND PID USER FD TYPE DEVICE SIZE/OFF NODE NAME
      // node    123 user 45u IPv4 0x123  0t0      TCP  127.0.0.1:3000 (LISTEN)

      const pidStr = parts[1];
      const protocol = parts[7];
      const name = parts[8] ?? "";

      if (!pidStr || !protocol) continue;

      const pid = parseInt(pidStr, 10);
      if (isNaN(pid)) continue;

      // Extract port from name like "127.0.0.1:3000" or "*:8080"
      const portMatch = name.match(/:(\d+)$/);
      if (!portMatch?.[1]) continue;

      listeners.push({
        pid,
        port: parseInt(portMatch[1], 10),
        protocol,
      });
    }

    return listeners;
  }

  /**
   * Try to get listeners using ss (Linux fallback).
   * Returns null if ss is not available.
   */
  private trySs(): Listener[] | null {
    // ss -tlnp shows TCP listening sockets with process info
    const proc = this.run("ss", ["-tlnp"]);

    if (this.isMissing(proc)) {
      return null;
    }
    if (proc.status !== 0) {
      return [];
    }

    return this.parseSsOutput(proc.stdout);
  }

  /**
   * Parse ss output into listeners.
   * Example line: LISTEN 0 128 *:3000 *:* users:(("node",pid=1234,fd=20),("node",pid=1240,fd=20))
   */
  parseSsOutput(output: string): Listener[] {
    const lines = output.split("\n").slice(1); // skip header
    const listeners: Listener[] = [];

    for (const line of lines) {
      // Only process LISTEN state
      if (!line.startsWith("LISTEN")) continue;

      // Format: *:3000 or 0.0.0.0:3000 or [::]:3000
      const parts = line.split(/\s+/);
      const localAddr = parts[3] ?? "";
      const portMatch = localAddr.match(/:(\d+)$/);
      if (!portMatch?.[1]) continue;
      const port = parseInt(portMatch[1], 10);

      // A socket shared by forked workers lists every owner
      for (const owner of line.matchAll(/pid=(\d+)/g)) {
        const pid = parseInt(owner[1] ?? "0", 10);
        if (isNaN(pid) || pid === 0) continue;
        listeners.push({ pid, port, protocol: "TCP" });
      }
    }

    return listeners;
  }

  /**
   * Send a signal with process.kill.
   */
  sendSignal(pid: number, signal: NodeJS.Signals): void {
    process.kill(pid, signal);
  }

  private run(command: string, args: string[]): SpawnSyncReturns<string> {
    return spawnSync(command, args, { encoding: "utf8" });
  }

  private isMissing(proc: SpawnSyncReturns<string>): boolean {
    if (proc.error && "code" in proc.error && proc.error.code === "ENOENT") {
      return true;
    }
    return proc.status === 127 || (proc.stderr ?? "").includes("not found");
  }
}

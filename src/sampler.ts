import { setTimeout as delay } from "node:timers/promises";
import type {
  Listener,
  ListenerSource,
  ProcessSnapshotEntry,
  ProcessSource,
} from "./platform/index.js";
import { filterRecords } from "./sort.js";
import type { ProcessRecord } from "./types.js";

export const DEFAULT_SAMPLE_DELAY_MS = 200;
export const MIN_SAMPLE_DELAY_MS = 100;

const BYTES_PER_MB = 1024 * 1024;

export interface PortBinding {
  port: number;
  protocol: string;
}

export type PortMapping = Map<number, PortBinding[]>;

export interface SamplerOptions {
  /** Time between the two snapshots. Values below 100ms are raised to 100ms. */
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Group listening sockets by owning pid.
 * A (port, protocol) pair appears once per pid even when the OS reports it
 * for both an IPv4 and an IPv6 binding.
 */
export function mapPorts(source: ListenerSource): PortMapping {
  let listeners: Listener[];
  try {
    listeners = source.listListeners();
  } catch {
    // Missing tools or privileges: port mode shows no rows
    return new Map();
  }

  const mapping: PortMapping = new Map();
  for (const { pid, port, protocol } of listeners) {
    const bindings = mapping.get(pid) ?? [];
    if (bindings.some((b) => b.port === port && b.protocol === protocol)) {
      continue;
    }
    bindings.push({ port, protocol });
    mapping.set(pid, bindings);
  }
  return mapping;
}

/**
 * Two-sample CPU and memory measurement over a ProcessSource.
 */
export class Sampler {
  private readonly delayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private inFlight: Promise<ProcessRecord[]> | null = null;

  constructor(
    private readonly processes: ProcessSource,
    private readonly listeners: ListenerSource,
    options: SamplerOptions = {},
  ) {
    this.delayMs = Math.max(
      MIN_SAMPLE_DELAY_MS,
      options.delayMs ?? DEFAULT_SAMPLE_DELAY_MS,
    );
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Sample every process, keeping those whose name contains `filter`.
   */
  async sample(filter?: string | null): Promise<ProcessRecord[]> {
    return filterRecords(await this.measure(), { name: filter });
  }

  /**
   * Sample processes that own a listening socket, one record per port.
   */
  async sampleWithPorts(
    filter?: string | null,
    portFilter?: number | null,
  ): Promise<ProcessRecord[]> {
    const records = await this.sample(filter);
    const mapping = mapPorts(this.listeners);

    const bound: ProcessRecord[] = [];
    for (const record of records) {
      for (const binding of mapping.get(record.pid) ?? []) {
        bound.push({ ...record, ...binding });
      }
    }
    return filterRecords(bound, { port: portFilter });
  }

  /**
   * Callers arriving while a sample is running share its result.
   */
  private measure(): Promise<ProcessRecord[]> {
    if (!this.inFlight) {
      this.inFlight = this.takeSamples().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async takeSamples(): Promise<ProcessRecord[]> {
    const first = await this.processes.snapshot();
    const startedAt = this.now();
    await this.sleep(this.delayMs);
    const second = await this.processes.snapshot();
    const elapsedMs = Math.max(1, this.now() - startedAt);

    const previous = new Map<number, ProcessSnapshotEntry>();
    for (const entry of first) {
      previous.set(entry.pid, entry);
    }

    return second.map((entry) => {
      const before = previous.get(entry.pid);
      // A reused pid can report less CPU time than its predecessor
      const cpuDelta = before ? Math.max(0, entry.cpuTimeMs - before.cpuTimeMs) : 0;
      return {
        pid: entry.pid,
        name: entry.name,
        cpuPercent: (cpuDelta / elapsedMs) * 100,
        memoryMb: Math.floor(entry.rssBytes / BYTES_PER_MB),
      };
    });
  }
}

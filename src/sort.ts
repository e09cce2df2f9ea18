import { ConfigurationError } from "./errors.js";
import type { ProcessRecord } from "./types.js";

export const SORT_KEYS = ["cpu", "memory", "pid", "name", "port"] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export type Comparator = (a: ProcessRecord, b: ProcessRecord) => number;

/**
 * One comparator per sort key.
 * Records without a port sort before every record that has one.
 */
export const comparators: Record<SortKey, Comparator> = {
  cpu: (a, b) => b.cpuPercent - a.cpuPercent,
  memory: (a, b) => b.memoryMb - a.memoryMb,
  pid: (a, b) => a.pid - b.pid,
  name: (a, b) => {
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  },
  port: (a, b) => {
    if (a.port === undefined) return b.port === undefined ? 0 : -1;
    if (b.port === undefined) return 1;
    return a.port - b.port;
  },
};

/**
 * Return a new array ordered by `key`. Ties keep their input order.
 */
export function sortRecords(
  records: readonly ProcessRecord[],
  key: SortKey,
): ProcessRecord[] {
  // Array.prototype.sort is stable since ES2019
  return [...records].sort(comparators[key]);
}

/**
 * Parse a --sort value. "mem" is accepted for memory.
 */
export function parseSortKey(input: string): SortKey {
  const normalized = input.trim().toLowerCase();
  if (normalized === "mem") return "memory";

  const key = SORT_KEYS.find((k) => k === normalized);
  if (!key) {
    throw new ConfigurationError(
      `Invalid sort key: ${input} (expected ${SORT_KEYS.join(", ")})`,
    );
  }
  return key;
}

export function matchesName(name: string, filter: string): boolean {
  return name.toLowerCase().includes(filter.toLowerCase());
}

export interface RecordFilter {
  name?: string | null;
  port?: number | null;
}

/**
 * Keep records whose name contains `name` and whose port equals `port`.
 */
export function filterRecords(
  records: readonly ProcessRecord[],
  filter: RecordFilter,
): ProcessRecord[] {
  return records.filter((r) => {
    if (filter.name && !matchesName(r.name, filter.name)) return false;
    if (filter.port != null && r.port !== filter.port) return false;
    return true;
  });
}

/**
 * One observed process at a sampling instant.
 * In port mode there is one record per (pid, port) pair.
 */
export interface ProcessRecord {
  pid: number;
  name: string;
  cpuPercent: number; // Share of one core since the previous snapshot
  memoryMb: number;
  port?: number;
  protocol?: string;
}

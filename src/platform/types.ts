/**
 * One row of a process-table snapshot.
 */
export interface ProcessSnapshotEntry {
  pid: number;
  name: string;
  cpuTimeMs: number; // Cumulative user + system CPU time
  rssBytes: number;
}

/**
 * A socket in the listening state and the process that owns it.
 */
export interface Listener {
  pid: number;
  port: number;
  protocol: string;
}

/**
 * Reads the process table and delivers signals.
 */
export interface ProcessSource {
  /**
   * Take a snapshot of every process visible to the current user.
   */
  snapshot(): Promise<ProcessSnapshotEntry[]>;

  /**
   * Send a signal to a process. Throws the OS error on failure.
   */
  sendSignal(pid: number, signal: NodeJS.Signals): void;
}

/**
 * Enumerates listening sockets.
 */
export interface ListenerSource {
  /**
   * Get all listening TCP sockets. Throws when they cannot be enumerated.
   */
  listListeners(): Listener[];
}

/**
 * Platform-specific adapter.
 * Implementations exist for Unix (macOS/Linux) and Windows.
 */
export interface PlatformAdapter extends ProcessSource, ListenerSource {}

import { uniqueByPid } from "./signals.js";
import type { ProcessRecord } from "./types.js";

export const DEFAULT_REFRESH_INTERVAL_MS = 2000;
export const INPUT_POLL_MS = 100;

export type LiveKey = "up" | "down" | "toggle" | "confirm" | "cancel" | "quit";

export type LiveState =
  | { kind: "browsing" }
  | { kind: "confirm" }
  | { kind: "exiting"; withKill: boolean };

/**
 * What the renderer gets to draw. `cursor` is null when there are no rows.
 */
export interface LiveView {
  records: readonly ProcessRecord[];
  cursor: number | null;
  marked: ReadonlySet<number>;
  confirmPending: boolean;
}

export interface Clock {
  now(): number;
}

export interface InputSource {
  /**
   * Resolve with the next key, or null if none arrives within `timeoutMs`.
   */
  poll(timeoutMs: number): Promise<LiveKey | null>;
}

export interface Renderer {
  draw(view: LiveView): void;
}

/**
 * Cursor, marked pids and the confirmation gate for one live session.
 * Marks are kept by pid so they follow a process across reordering refreshes.
 */
export class SelectionState {
  private current: ProcessRecord[];
  private index = 0;
  private readonly pids = new Set<number>();
  private phase: LiveState = { kind: "browsing" };

  constructor(records: readonly ProcessRecord[]) {
    this.current = [...records];
  }

  get state(): LiveState {
    return this.phase;
  }

  get records(): readonly ProcessRecord[] {
    return this.current;
  }

  get cursor(): number | null {
    return this.current.length > 0 ? this.index : null;
  }

  get marked(): ReadonlySet<number> {
    return this.pids;
  }

  isBrowsing(): boolean {
    return this.phase.kind === "browsing";
  }

  isExiting(): boolean {
    return this.phase.kind === "exiting";
  }

  /**
   * Swap in a fresh sample. Ignored outside browsing.
   */
  replaceRecords(records: readonly ProcessRecord[]): boolean {
    if (!this.isBrowsing()) return false;
    this.current = [...records];
    this.index = Math.min(this.index, Math.max(0, this.current.length - 1));
    return true;
  }

  /**
   * Apply a key. Returns true when visible state changed.
   */
  handleKey(key: LiveKey): boolean {
    switch (this.phase.kind) {
      case "browsing":
        return this.handleBrowsingKey(key);
      case "confirm":
        return this.handleConfirmKey(key);
      case "exiting":
        return false;
    }
  }

  private handleBrowsingKey(key: LiveKey): boolean {
    switch (key) {
      case "quit":
      case "cancel":
        this.pids.clear();
        this.phase = { kind: "exiting", withKill: false };
        return true;
      case "up":
        if (this.index === 0) return false;
        this.index--;
        return true;
      case "down":
        if (this.index >= this.current.length - 1) return false;
        this.index++;
        return true;
      case "toggle": {
        const record = this.current[this.index];
        if (!record) return false;
        if (!this.pids.delete(record.pid)) {
          this.pids.add(record.pid);
        }
        return true;
      }
      case "confirm":
        // Nothing to confirm unless a marked process is still listed
        if (!this.current.some((r) => this.pids.has(r.pid))) return false;
        this.phase = { kind: "confirm" };
        return true;
    }
  }

  private handleConfirmKey(key: LiveKey): boolean {
    if (key === "confirm") {
      this.phase = { kind: "exiting", withKill: true };
      return true;
    }
    if (key === "cancel") {
      this.phase = { kind: "browsing" };
      return true;
    }
    return false;
  }

  view(): LiveView {
    return {
      records: this.current,
      cursor: this.cursor,
      marked: this.pids,
      confirmPending: this.phase.kind === "confirm",
    };
  }

  /**
   * Records to signal: a copy of the marked rows, one per pid. Empty unless
   * the session ended with a confirmed kill.
   */
  killList(): ProcessRecord[] {
    if (this.phase.kind !== "exiting" || !this.phase.withKill) return [];
    return uniqueByPid(this.current.filter((r) => this.pids.has(r.pid))).map(
      (r) => ({ ...r }),
    );
  }
}

export interface LiveSessionOptions {
  refresh: () => Promise<ProcessRecord[]>;
  input: InputSource;
  renderer: Renderer;
  clock?: Clock;
  refreshIntervalMs?: number;
  pollIntervalMs?: number;
}

/**
 * Drive a SelectionState until the operator confirms or quits.
 * Refreshes run only while browsing; key polling runs on its own shorter cadence.
 */
export async function runLiveSession(
  options: LiveSessionOptions,
): Promise<ProcessRecord[]> {
  const {
    refresh,
    input,
    renderer,
    clock = { now: () => Date.now() },
    refreshIntervalMs = DEFAULT_REFRESH_INTERVAL_MS,
    pollIntervalMs = INPUT_POLL_MS,
  } = options;

  const session = new SelectionState(await refresh());
  let lastRefresh = clock.now();
  renderer.draw(session.view());

  while (!session.isExiting()) {
    if (session.isBrowsing() && clock.now() - lastRefresh >= refreshIntervalMs) {
      session.replaceRecords(await refresh());
      lastRefresh = clock.now();
      renderer.draw(session.view());
    }

    const key = await input.poll(pollIntervalMs);
    if (key !== null && session.handleKey(key)) {
      renderer.draw(session.view());
    }
  }

  return session.killList();
}

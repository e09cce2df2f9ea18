import * as readline from "node:readline";
import {
  createPalette,
  formatHeader,
  formatRow,
  nameColumnWidth,
  type Palette,
} from "./format.js";
import type { InputSource, LiveKey, LiveView, Renderer } from "./live.js";

/**
 * Map a readline keypress to a live-mode key.
 * ↑/k up, ↓/j down, space toggle, Enter confirm, Esc or Ctrl+C cancel, q quit.
 */
export function mapKeypress(
  char: string | undefined,
  key: readline.Key | undefined,
): LiveKey | null {
  if (key?.ctrl && key.name === "c") return "cancel";

  switch (key?.name) {
    case "up":
    case "k":
      return "up";
    case "down":
    case "j":
      return "down";
    case "space":
      return "toggle";
    case "return":
    case "enter":
      return "confirm";
    case "escape":
      return "cancel";
    case "q":
      return "quit";
  }

  if (char === " ") return "toggle";
  return null;
}

/**
 * A readable stream that may be a TTY, such as process.stdin.
 */
export interface KeyStream extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Raw-mode keypress reader for process.stdin.
 */
export class KeypressInput implements InputSource {
  private readonly queue: LiveKey[] = [];
  private waiter: ((key: LiveKey | null) => void) | null = null;
  private wasRaw = false;

  constructor(private readonly stdin: KeyStream = process.stdin) {}

  private readonly onKeypress = (
    char: string | undefined,
    key: readline.Key | undefined,
  ) => {
    const mapped = mapKeypress(char, key);
    if (mapped === null) return;

    if (this.waiter) {
      this.waiter(mapped);
    } else {
      this.queue.push(mapped);
    }
  };

  start(): void {
    readline.emitKeypressEvents(this.stdin);
    if (this.stdin.isTTY && this.stdin.setRawMode) {
      this.wasRaw = this.stdin.isRaw ?? false;
      this.stdin.setRawMode(true);
    }
    this.stdin.on("keypress", this.onKeypress);
    this.stdin.resume();
  }

  stop(): void {
    this.stdin.removeListener("keypress", this.onKeypress);
    if (this.stdin.isTTY && this.stdin.setRawMode) {
      this.stdin.setRawMode(this.wasRaw);
    }
    this.stdin.pause();
  }

  poll(timeoutMs: number): Promise<LiveKey | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);

      this.waiter = (key) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(key);
      };
    });
  }
}

export interface ScreenOptions {
  columns: number;
  rows: number;
  portMode: boolean;
  signalName: string;
  palette: Palette;
}

/**
 * Lines for one frame: title, header, a window of rows that keeps the cursor
 * visible, and either the key help or the confirmation box.
 */
export function renderFrame(view: LiveView, options: ScreenOptions): string[] {
  const { columns, rows, portMode, signalName, palette } = options;
  const nameWidth = nameColumnWidth(columns - 4, portMode);
  const layout = { nameWidth, portMode, palette };

  const selected = view.records.filter((r) => view.marked.has(r.pid));
  const selectedPids = new Set(selected.map((r) => r.pid)).size;
  const title =
    selectedPids > 0
      ? ` reap - ${selectedPids} selected `
      : ` reap `;

  const lines = [palette.bold(title), `    ${formatHeader(layout)}`];

  // title, header, blank line and footer take four rows
  const visible = Math.max(1, rows - 4);
  const cursor = view.cursor ?? 0;
  const start = Math.max(
    0,
    Math.min(cursor - Math.floor(visible / 2), view.records.length - visible),
  );

  if (view.records.length === 0) {
    lines.push(palette.dim("    No matching processes"));
  }

  for (const [offset, record] of view.records
    .slice(start, start + visible)
    .entries()) {
    const index = start + offset;
    const isCursor = index === view.cursor;
    const isMarked = view.marked.has(record.pid);
    const pointer = isCursor ? "▶ " : "  ";
    const marker = isMarked ? palette.bold(palette.green("●")) : " ";
    const row = `${pointer}${marker} ${formatRow(record, layout)}`;
    lines.push(isCursor ? palette.inverse(row) : row);
  }

  lines.push("");

  if (view.confirmPending) {
    const count = selectedPids;
    const message = `Send ${signalName} to ${count} process${count === 1 ? "" : "es"}?`;
    const hint = "[Enter] Confirm  [Esc] Cancel";
    const width = Math.max(message.length, hint.length) + 4;
    const border = "─".repeat(width);
    lines.push(
      palette.yellow(`┌${border}┐`),
      palette.yellow(`│  ${message.padEnd(width - 2)}│`),
      palette.yellow(`│  ${hint.padEnd(width - 2)}│`),
      palette.yellow(`└${border}┘`),
    );
  } else {
    lines.push(
      palette.dim(" ↑↓ navigate • Space select • Enter kill • q quit "),
    );
  }

  return lines;
}

/**
 * Full-screen renderer on the alternate screen buffer.
 */
export class TerminalRenderer implements Renderer {
  private readonly palette: Palette;

  constructor(
    private readonly options: { portMode: boolean; signalName: string },
    private readonly out: NodeJS.WriteStream = process.stdout,
  ) {
    this.palette = createPalette(!process.env.NO_COLOR);
  }

  open(): void {
    this.out.write("\x1b[?1049h\x1b[?25l");
  }

  close(): void {
    this.out.write("\x1b[?25h\x1b[?1049l");
  }

  draw(view: LiveView): void {
    const lines = renderFrame(view, {
      columns: this.out.columns || 80,
      rows: this.out.rows || 24,
      portMode: this.options.portMode,
      signalName: this.options.signalName,
      palette: this.palette,
    });
    // Raw mode disables output newline translation
    this.out.write(`\x1b[H\x1b[2J${lines.join("\r\n")}`);
  }
}

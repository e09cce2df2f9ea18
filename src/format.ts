import type { ProcessRecord } from "./types.js";

export type Paint = (text: string) => string;

export interface Palette {
  bold: Paint;
  dim: Paint;
  red: Paint;
  green: Paint;
  yellow: Paint;
  cyan: Paint;
  inverse: Paint;
}

const sgr =
  (open: string, close: string): Paint =>
  (text) =>
    `\x1b[${open}m${text}\x1b[${close}m`;

const plain: Paint = (text) => text;

export function colorEnabled(): boolean {
  return !process.env.NO_COLOR && process.stdout.isTTY === true;
}

export function createPalette(enabled: boolean = colorEnabled()): Palette {
  if (!enabled) {
    return {
      bold: plain,
      dim: plain,
      red: plain,
      green: plain,
      yellow: plain,
      cyan: plain,
      inverse: plain,
    };
  }
  return {
    bold: sgr("1", "22"),
    dim: sgr("2", "22"),
    red: sgr("31", "39"),
    green: sgr("32", "39"),
    yellow: sgr("33", "39"),
    cyan: sgr("36", "39"),
    inverse: sgr("7", "27"),
  };
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

// marker(6) + PID(7) + CPU(7) + MEMORY(9) + separators(4)
const FIXED_COLUMNS = 33;
const PORT_COLUMN = 8;

/**
 * Width left for the name column, clamped to 20..80.
 */
export function nameColumnWidth(
  columns: number | undefined,
  portMode: boolean,
): number {
  const total = columns || 80;
  const fixed = FIXED_COLUMNS + (portMode ? PORT_COLUMN : 0);
  return Math.min(80, Math.max(20, total - fixed));
}

export interface RowLayout {
  nameWidth: number;
  portMode: boolean;
  palette: Palette;
}

export function cpuPaint(cpuPercent: number, palette: Palette): Paint {
  if (cpuPercent > 50) return (text) => palette.bold(palette.red(text));
  if (cpuPercent > 10) return palette.yellow;
  return palette.dim;
}

export function formatHeader({ nameWidth, portMode, palette }: RowLayout): string {
  const columns = [
    "PID".padEnd(7),
    "NAME".padEnd(nameWidth),
    ...(portMode ? ["PORT".padStart(7)] : []),
    "CPU %".padStart(7),
    "MEMORY".padStart(9),
  ];
  return palette.dim(columns.join(" "));
}

/**
 * One table row: PID, name, optional port, CPU and memory.
 */
export function formatRow(record: ProcessRecord, layout: RowLayout): string {
  const { nameWidth, portMode, palette } = layout;
  const cpu = `${record.cpuPercent.toFixed(1).padStart(6)}%`;

  const columns = [
    palette.dim(String(record.pid).padEnd(7)),
    truncate(record.name, nameWidth).padEnd(nameWidth),
    ...(portMode
      ? [(record.port === undefined ? "" : `:${record.port}`).padStart(7)]
      : []),
    cpuPaint(record.cpuPercent, palette)(cpu),
    palette.cyan(`${record.memoryMb} MB`.padStart(9)),
  ];
  return columns.join(" ");
}

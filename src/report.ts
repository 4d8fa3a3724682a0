import type { BufferbloatReport, PingStats } from "./types";

const LABEL_WIDTH = 23;
const COLUMN_WIDTH = 6;

const COLUMNS: { key: keyof PingStats; title: string }[] = [
  { key: "min", title: "min" },
  { key: "p25", title: "25%" },
  { key: "median", title: "median" },
  { key: "mean", title: "mean" },
  { key: "p75", title: "75%" },
  { key: "p95", title: "95%" },
  { key: "max", title: "max" },
  { key: "std", title: "std" },
  { key: "jit", title: "jit" },
];

// Ties go to the even neighbour, so 2.5 prints as 2 and 3.5 as 4
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction !== 0.5) {
    return Math.round(value);
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

function signed(value: number): string {
  return value < 0 ? String(value) : `+${value}`;
}

function row(label: string, cells: string[]): string {
  return [label.padEnd(LABEL_WIDTH), ...cells.map((cell) => cell.padStart(COLUMN_WIDTH))].join(" ");
}

export function formatHeader(): string {
  return row("", COLUMNS.map(({ title }) => title));
}

export function formatStatsRow(label: string, stats: PingStats): string {
  return row(label, COLUMNS.map(({ key }) => String(roundHalfEven(stats[key]))));
}

export function formatDifferenceRow(label: string, before: PingStats, after: PingStats): string {
  return row(
    label,
    COLUMNS.map(({ key }) => signed(roundHalfEven(after[key]) - roundHalfEven(before[key])))
  );
}

export function formatDownloadSpeed(mbps: number): string {
  return `Average download speed: ${mbps.toFixed(1)} Mbps`;
}

export function formatGrade(report: BufferbloatReport): string {
  const increase = roundHalfEven(report.loaded.median) - roundHalfEven(report.unloaded.median);
  return `Bufferbloat grade: ${report.grade} (${signed(increase)} ms median latency under load)`;
}

export const UNLOADED_LABEL = "Unloaded latency in ms:";
export const LOADED_LABEL = "Loaded latency in ms:";
export const DIFFERENCE_LABEL = "Difference in ms:";

import { max, maxBy, mean, min, sortBy, sumBy } from "lodash";
import type { BufferbloatGrade, DownloadResult, PingStats } from "./types";

export class NoSamplesError extends Error {
  constructor() {
    super("Could not reach any host.");
    this.name = "NoSamplesError";
  }
}

// Linear interpolation between closest ranks
export function percentile(data: number[], q: number): number {
  const sorted = sortBy(data);
  const rank = (q / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);

  if (rank >= sorted.length - 1) {
    return sorted[sorted.length - 1];
  }

  return sorted[lower] + (rank - lower) * (sorted[lower + 1] - sorted[lower]);
}

export function jitter(rtts: number[]): number {
  if (rtts.length < 2) {
    return 0;
  }
  let total = 0;
  for (let i = 0; i < rtts.length - 1; i++) {
    total += Math.abs(rtts[i + 1] - rtts[i]);
  }
  return total / (rtts.length - 1);
}

export function standardDeviation(rtts: number[]): number {
  if (rtts.length < 2) {
    return 0;
  }
  const avg = mean(rtts);
  const squares = sumBy(rtts, (rtt) => (rtt - avg) ** 2);
  return Math.sqrt(squares / (rtts.length - 1));
}

export function calculatePingStats(rtts: number[]): PingStats {
  if (rtts.length === 0) {
    throw new NoSamplesError();
  }
  return {
    min: min(rtts) ?? 0,
    p25: percentile(rtts, 25),
    median: percentile(rtts, 50),
    mean: mean(rtts),
    p75: percentile(rtts, 75),
    p95: percentile(rtts, 95),
    max: max(rtts) ?? 0,
    std: standardDeviation(rtts),
    jit: jitter(rtts),
  };
}

export function downloadSpeedMbps(results: DownloadResult[]): number {
  const bytes = sumBy(results, (result) => result.bytes);
  const elapsedMs = maxBy(results, (result) => result.elapsedMs)?.elapsedMs ?? 0;
  if (elapsedMs <= 0) {
    return 0;
  }
  return (bytes * 8) / (elapsedMs / 1000) / 1e6;
}

// Thresholds on the increase of the median latency, in ms
const GRADE_THRESHOLDS: [number, BufferbloatGrade][] = [
  [30, "A"],
  [60, "B"],
  [200, "C"],
  [400, "D"],
];

export function gradeBufferbloat(unloaded: PingStats, loaded: PingStats): BufferbloatGrade {
  const increase = loaded.median - unloaded.median;
  for (const [limit, grade] of GRADE_THRESHOLDS) {
    if (increase < limit) {
      return grade;
    }
  }
  return "F";
}

export interface PingStats {
  min: number;
  p25: number;
  median: number;
  mean: number;
  p75: number;
  p95: number;
  max: number;
  std: number; // Sample standard deviation
  jit: number; // Mean absolute difference between consecutive samples
}

export interface DownloadResult {
  url: string;
  bytes: number;
  elapsedMs: number;
  error?: string;
}

export interface LatencyTestResult {
  rtts: number[];
  downloads: DownloadResult[];
}

export type BufferbloatGrade = "A" | "B" | "C" | "D" | "F";

export interface BufferbloatReport {
  unloaded: PingStats;
  loaded: PingStats;
  downloadSpeedMbps: number;
  grade: BufferbloatGrade;
}

export interface Config {
  pingHosts: string[];
  pingPort: number;
  pingIntervalMs: number;
  pingTimeoutMs: number;
  downloadUrls: string[];
  downloadTimeoutMs: number;
  durationMs: number; // Duration of each phase (unloaded and loaded)
  parallelDownloads: number;
  logFile?: string;
}

export interface Args {
  hosts?: string[];
  port?: number;
  interval?: number;
  timeout?: number;
  urls?: string[];
  downloadTimeout?: number;
  duration?: number;
  parallel?: number;
  logFile?: string;
}

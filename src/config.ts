import type { Args, Config } from "./types";

// Ping time is measured using TCP connect on the HTTPS port of these anycast addresses
export const PING_HOSTS = ["1.1.1.1", "1.0.0.1", "8.8.8.8", "8.8.4.4", "9.9.9.9", "149.112.112.112"];
export const PING_PORT = 443;
export const PING_INTERVAL = 0.1; // seconds
export const PING_TIMEOUT = 0.5; // seconds

// The link is loaded by downloading large files from these URLs
export const DOWNLOAD_URLS = [
  "https://nbg1-speed.hetzner.com/10GB.bin",
  "https://github.com/szalony9szymek/large/releases/download/free/large",
  "https://download.thinkbroadband.com/5GB.zip",
];
export const DOWNLOAD_TIMEOUT = 10; // seconds

export const DURATION = 60; // seconds, per phase
export const PARALLEL_DOWNLOADS = 6;

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid value for --${name}: expected a positive number`);
  }
  return value;
}

// Largest delay setTimeout accepts
const MAX_DELAY_MS = 2 ** 31 - 1;

function milliseconds(name: string, seconds: number): number {
  const ms = positive(name, seconds) * 1000;
  if (ms > MAX_DELAY_MS) {
    throw new Error(`Invalid value for --${name}: must not exceed ${MAX_DELAY_MS / 1000} seconds`);
  }
  return ms;
}

function port(value: number): number {
  if (!Number.isInteger(value) || value <= 0 || value > 65535) {
    throw new Error("Invalid value for --port: expected a port between 1 and 65535");
  }
  return value;
}

export function resolveConfig(args: Args): Config {
  const pingHosts = args.hosts ?? PING_HOSTS;
  if (pingHosts.length === 0) {
    throw new Error("No hosts provided");
  }

  const downloadUrls = args.urls ?? DOWNLOAD_URLS;
  if (downloadUrls.length === 0) {
    throw new Error("No download URLs provided");
  }

  const parallelDownloads = positive("parallel", args.parallel ?? PARALLEL_DOWNLOADS);
  if (!Number.isInteger(parallelDownloads)) {
    throw new Error("Invalid value for --parallel: expected a whole number");
  }

  return {
    pingHosts,
    pingPort: port(args.port ?? PING_PORT),
    pingIntervalMs: milliseconds("interval", args.interval ?? PING_INTERVAL),
    pingTimeoutMs: milliseconds("timeout", args.timeout ?? PING_TIMEOUT),
    downloadUrls,
    downloadTimeoutMs: milliseconds("download-timeout", args.downloadTimeout ?? DOWNLOAD_TIMEOUT),
    durationMs: milliseconds("duration", args.duration ?? DURATION),
    parallelDownloads,
    logFile: args.logFile,
  };
}

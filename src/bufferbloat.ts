import { range } from "lodash";
import { downloadWorker } from "./download";
import { pingWorker } from "./ping";
import { calculatePingStats, downloadSpeedMbps, gradeBufferbloat } from "./stats";
import type { BufferbloatReport, Config, DownloadResult, LatencyTestResult, PingStats } from "./types";
import { Logger, sleep } from "./utils";

/**
 * Samples TCP connect latency for one phase. When `loaded` is set the link is
 * saturated with `config.parallelDownloads` concurrent downloads while sampling.
 */
export async function runLatencyTest(config: Config, loaded: boolean, logger: Logger): Promise<LatencyTestResult> {
  const controller = new AbortController();

  const ping = pingWorker(
    {
      hosts: config.pingHosts,
      port: config.pingPort,
      durationMs: config.durationMs,
      intervalMs: config.pingIntervalMs,
      timeoutMs: config.pingTimeoutMs,
    },
    controller.signal
  );

  const downloads: Promise<DownloadResult>[] = loaded
    ? range(config.parallelDownloads).map((i) =>
        downloadWorker(
          config.downloadUrls[i % config.downloadUrls.length],
          { durationMs: config.durationMs, timeoutMs: config.downloadTimeoutMs },
          controller.signal,
          logger
        )
      )
    : [];

  await sleep(config.durationMs);
  controller.abort();

  const [rtts, downloadResults] = await Promise.all([ping, Promise.all(downloads)]);
  return { rtts, downloads: downloadResults };
}

export async function measureBufferbloat(
  config: Config,
  logger: Logger,
  onUnloaded?: (stats: PingStats) => void
): Promise<BufferbloatReport> {
  const seconds = config.durationMs / 1000;

  logger.log(`Measuring unloaded latency for ${seconds}s against ${config.pingHosts.length} hosts...`);
  const idle = await runLatencyTest(config, false, logger);
  const unloaded = calculatePingStats(idle.rtts);
  logger.log(`Collected ${idle.rtts.length} unloaded samples`);
  onUnloaded?.(unloaded);

  logger.log(`Measuring loaded latency for ${seconds}s with ${config.parallelDownloads} parallel downloads...`);
  const busy = await runLatencyTest(config, true, logger);
  const loaded = calculatePingStats(busy.rtts);
  logger.log(`Collected ${busy.rtts.length} loaded samples`);

  return {
    unloaded,
    loaded,
    downloadSpeedMbps: downloadSpeedMbps(busy.downloads),
    grade: gradeBufferbloat(unloaded, loaded),
  };
}

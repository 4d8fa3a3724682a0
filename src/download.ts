import type { Readable } from "node:stream";
import { performance } from "node:perf_hooks";
import axios from "axios";
import type { DownloadResult } from "./types";
import { errorMessage, Logger } from "./utils";

export interface DownloadWorkerOptions {
  durationMs: number;
  timeoutMs: number;
}

function drain(stream: Readable, signal: AbortSignal, onChunk: (size: number) => void): Promise<void> {
  return new Promise((resolve, reject) => {
    const stop = () => {
      stream.destroy();
      resolve();
    };
    if (signal.aborted) {
      stop();
      return;
    }
    signal.addEventListener("abort", stop, { once: true });

    stream.on("data", (chunk: Buffer) => onChunk(chunk.length));
    stream.once("end", () => {
      signal.removeEventListener("abort", stop);
      resolve();
    });
    stream.once("error", (e) => {
      signal.removeEventListener("abort", stop);
      reject(e);
    });
  });
}

/**
 * Streams `url` and discards the body, counting received bytes, until the
 * body ends, `durationMs` has passed or `signal` aborts.
 */
export async function downloadWorker(
  url: string,
  options: DownloadWorkerOptions,
  signal: AbortSignal,
  logger: Logger
): Promise<DownloadResult> {
  const start = performance.now();
  const result: DownloadResult = { url, bytes: 0, elapsedMs: 0 };

  const controller = new AbortController();
  const abort = () => controller.abort();
  const timer = setTimeout(abort, options.durationMs);
  if (signal.aborted) {
    abort();
  } else {
    signal.addEventListener("abort", abort, { once: true });
  }

  try {
    const response = await axios.get<Readable>(url, {
      responseType: "stream",
      timeout: options.timeoutMs,
      signal: controller.signal,
    });
    await drain(response.data, controller.signal, (size) => {
      result.bytes += size;
    });
  } catch (e) {
    // Aborting a request that has not finished yet is how the phase ends.
    if (!controller.signal.aborted) {
      result.error = errorMessage(e);
      logger.warn(`Download error (${url}): ${result.error}`);
    }
  } finally {
    clearTimeout(timer);
    signal.removeEventListener("abort", abort);
  }

  result.elapsedMs = performance.now() - start;
  return result;
}

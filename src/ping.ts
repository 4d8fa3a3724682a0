import net from "node:net";
import { performance } from "node:perf_hooks";
import { sleep } from "./utils";

export interface PingWorkerOptions {
  hosts: string[];
  port: number;
  durationMs: number;
  intervalMs: number;
  timeoutMs: number;
}

/**
 * Measures how long it takes to establish a TCP connection to `host:port`.
 * Resolves with the round-trip time in milliseconds, or `null` when the
 * connection fails or does not complete within `timeoutMs`.
 */
export function tcpPing(host: string, port: number, timeoutMs: number): Promise<number | null> {
  return new Promise((resolve) => {
    const start = performance.now();
    let socket: net.Socket;
    try {
      socket = net.connect({ host, port });
    } catch {
      // Invalid ports and hosts throw before any connect attempt is made
      resolve(null);
      return;
    }

    const finish = (rtt: number | null) => {
      socket.destroy();
      resolve(rtt);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(performance.now() - start));
    socket.once("timeout", () => finish(null));
    socket.once("error", () => finish(null));
  });
}

export async function pingWorker(options: PingWorkerOptions, signal: AbortSignal): Promise<number[]> {
  const { hosts, port, durationMs, intervalMs, timeoutMs } = options;
  const rtts: number[] = [];
  const start = performance.now();
  let hostNr = 0;

  while (performance.now() - start < durationMs && !signal.aborted) {
    const rtt = await tcpPing(hosts[hostNr], port, timeoutMs);
    hostNr = (hostNr + 1) % hosts.length;
    if (rtt !== null) {
      rtts.push(rtt);
    }
    await sleep(intervalMs);
  }

  return rtts;
}

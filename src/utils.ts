import fs from "node:fs";
import minimist from "minimist";
import type { Args } from "./types";

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class Logger {
  private logFile?: string;

  constructor(logFile?: string) {
    this.logFile = logFile;
    // Create file if not exists
    if (logFile && !fs.existsSync(logFile)) {
      fs.writeFileSync(logFile, "");
    }
  }

  private write(level: string, message: string, ...args: unknown[]) {
    const timestamp = new Date().toISOString();
    const logMessage = `[${timestamp}] [${level}] ${message}${args.length ? ` ${JSON.stringify(args)}` : ""}`;

    // Console output
    if (level === "ERROR") {
      console.error(logMessage);
    } else if (level === "WARN") {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }

    // File output
    if (this.logFile) {
      fs.appendFileSync(this.logFile, logMessage + "\n");
    }
  }

  log(message: string, ...args: unknown[]) {
    this.write("INFO", message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    this.write("WARN", message, ...args);
  }

  error(message: string, ...args: unknown[]) {
    this.write("ERROR", message, ...args);
  }
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
}

// minimist already turns numeric values into numbers; anything else becomes NaN
// and is rejected when the config is resolved.
function toNumber(value: unknown): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function getArgs(argv: string[] = process.argv.slice(2)): Args {
  const args = minimist(argv, {
    string: ["hosts", "urls", "log"],
  });

  return {
    hosts: splitList(args.hosts),
    port: toNumber(args.port),
    interval: toNumber(args.interval),
    timeout: toNumber(args.timeout),
    urls: splitList(args.urls),
    downloadTimeout: toNumber(args["download-timeout"]),
    duration: toNumber(args.duration),
    parallel: toNumber(args.parallel),
    logFile: args.log || undefined,
  };
}

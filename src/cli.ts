#!/usr/bin/env node
import { measureBufferbloat } from "./bufferbloat";
import { resolveConfig } from "./config";
import {
  DIFFERENCE_LABEL,
  formatDifferenceRow,
  formatDownloadSpeed,
  formatGrade,
  formatHeader,
  formatStatsRow,
  LOADED_LABEL,
  UNLOADED_LABEL,
} from "./report";
import { errorMessage, getArgs, Logger } from "./utils";

export async function run(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    const config = resolveConfig(getArgs(argv));
    const logger = new Logger(config.logFile);

    const report = await measureBufferbloat(config, logger, (unloaded) => {
      console.log(formatHeader());
      console.log(formatStatsRow(UNLOADED_LABEL, unloaded));
    });

    console.log(formatStatsRow(LOADED_LABEL, report.loaded));
    console.log(formatDifferenceRow(DIFFERENCE_LABEL, report.unloaded, report.loaded));
    console.log(formatDownloadSpeed(report.downloadSpeedMbps));
    console.log(formatGrade(report));
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    process.exit(1);
  }
}

if (require.main === module) {
  void run();
}

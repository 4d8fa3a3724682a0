import { describe, expect, it } from "vitest";
import {
  DIFFERENCE_LABEL,
  formatDifferenceRow,
  formatDownloadSpeed,
  formatGrade,
  formatHeader,
  formatStatsRow,
  roundHalfEven,
  UNLOADED_LABEL,
} from "../report";
import type { PingStats } from "../types";

const unloaded: PingStats = {
  min: 12.4,
  p25: 13.5,
  median: 14.49,
  mean: 15,
  p75: 16.2,
  p95: 20.7,
  max: 40,
  std: 3.3,
  jit: 2.5,
};

const loaded: PingStats = {
  min: 14,
  p25: 30,
  median: 55,
  mean: 60,
  p75: 80,
  p95: 150,
  max: 300,
  std: 40,
  jit: 1,
};

describe("report", () => {
  it("aligns the column titles with the values", () => {
    expect(formatHeader()).toBe(
      "                           min    25% median   mean    75%    95%    max    std    jit"
    );
  });

  it("rounds ties to the even neighbour", () => {
    expect([0.5, 1.5, 2.5, 3.5, 2.4, 2.6, -2.5].map(roundHalfEven)).toEqual([0, 2, 2, 4, 2, 3, -2]);
  });

  it("rounds latencies to whole milliseconds", () => {
    expect(formatStatsRow(UNLOADED_LABEL, unloaded)).toBe(
      "Unloaded latency in ms:     12     14     14     15     16     21     40      3      2"
    );
  });

  it("signs the difference of the rounded values", () => {
    expect(formatDifferenceRow(DIFFERENCE_LABEL, unloaded, loaded)).toBe(
      "Difference in ms:           +2    +16    +41    +45    +64   +129   +260    +37     -1"
    );
  });

  it("prints the download speed with one decimal", () => {
    expect(formatDownloadSpeed(95.34)).toBe("Average download speed: 95.3 Mbps");
    expect(formatDownloadSpeed(0)).toBe("Average download speed: 0.0 Mbps");
  });

  it("prints the grade with the median increase", () => {
    expect(formatGrade({ unloaded, loaded, downloadSpeedMbps: 95, grade: "B" })).toBe(
      "Bufferbloat grade: B (+41 ms median latency under load)"
    );
  });
});

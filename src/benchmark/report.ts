import type { BenchConfig } from "../config/benchConfig.js";
import type { OperationName } from "../operations/registry.js";
import { calculateStats, type BenchmarkStats } from "./stats.js";

export type LinePrinter = (line: string) => void;

export function formatReport(operation: OperationName, config: BenchConfig, stats: BenchmarkStats): string[] {
  return [
    `Operation: ${operation}`,
    `Bucket: ${config.bucket}`,
    `Prefix: ${config.prefix}`,
    `Min: ${stats.min}s`,
    `Mean: ${stats.mean}s`,
    `Max: ${stats.max}s`,
    `Standard Deviation: ${stats.stddev}s`,
  ];
}

export function printResults(
  operation: OperationName,
  config: BenchConfig,
  samples: readonly number[],
  print: LinePrinter = console.log,
): BenchmarkStats {
  const stats = calculateStats(samples);
  for (const line of formatReport(operation, config, stats)) {
    print(line);
  }
  return stats;
}

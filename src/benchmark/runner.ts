import type { S3Client } from "@aws-sdk/client-s3";
import type { BenchConfig } from "../config/benchConfig.js";
import type { OperationName, OperationRegistry } from "../operations/registry.js";
import type { LinePrinter } from "./report.js";
import type { Logger } from "../logger.js";

/** Milliseconds from a monotonic source. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

export interface BenchmarkOptions {
  config: BenchConfig;
  operation: OperationName;
  iterations: number;
  client: S3Client;
  registry: OperationRegistry;
  print?: LinePrinter;
  clock?: Clock;
  logger?: Logger;
}

export interface BenchmarkRun {
  operation: OperationName;
  /** Elapsed seconds per iteration, in run order. */
  samples: number[];
}

export async function runBenchmark(options: BenchmarkOptions): Promise<BenchmarkRun> {
  const { config, operation, iterations, client, registry } = options;
  const print = options.print ?? console.log;
  const clock = options.clock ?? monotonicClock;

  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new RangeError(`Iteration count must be a positive integer, got ${iterations}`);
  }

  const op = registry[operation];
  print(`Starting benchmark: ${operation}`);

  const samples: number[] = [];
  for (let i = 0; i < iterations; i++) {
    const start = clock();
    const result = await op(client, config);
    const elapsed = (clock() - start) / 1000;
    samples.push(elapsed);
    options.logger?.debug({ iteration: i, result }, "Iteration finished");
    print(`Iteration ${i}: ${elapsed}s`);
  }

  return { operation, samples };
}

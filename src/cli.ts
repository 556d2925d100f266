import { Argument, Command, InvalidArgumentError } from "commander";
import { loadBenchConfig } from "./config/benchConfig.js";
import { createStorageClient, type StorageClientFactory } from "./storage/storageClient.js";
import {
  OPERATION_NAMES,
  createOperationRegistry,
  isOperationName,
  type OperationRegistry,
} from "./operations/registry.js";
import { targetPath } from "./operations/listAll.js";
import { runBenchmark, monotonicClock, type Clock } from "./benchmark/runner.js";
import { printResults, type LinePrinter } from "./benchmark/report.js";
import { createLogger, type Logger } from "./logger.js";

export const DEFAULT_ITERATIONS = 10;

export interface CliDependencies {
  createClient: StorageClientFactory;
  registry: OperationRegistry;
  print: LinePrinter;
  clock: Clock;
  logger: Logger;
}

export function parseIterationCount(value: string): number {
  const count = Number(value);
  if (!/^\s*\d+\s*$/.test(value) || !Number.isSafeInteger(count) || count < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return count;
}

export function buildCli(overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = {
    createClient: overrides.createClient ?? createStorageClient,
    registry: overrides.registry ?? createOperationRegistry(),
    print: overrides.print ?? console.log,
    clock: overrides.clock ?? monotonicClock,
    logger: overrides.logger ?? createLogger(),
  };

  return new Command("s3bench")
    .description("Benchmarks S3 storage operations")
    .version("0.1.0")
    .addArgument(new Argument("<config_file>", "a YAML file describing the S3 repository"))
    .addArgument(new Argument("<operation>", "the operation to benchmark").choices(OPERATION_NAMES))
    .option(
      "--num_iters <count>",
      "the number of times to run the benchmark",
      parseIterationCount,
      DEFAULT_ITERATIONS,
    )
    .action(async (configFile: string, operation: string, options: { num_iters: number }) => {
      if (!isOperationName(operation)) {
        throw new InvalidArgumentError(`Unknown operation ${operation}.`);
      }

      const config = loadBenchConfig(configFile);
      deps.logger.debug(
        { region: config.region, endpoint: config.endpoint, target: targetPath(config) },
        "Creating storage client",
      );
      const client = deps.createClient(config);
      try {
        const run = await runBenchmark({
          config,
          operation,
          iterations: options.num_iters,
          client,
          registry: deps.registry,
          print: deps.print,
          clock: deps.clock,
          logger: deps.logger,
        });
        printResults(run.operation, config, run.samples, deps.print);
      } finally {
        client.destroy();
      }
    });
}

export async function main(argv: string[] = process.argv, overrides: Partial<CliDependencies> = {}): Promise<void> {
  const logger = overrides.logger ?? createLogger();
  try {
    await buildCli({ ...overrides, logger }).parseAsync(argv);
  } catch (err) {
    logger.error({ err }, err instanceof Error ? err.message : "Benchmark failed");
    process.exitCode = 1;
  }
}

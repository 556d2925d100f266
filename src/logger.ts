import pino, { type Logger } from "pino";

export type { Logger };

export const DEFAULT_LOG_LEVEL = "info";

export function isLogLevel(level: string): boolean {
  return level === "silent" || Object.hasOwn(pino.levels.values, level);
}

export function createLogger(level: string = process.env.S3BENCH_LOG_LEVEL ?? DEFAULT_LOG_LEVEL): Logger {
  const known = isLogLevel(level);
  // stdout belongs to the report
  const logger = pino({ name: "s3bench", level: known ? level : DEFAULT_LOG_LEVEL }, pino.destination(2));
  if (!known) {
    logger.warn({ level }, `Unknown log level, using ${DEFAULT_LOG_LEVEL}`);
  }
  return logger;
}

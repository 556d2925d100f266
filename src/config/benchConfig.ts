import { readFileSync } from "node:fs";
import * as v from "valibot";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../common/errors.js";

export const DEFAULT_REGION = "us-east-1";

const BenchConfigSchema = v.object({
  bucket: v.pipe(v.string(), v.minLength(1, "bucket must not be empty")),
  region: v.nullish(v.pipe(v.string(), v.minLength(1, "region must not be empty"))),
  prefix: v.nullish(v.string()),
  endpoint: v.nullish(v.pipe(v.string(), v.url("endpoint must be a URL"))),
  forcePathStyle: v.nullish(v.boolean()),
});

export interface BenchConfig {
  readonly region: string;
  readonly bucket: string;
  readonly prefix: string;
  readonly endpoint?: string;
  readonly forcePathStyle: boolean;
}

export function parseBenchConfig(data: unknown, path = "<inline>"): BenchConfig {
  const result = v.safeParse(BenchConfigSchema, data);
  if (!result.success) {
    const [issue] = result.issues;
    const field = v.getDotPath(issue) ?? undefined;
    if (field !== undefined && issue.input === undefined) {
      throw new ConfigError(
        "missing_field",
        path,
        `Expected required attribute ${field} in config file ${path}`,
        { field },
      );
    }
    const where = field === undefined ? "config root" : field;
    throw new ConfigError("invalid_field", path, `Invalid ${where} in config file ${path}: ${issue.message}`, {
      field,
    });
  }

  const parsed = result.output;
  const endpoint = parsed.endpoint ?? undefined;
  return Object.freeze({
    region: parsed.region ?? DEFAULT_REGION,
    bucket: parsed.bucket,
    prefix: parsed.prefix ?? "",
    endpoint,
    forcePathStyle: parsed.forcePathStyle ?? (endpoint !== undefined),
  });
}

export function loadBenchConfig(path: string): BenchConfig {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError("unreadable_file", path, `Cannot read config file ${path}`, { cause: err });
  }

  let data: unknown;
  try {
    // JSON documents are valid YAML too
    data = parseYaml(content);
  } catch (err) {
    throw new ConfigError("malformed_file", path, `Config file ${path} is not valid YAML`, { cause: err });
  }

  return parseBenchConfig(data, path);
}

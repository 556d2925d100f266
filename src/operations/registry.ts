import type { S3Client } from "@aws-sdk/client-s3";
import type { BenchConfig } from "../config/benchConfig.js";
import { listAll } from "./listAll.js";

export const OPERATION_NAMES = ["list_all"] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

/** Performs one storage request. Resolves once the request has fully completed; the value is only logged. */
export type Operation = (client: S3Client, config: BenchConfig) => Promise<unknown>;

export type OperationRegistry = Readonly<Record<OperationName, Operation>>;

export function createOperationRegistry(): OperationRegistry {
  return Object.freeze({
    list_all: listAll,
  });
}

export function isOperationName(value: string): value is OperationName {
  return OPERATION_NAMES.some((name) => name === value);
}

import { S3Client } from "@aws-sdk/client-s3";
import type { BenchConfig } from "../config/benchConfig.js";

export type StorageClientFactory = (config: BenchConfig) => S3Client;

/**
 * Builds an S3 client for the configured region and endpoint override.
 * Credentials come from the SDK's default provider chain; nothing is contacted until the first request.
 */
export const createStorageClient: StorageClientFactory = (config) =>
  new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
  });

import { paginateListObjectsV2, type S3Client } from "@aws-sdk/client-s3";
import type { BenchConfig } from "../config/benchConfig.js";
import { PrefixNotFoundError } from "../common/errors.js";

export function targetPath(config: BenchConfig): string {
  return config.prefix ? `${config.bucket}/${config.prefix}` : config.bucket;
}

// S3 has no directories; listing "bucket/prefix" recursively means every key under "prefix/".
export function listingPrefix(prefix: string): string | undefined {
  const trimmed = prefix.replace(/^\/+|\/+$/g, "");
  return trimmed ? `${trimmed}/` : undefined;
}

/**
 * Lists every key under the configured path, following continuation pages.
 * Resolves with the number of entries listed. A prefix with no keys under it does not exist.
 */
export async function listAll(client: S3Client, config: BenchConfig): Promise<number> {
  const prefix = listingPrefix(config.prefix);
  const pages = paginateListObjectsV2({ client }, { Bucket: config.bucket, Prefix: prefix });

  let entries = 0;
  let firstPage = true;
  for await (const page of pages) {
    const keyCount = page.KeyCount ?? page.Contents?.length ?? 0;
    if (firstPage && prefix !== undefined && keyCount === 0) {
      throw new PrefixNotFoundError(config.bucket, prefix);
    }
    firstPage = false;
    entries += keyCount;
  }
  return entries;
}

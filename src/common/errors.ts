export type ConfigErrorKind =
  | "unreadable_file"
  | "malformed_file"
  | "missing_field"
  | "invalid_field";

export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;
  readonly path: string;
  /** Dotted path of the offending key. Undefined when the whole document is at fault. */
  readonly field?: string;

  constructor(kind: ConfigErrorKind, path: string, message: string, options?: { field?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ConfigError";
    this.kind = kind;
    this.path = path;
    this.field = options?.field;
  }
}

/** A recursive listing was requested for a prefix that holds no keys. */
export class PrefixNotFoundError extends Error {
  readonly code = "NoSuchKey";
  readonly bucket: string;
  readonly prefix: string;

  constructor(bucket: string, prefix: string) {
    super(`Path does not exist: ${bucket}/${prefix}`);
    this.name = "PrefixNotFoundError";
    this.bucket = bucket;
    this.prefix = prefix;
  }
}

import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, isLogLevel } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses the requested level", () => {
    expect(createLogger("debug").level).toBe("debug");
    expect(createLogger("silent").level).toBe("silent");
  });

  it("reads the level from S3BENCH_LOG_LEVEL", () => {
    vi.stubEnv("S3BENCH_LOG_LEVEL", "warn");
    expect(createLogger().level).toBe("warn");
  });

  it("falls back to info for an unknown level instead of throwing", () => {
    vi.stubEnv("S3BENCH_LOG_LEVEL", "verbose");
    expect(() => createLogger()).not.toThrow();
    expect(createLogger().level).toBe("info");
  });

  it("recognises pino's level names", () => {
    expect(isLogLevel("trace")).toBe(true);
    expect(isLogLevel("fatal")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel("")).toBe(false);
  });
});

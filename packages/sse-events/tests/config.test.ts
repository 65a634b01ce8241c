/**
 * Tests for configuration loading.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import {
  decoderOptionsFromConfig,
  loadConfig,
  writerOptionsFromConfig,
} from "../src/config.js";
import { createLogger } from "../src/logger.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      EVENT_STREAM_SKIP_UNKNOWN: true,
      EVENT_STREAM_FIRST_ID: 0,
      EVENT_STREAM_MAX_FRAME_BYTES: 16 * 1024 * 1024,
    });
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin" })).not.toHaveProperty("PATH");
  });

  it("reads and coerces the stream settings", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      EVENT_STREAM_SKIP_UNKNOWN: "false",
      EVENT_STREAM_FIRST_ID: "5",
      EVENT_STREAM_MAX_FRAME_BYTES: "4096",
    });
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.EVENT_STREAM_SKIP_UNKNOWN).toBe(false);
    expect(config.EVENT_STREAM_FIRST_ID).toBe(5);
    expect(config.EVENT_STREAM_MAX_FRAME_BYTES).toBe(4096);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
    expect(() => loadConfig({ EVENT_STREAM_SKIP_UNKNOWN: "yes" })).toThrow(ZodError);
    expect(() => loadConfig({ EVENT_STREAM_FIRST_ID: "-1" })).toThrow(ZodError);
    expect(() => loadConfig({ EVENT_STREAM_MAX_FRAME_BYTES: "512" })).toThrow(ZodError);
  });
});

describe("options from config", () => {
  const config = loadConfig({
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
    EVENT_STREAM_SKIP_UNKNOWN: "false",
    EVENT_STREAM_FIRST_ID: "7",
    EVENT_STREAM_MAX_FRAME_BYTES: "2048",
  });

  it("builds decoder options", () => {
    const logger = createLogger(config);
    expect(decoderOptionsFromConfig(config, logger)).toEqual({
      skipUnknownVariants: false,
      maxFrameBytes: 2048,
      logger,
    });
  });

  it("builds writer options", () => {
    expect(writerOptionsFromConfig(config)).toEqual({ firstEventId: 7 });
  });

  it("creates a logger at the configured level", () => {
    expect(createLogger(config).level).toBe("silent");
  });
});

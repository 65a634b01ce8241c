/**
 * @nodefeed/sse-events — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { EventStreamWriterOptions, SubscriptionDecoderOptions } from "./subscription.js";
import { DEFAULT_MAX_FRAME_BYTES } from "./subscription.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Subscriptions
  EVENT_STREAM_SKIP_UNKNOWN: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),
  EVENT_STREAM_FIRST_ID: z.coerce.number().int().min(0).default(0),
  EVENT_STREAM_MAX_FRAME_BYTES: z.coerce
    .number()
    .int()
    .min(1024)
    .default(DEFAULT_MAX_FRAME_BYTES),
});

export type FeedConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): FeedConfig {
  return ConfigSchema.parse(env);
}

export function decoderOptionsFromConfig(
  config: FeedConfig,
  logger: Logger,
): SubscriptionDecoderOptions {
  return {
    skipUnknownVariants: config.EVENT_STREAM_SKIP_UNKNOWN,
    maxFrameBytes: config.EVENT_STREAM_MAX_FRAME_BYTES,
    logger,
  };
}

export function writerOptionsFromConfig(config: FeedConfig): EventStreamWriterOptions {
  return { firstEventId: config.EVENT_STREAM_FIRST_ID };
}

/**
 * Structured logging via pino.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { FeedConfig } from "./config.js";

/**
 * Create the feed's logger from configuration. Development output goes
 * through pino-pretty unless a destination is given; tests pass one to
 * capture output.
 */
export function createLogger(
  config: Pick<FeedConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  const options = {
    name: "nodefeed",
    level: config.LOG_LEVEL,
    base: { env: config.NODE_ENV },
  };
  if (destination !== undefined) {
    return pino(options, destination);
  }
  return pino({
    ...options,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/**
 * Time primitives.
 *
 * Both are integer milliseconds. The wire forms are:
 * - Timestamp: RFC 3339 with millisecond precision, UTC ("2021-05-04T09:12:34.567Z")
 * - TimeDiff:  space-separated units, largest first ("1day 2h 30m", "500ms", "0s");
 *   the units are years, months, days, h, m, s and ms
 */

import { DomainValueError } from "./errors.js";

/**
 * Milliseconds since the Unix epoch, from 0 up to MAX_TIMESTAMP. The
 * textual form has a four-digit year, so later instants have none.
 */
export type Timestamp = number;

/** 9999-12-31T23:59:59.999Z */
export const MAX_TIMESTAMP: Timestamp = 253_402_300_799_999;

/** A span of milliseconds. */
export type TimeDiff = number;

/** Era counter, monotonically increasing across the chain. */
export type EraId = number;

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

/**
 * @throws DomainValueError (INVALID_TIMESTAMP) for a value that is not an
 * integer between 0 and MAX_TIMESTAMP
 */
export function formatTimestamp(timestamp: Timestamp): string {
  if (!Number.isInteger(timestamp) || timestamp < 0 || timestamp > MAX_TIMESTAMP) {
    throw new DomainValueError("INVALID_TIMESTAMP", `Timestamp out of range: ${timestamp}`);
  }
  return new Date(timestamp).toISOString();
}

/**
 * @throws DomainValueError (INVALID_TIMESTAMP) unless the input is exactly
 * the form formatTimestamp produces
 */
export function parseTimestamp(value: string): Timestamp {
  if (!TIMESTAMP_PATTERN.test(value)) {
    throw new DomainValueError("INVALID_TIMESTAMP", `Malformed timestamp: "${value}"`);
  }
  const ms = Date.parse(value);
  // Date.parse rolls 2021-02-30 over into March; reject anything that does not round-trip
  if (Number.isNaN(ms) || new Date(ms).toISOString() !== value) {
    throw new DomainValueError("INVALID_TIMESTAMP", `Not a calendar instant: "${value}"`);
  }
  if (ms < 0) {
    throw new DomainValueError("INVALID_TIMESTAMP", `Timestamp before the epoch: "${value}"`);
  }
  return ms;
}

// =============================================================================
// TimeDiff
// =============================================================================

interface TimeUnit {
  /** Written after the count; pluralized with "s" when `plural` is set. */
  readonly suffix: string;
  readonly plural: boolean;
  readonly ms: number;
  /** Every spelling the parser accepts. */
  readonly aliases: readonly string[];
}

// A month is 30.44 days and a year 365.25 days.
const UNITS: readonly TimeUnit[] = [
  { suffix: "year", plural: true, ms: 31_557_600_000, aliases: ["years", "year", "y"] },
  { suffix: "month", plural: true, ms: 2_630_016_000, aliases: ["months", "month", "M"] },
  { suffix: "day", plural: true, ms: 86_400_000, aliases: ["days", "day", "d"] },
  { suffix: "h", plural: false, ms: 3_600_000, aliases: ["hours", "hour", "hr", "h"] },
  { suffix: "m", plural: false, ms: 60_000, aliases: ["minutes", "minute", "min", "m"] },
  { suffix: "s", plural: false, ms: 1_000, aliases: ["seconds", "second", "sec", "s"] },
  { suffix: "ms", plural: false, ms: 1, aliases: ["millis", "msec", "ms"] },
];

const WEEK_MS = 7 * 86_400_000;

const PART_PATTERN = /\s*(\d+)\s*([A-Za-z]+)/y;

export function formatTimeDiff(diff: TimeDiff): string {
  if (diff === 0) {
    return "0s";
  }

  const parts: string[] = [];
  let remaining = diff;
  for (const unit of UNITS) {
    const count = Math.floor(remaining / unit.ms);
    remaining -= count * unit.ms;
    if (count === 0) continue;
    const suffix = unit.plural && count > 1 ? `${unit.suffix}s` : unit.suffix;
    parts.push(`${count}${suffix}`);
  }
  return parts.join(" ");
}

/**
 * Reads what formatTimeDiff writes, plus the usual long and short unit
 * names ("2 hours", "5min", "1w"). Parts may come in any order and the
 * space between a count and its unit is optional.
 *
 * @throws DomainValueError (INVALID_TIME_DIFF) on unknown units, empty input
 * or a result beyond the safe integer range
 */
export function parseTimeDiff(value: string): TimeDiff {
  const text = value.trim();
  if (text === "") {
    throw new DomainValueError("INVALID_TIME_DIFF", "Empty time span");
  }

  let total = 0;
  let position = 0;
  while (position < text.length) {
    PART_PATTERN.lastIndex = position;
    const match = PART_PATTERN.exec(text);
    const count = match?.[1];
    const unit = match?.[2];
    if (match === null || count === undefined || unit === undefined) {
      throw new DomainValueError(
        "INVALID_TIME_DIFF",
        `Malformed time span part: "${text.slice(position).trim()}"`,
      );
    }
    total += Number(count) * unitMs(unit);
    position = PART_PATTERN.lastIndex;
  }

  if (!Number.isSafeInteger(total)) {
    throw new DomainValueError("INVALID_TIME_DIFF", `Time span out of range: "${value}"`);
  }
  return total;
}

function unitMs(name: string): number {
  if (name === "weeks" || name === "week" || name === "w") {
    return WEEK_MS;
  }
  const unit = UNITS.find((u) => u.aliases.includes(name));
  if (unit === undefined) {
    throw new DomainValueError("INVALID_TIME_DIFF", `Unknown time unit: "${name}"`);
  }
  return unit.ms;
}

/**
 * Typed errors for decoding, subscriptions and stream writers.
 *
 * Building, encoding and reading accessors of an event never fail. Errors
 * exist only on the consumer side (decoding a record, reading a stream) and
 * for writers used out of protocol.
 */

import { inspect } from "node:util";

// =============================================================================
// Decoding
// =============================================================================

export type EventDecodeErrorCode =
  | "INVALID_JSON"
  | "MALFORMED_RECORD"
  | "UNKNOWN_VARIANT"
  | "MALFORMED_PAYLOAD";

export interface DecodeIssue {
  /** Dotted path inside the variant payload ("" for the payload itself) */
  readonly path: string;
  readonly message: string;
}

/**
 * A wire record that cannot be read as any known event.
 *
 * `UNKNOWN_VARIANT` is kept apart from the other codes so a consumer can skip
 * variants introduced by a newer node instead of failing.
 */
export class EventDecodeError extends Error {
  constructor(
    public readonly code: EventDecodeErrorCode,
    message: string,
    public readonly variant?: string,
    public readonly issues: readonly DecodeIssue[] = [],
  ) {
    super(message);
    this.name = "EventDecodeError";
  }
}

// =============================================================================
// Subscription
// =============================================================================

export type SubscriptionErrorCode =
  | "MISSING_HANDSHAKE"
  | "DUPLICATE_HANDSHAKE"
  | "HANDSHAKE_WITH_ID"
  | "MISSING_EVENT_ID"
  | "FRAME_TOO_LARGE";

/**
 * A stream that breaks the handshake or framing rules.
 */
export class SubscriptionError extends Error {
  constructor(
    public readonly code: SubscriptionErrorCode,
    message: string,
    public readonly eventId?: number,
  ) {
    super(message);
    this.name = "SubscriptionError";
  }
}

// =============================================================================
// Writer
// =============================================================================

export type StreamWriterErrorCode = "HANDSHAKE_NOT_SENT" | "HANDSHAKE_ALREADY_SENT" | "NOT_A_DOMAIN_EVENT";

export class StreamWriterError extends Error {
  constructor(
    public readonly code: StreamWriterErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "StreamWriterError";
  }
}

/**
 * Marks a branch the type checker has proven unreachable. Reaching it means
 * the variant set and a switch over it have drifted apart.
 */
export function assertNever(value: never, context: string): never {
  throw new Error(`Unhandled ${context}: ${inspect(value, { depth: 1 })}`);
}

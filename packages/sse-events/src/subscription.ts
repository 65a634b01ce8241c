/**
 * @nodefeed/sse-events — Subscription handshake.
 *
 * Both ends of a single subscription:
 *
 * - EventStreamWriter numbers events for one subscriber and guarantees the
 *   handshake (ApiVersion, no id) is the first frame and appears only once.
 * - SubscriptionDecoder reads frames in order and rejects a stream that
 *   breaks those rules. Variants it does not know are skipped with a warning
 *   or rejected, depending on configuration.
 *
 * Fan-out, retries, backpressure and replay belong to the transport; neither
 * class does I/O.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { ProtocolVersion } from "@nodefeed/types";
import { formatProtocolVersion } from "@nodefeed/types";
import { parseEvent } from "./decoding.js";
import { EventDecodeError, StreamWriterError, SubscriptionError } from "./errors.js";
import { apiVersion } from "./events.js";
import { encodeFrame, parseSseFrame, splitSseStream } from "./framing.js";
import type { SseFrame } from "./framing.js";
import type { DomainSseEvent, SseEvent } from "./types.js";

export const DEFAULT_MAX_FRAME_BYTES = 16 * 1024 * 1024;

// =============================================================================
// Writer
// =============================================================================

export interface EventStreamWriterOptions {
  /** Id given to the first domain event. Default: 0 */
  readonly firstEventId?: number;
}

export class EventStreamWriter {
  private readonly _version: ProtocolVersion;
  private _nextId: number;
  private _handshakeSent = false;

  constructor(version: ProtocolVersion, options: EventStreamWriterOptions = {}) {
    this._version = version;
    this._nextId = options.firstEventId ?? 0;
  }

  /**
   * The opening ApiVersion frame.
   *
   * @throws StreamWriterError if already sent
   */
  handshake(): string {
    if (this._handshakeSent) {
      throw new StreamWriterError("HANDSHAKE_ALREADY_SENT", "Handshake was already sent on this stream");
    }
    this._handshakeSent = true;
    return encodeFrame({ event: apiVersion(this._version) });
  }

  /**
   * Frame a domain event with the next id.
   *
   * @throws StreamWriterError before the handshake, or for an ApiVersion event
   */
  write(event: DomainSseEvent): string {
    if (!this._handshakeSent) {
      throw new StreamWriterError("HANDSHAKE_NOT_SENT", "Handshake must be sent before any event");
    }
    if (isHandshake(event)) {
      throw new StreamWriterError("NOT_A_DOMAIN_EVENT", "ApiVersion is only sent as the handshake");
    }
    const id = this._nextId++;
    return encodeFrame({ event, id });
  }

  /** Id the next written event will get. */
  get nextEventId(): number {
    return this._nextId;
  }
}

// Guards the writer against callers that bypass the DomainSseEvent type
function isHandshake(event: SseEvent): boolean {
  return event.type === "ApiVersion";
}

// =============================================================================
// Decoder
// =============================================================================

export interface SubscriptionDecoderOptions {
  /** Skip variants this decoder does not know instead of failing. Default: true */
  readonly skipUnknownVariants?: boolean;
  /** Largest accepted `data` payload, in UTF-8 bytes. Default: 16 MiB */
  readonly maxFrameBytes?: number;
  readonly logger?: Logger;
}

export type DecodedFrame =
  | { readonly kind: "handshake"; readonly version: ProtocolVersion }
  | { readonly kind: "event"; readonly id: number; readonly event: DomainSseEvent };

export class SubscriptionDecoder {
  private readonly _skipUnknown: boolean;
  private readonly _maxFrameBytes: number;
  private readonly _logger: Logger;
  private _version: ProtocolVersion | undefined;
  private _skipped = 0;

  constructor(options: SubscriptionDecoderOptions = {}) {
    this._skipUnknown = options.skipUnknownVariants ?? true;
    this._maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    this._logger = options.logger ?? pino({ level: "silent" });
  }

  /**
   * Decode the next frame of the subscription.
   *
   * @returns the decoded frame, or undefined if it was an unknown variant
   *          that was skipped
   * @throws SubscriptionError when the handshake or id rules are broken
   * @throws EventDecodeError when the record cannot be decoded
   */
  decodeFrame(frame: SseFrame): DecodedFrame | undefined {
    const size = Buffer.byteLength(frame.data, "utf8");
    if (size > this._maxFrameBytes) {
      throw new SubscriptionError(
        "FRAME_TOO_LARGE",
        `Frame of ${size} bytes exceeds the ${this._maxFrameBytes} byte limit`,
        frame.id,
      );
    }

    const event = this._decodeOrSkip(frame);
    if (event === undefined) {
      return undefined;
    }

    if (event.type === "ApiVersion") {
      if (this._version !== undefined) {
        throw new SubscriptionError(
          "DUPLICATE_HANDSHAKE",
          "ApiVersion received after the handshake",
          frame.id,
        );
      }
      if (frame.id !== undefined) {
        throw new SubscriptionError("HANDSHAKE_WITH_ID", "ApiVersion must not carry an event id", frame.id);
      }
      this._version = event.version;
      this._logger.debug({ version: formatProtocolVersion(event.version) }, "Event stream handshake received");
      return { kind: "handshake", version: event.version };
    }

    if (this._version === undefined) {
      throw new SubscriptionError(
        "MISSING_HANDSHAKE",
        `Expected ApiVersion as the first event, got ${event.type}`,
        frame.id,
      );
    }
    if (frame.id === undefined) {
      throw new SubscriptionError("MISSING_EVENT_ID", `${event.type} event has no event id`);
    }
    return { kind: "event", id: frame.id, event };
  }

  /**
   * Decode every complete frame of an event-stream body, in order.
   * Keep-alive frames and skipped variants produce nothing.
   */
  decodeStream(body: string): readonly DecodedFrame[] {
    const decoded: DecodedFrame[] = [];
    for (const text of splitSseStream(body)) {
      const frame = parseSseFrame(text);
      if (frame === undefined) continue;
      const result = this.decodeFrame(frame);
      if (result !== undefined) decoded.push(result);
    }
    return decoded;
  }

  /** Protocol version from the handshake, once received. */
  get version(): ProtocolVersion | undefined {
    return this._version;
  }

  /** Number of unknown-variant frames skipped so far. */
  get skippedCount(): number {
    return this._skipped;
  }

  private _decodeOrSkip(frame: SseFrame): SseEvent | undefined {
    try {
      return parseEvent(frame.data);
    } catch (err) {
      if (!(err instanceof EventDecodeError) || err.code !== "UNKNOWN_VARIANT") {
        throw err;
      }
      if (this._version === undefined) {
        throw new SubscriptionError(
          "MISSING_HANDSHAKE",
          `Expected ApiVersion as the first event, got unknown variant ${err.variant ?? ""}`,
          frame.id,
        );
      }
      if (!this._skipUnknown) {
        throw err;
      }
      this._skipped++;
      this._logger.warn({ variant: err.variant, eventId: frame.id }, "Skipping unknown event variant");
      return undefined;
    }
  }
}

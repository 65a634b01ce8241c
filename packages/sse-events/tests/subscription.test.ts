/**
 * Tests for the subscription handshake: writer and decoder.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { DeployHash, PublicKey, protocolVersion } from "@nodefeed/types";
import { arbDomainSseEvent } from "@nodefeed/testing";
import { apiVersion, deployExpired, fault } from "../src/events.js";
import { EventDecodeError, StreamWriterError, SubscriptionError } from "../src/errors.js";
import { EventStreamWriter, SubscriptionDecoder } from "../src/subscription.js";
import { createLogger } from "../src/logger.js";

const VERSION = protocolVersion(1, 4, 5);
const HANDSHAKE_JSON = '{"ApiVersion":"1.4.5"}';
const HASH_HEX = "01" + "00".repeat(31);
const EXPIRED = deployExpired(DeployHash.fromHex(HASH_HEX));
const EXPIRED_JSON = `{"DeployExpired":{"deploy_hash":"${HASH_HEX}"}}`;
const FAULT = fault(3, PublicKey.fromRaw("ed25519", new Uint8Array(32).fill(0xbb)), 0);
const UNKNOWN_JSON = '{"BlockFinalized":{"height":1}}';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}

function afterHandshake(decoder = new SubscriptionDecoder()): SubscriptionDecoder {
  decoder.decodeFrame({ data: HANDSHAKE_JSON });
  return decoder;
}

// =============================================================================
// Writer
// =============================================================================

describe("EventStreamWriter", () => {
  it("opens with the ApiVersion frame", () => {
    expect(new EventStreamWriter(VERSION).handshake()).toBe(`data:${HANDSHAKE_JSON}\n\n`);
  });

  it("numbers events from zero", () => {
    const writer = new EventStreamWriter(VERSION);
    writer.handshake();
    expect(writer.write(EXPIRED)).toBe(`data:${EXPIRED_JSON}\nid:0\n\n`);
    expect(writer.write(EXPIRED)).toBe(`data:${EXPIRED_JSON}\nid:1\n\n`);
    expect(writer.nextEventId).toBe(2);
  });

  it("starts from the configured first id", () => {
    const writer = new EventStreamWriter(VERSION, { firstEventId: 10 });
    writer.handshake();
    expect(writer.write(EXPIRED)).toBe(`data:${EXPIRED_JSON}\nid:10\n\n`);
  });

  it("refuses events before the handshake", () => {
    const err = thrown(() => new EventStreamWriter(VERSION).write(EXPIRED));
    expect(err).toBeInstanceOf(StreamWriterError);
    expect(err).toMatchObject({ code: "HANDSHAKE_NOT_SENT" });
  });

  it("sends the handshake only once", () => {
    const writer = new EventStreamWriter(VERSION);
    writer.handshake();
    expect(thrown(() => writer.handshake())).toMatchObject({ code: "HANDSHAKE_ALREADY_SENT" });
  });

  it("refuses an ApiVersion event passed as a domain event", () => {
    const writer = new EventStreamWriter(VERSION);
    writer.handshake();
    const err = thrown(() => Reflect.apply(writer.write, writer, [apiVersion(VERSION)]));
    expect(err).toMatchObject({ code: "NOT_A_DOMAIN_EVENT" });
    expect(writer.nextEventId).toBe(0);
  });
});

// =============================================================================
// Decoder
// =============================================================================

describe("SubscriptionDecoder", () => {
  it("reads back a written stream", () => {
    const writer = new EventStreamWriter(VERSION);
    const body = writer.handshake() + writer.write(EXPIRED) + ": ping\n\n" + writer.write(FAULT);

    const decoder = new SubscriptionDecoder();
    expect(decoder.decodeStream(body)).toEqual([
      { kind: "handshake", version: VERSION },
      { kind: "event", id: 0, event: EXPIRED },
      { kind: "event", id: 1, event: FAULT },
    ]);
    expect(decoder.version).toEqual(VERSION);
  });

  it("reads back any sequence of domain events", () => {
    fc.assert(
      fc.property(fc.array(arbDomainSseEvent, { maxLength: 5 }), (events) => {
        const writer = new EventStreamWriter(VERSION, { firstEventId: 100 });
        const body = writer.handshake() + events.map((event) => writer.write(event)).join("");

        const decoded = new SubscriptionDecoder().decodeStream(body);

        expect(decoded).toEqual([
          { kind: "handshake", version: VERSION },
          ...events.map((event, i) => ({ kind: "event", id: 100 + i, event })),
        ]);
      }),
      { numRuns: 20 },
    );
  });

  describe("handshake rules", () => {
    it("requires ApiVersion first", () => {
      const err = thrown(() => new SubscriptionDecoder().decodeFrame({ data: EXPIRED_JSON, id: 0 }));
      expect(err).toBeInstanceOf(SubscriptionError);
      expect(err).toMatchObject({
        code: "MISSING_HANDSHAKE",
        message: "Expected ApiVersion as the first event, got DeployExpired",
        eventId: 0,
      });
    });

    it("rejects a second ApiVersion", () => {
      const decoder = afterHandshake();
      expect(thrown(() => decoder.decodeFrame({ data: HANDSHAKE_JSON }))).toMatchObject({
        code: "DUPLICATE_HANDSHAKE",
      });
    });

    it("rejects an ApiVersion carrying an id", () => {
      const err = thrown(() => new SubscriptionDecoder().decodeFrame({ data: HANDSHAKE_JSON, id: 0 }));
      expect(err).toMatchObject({ code: "HANDSHAKE_WITH_ID" });
    });

    it("requires an id on domain events", () => {
      const decoder = afterHandshake();
      expect(thrown(() => decoder.decodeFrame({ data: EXPIRED_JSON }))).toMatchObject({
        code: "MISSING_EVENT_ID",
        message: "DeployExpired event has no event id",
      });
    });
  });

  describe("unknown variants", () => {
    it("skips them and logs a warning", () => {
      const lines: string[] = [];
      const logger = createLogger(
        { LOG_LEVEL: "warn", NODE_ENV: "test" },
        { write: (line: string) => void lines.push(line) },
      );
      const decoder = afterHandshake(new SubscriptionDecoder({ logger }));

      expect(decoder.decodeFrame({ data: UNKNOWN_JSON, id: 5 })).toBeUndefined();
      expect(decoder.decodeFrame({ data: EXPIRED_JSON, id: 6 })).toEqual({
        kind: "event",
        id: 6,
        event: EXPIRED,
      });

      expect(decoder.skippedCount).toBe(1);
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toMatchObject({
        level: 40,
        name: "nodefeed",
        env: "test",
        variant: "BlockFinalized",
        eventId: 5,
        msg: "Skipping unknown event variant",
      });
    });

    it("rejects them when skipping is off", () => {
      const decoder = afterHandshake(new SubscriptionDecoder({ skipUnknownVariants: false }));
      const err = thrown(() => decoder.decodeFrame({ data: UNKNOWN_JSON, id: 5 }));
      expect(err).toBeInstanceOf(EventDecodeError);
      expect(err).toMatchObject({ code: "UNKNOWN_VARIANT", variant: "BlockFinalized" });
    });

    it("never stand in for the handshake", () => {
      const err = thrown(() => new SubscriptionDecoder().decodeFrame({ data: UNKNOWN_JSON }));
      expect(err).toMatchObject({
        code: "MISSING_HANDSHAKE",
        message: "Expected ApiVersion as the first event, got unknown variant BlockFinalized",
      });
    });
  });

  describe("frame limits", () => {
    it("rejects data over the byte limit", () => {
      const decoder = new SubscriptionDecoder({ maxFrameBytes: 1024 });
      expect(thrown(() => decoder.decodeFrame({ data: "x".repeat(1025), id: 3 }))).toMatchObject({
        code: "FRAME_TOO_LARGE",
        message: "Frame of 1025 bytes exceeds the 1024 byte limit",
        eventId: 3,
      });
    });

    it("counts UTF-8 bytes, not characters", () => {
      const decoder = new SubscriptionDecoder({ maxFrameBytes: 1024 });
      expect(thrown(() => decoder.decodeFrame({ data: "é".repeat(513) }))).toMatchObject({
        code: "FRAME_TOO_LARGE",
        message: "Frame of 1026 bytes exceeds the 1024 byte limit",
      });
    });
  });

  it("propagates malformed payloads", () => {
    const decoder = afterHandshake();
    const err = thrown(() =>
      decoder.decodeFrame({ data: '{"DeployExpired":{"deploy_hash":"00"}}', id: 1 }),
    );
    expect(err).toMatchObject({ code: "MALFORMED_PAYLOAD", variant: "DeployExpired" });
  });
});

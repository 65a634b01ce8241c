/**
 * Tests for event-stream framing.
 */

import { describe, it, expect } from "vitest";
import { DeployHash, protocolVersion } from "@nodefeed/types";
import { apiVersion, deployExpired } from "../src/events.js";
import {
  encodeFrame,
  formatJsonLine,
  formatSseFrame,
  parseSseFrame,
  splitSseStream,
} from "../src/framing.js";

const HASH_HEX = "01" + "00".repeat(31);
const EXPIRED = deployExpired(DeployHash.fromHex(HASH_HEX));
const EXPIRED_JSON = `{"DeployExpired":{"deploy_hash":"${HASH_HEX}"}}`;

describe("formatSseFrame", () => {
  it("writes data then a blank line", () => {
    expect(formatSseFrame({ data: "abc" })).toBe("data:abc\n\n");
  });

  it("writes the id after the data", () => {
    expect(formatSseFrame({ data: "abc", id: 7 })).toBe("data:abc\nid:7\n\n");
  });

  it("splits multi-line data over several data lines", () => {
    expect(formatSseFrame({ data: "a\nb" })).toBe("data:a\ndata:b\n\n");
  });
});

describe("encodeFrame", () => {
  it("frames the handshake without an id", () => {
    expect(encodeFrame({ event: apiVersion(protocolVersion(1, 0, 0)) })).toBe(
      'data:{"ApiVersion":"1.0.0"}\n\n',
    );
  });

  it("frames a domain event with its id", () => {
    expect(encodeFrame({ event: EXPIRED, id: 7 })).toBe(`data:${EXPIRED_JSON}\nid:7\n\n`);
  });
});

describe("parseSseFrame", () => {
  it("reads data and id, dropping one leading space", () => {
    expect(parseSseFrame("data: hello\nid: 3")).toEqual({ data: "hello", id: 3 });
  });

  it("joins several data lines", () => {
    expect(parseSseFrame("data:a\ndata:b")).toEqual({ data: "a\nb" });
  });

  it("skips comments and unknown fields", () => {
    expect(parseSseFrame(":keep-alive\nevent:message\ndata:x")).toEqual({ data: "x" });
  });

  it("ignores an id that is not a non-negative integer", () => {
    expect(parseSseFrame("data:x\nid:abc")).toEqual({ data: "x" });
    expect(parseSseFrame("data:x\nid:-1")).toEqual({ data: "x" });
  });

  it("returns undefined for a frame without data", () => {
    expect(parseSseFrame(":keep-alive")).toBeUndefined();
    expect(parseSseFrame("id:4")).toBeUndefined();
  });

  it("reads back what encodeFrame writes", () => {
    const [text] = splitSseStream(encodeFrame({ event: EXPIRED, id: 12 }));
    expect(text).toBeDefined();
    expect(parseSseFrame(text ?? "")).toEqual({ data: EXPIRED_JSON, id: 12 });
  });
});

describe("splitSseStream", () => {
  it("returns complete frames and drops a trailing partial one", () => {
    expect(splitSseStream("data:a\n\ndata:b\nid:1\n\ndata:partial")).toEqual([
      "data:a",
      "data:b\nid:1",
    ]);
  });

  it("accepts CRLF line endings", () => {
    expect(splitSseStream("data:a\r\n\r\ndata:b\r\n\r\n")).toEqual(["data:a", "data:b"]);
  });

  it("skips empty frames", () => {
    expect(splitSseStream("\n\n\n\ndata:a\n\n")).toEqual(["data:a"]);
  });
});

describe("formatJsonLine", () => {
  it("writes one record per line", () => {
    expect(formatJsonLine(EXPIRED)).toBe(`${EXPIRED_JSON}\n`);
  });
});

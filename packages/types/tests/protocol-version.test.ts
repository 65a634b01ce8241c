/**
 * Tests for protocol version parsing and rendering.
 */

import { describe, it, expect } from "vitest";
import {
  formatProtocolVersion,
  parseProtocolVersion,
  protocolVersion,
} from "../src/protocol-version.js";

describe("protocol version", () => {
  it("renders major.minor.patch", () => {
    expect(formatProtocolVersion(protocolVersion(1, 4, 5))).toBe("1.4.5");
  });

  it("parses into a frozen value", () => {
    const version = parseProtocolVersion("2.0.13");
    expect(version).toEqual({ major: 2, minor: 0, patch: 13 });
    expect(Object.isFrozen(version)).toBe(true);
  });

  it("accepts u32 components", () => {
    expect(parseProtocolVersion("4294967295.0.0").major).toBe(4294967295);
  });

  it("rejects malformed versions", () => {
    for (const bad of ["1.4", "1.4.5.6", "v1.4.5", "01.4.5", "1.-4.5", "", "4294967296.0.0"]) {
      expect(() => parseProtocolVersion(bad)).toThrow(`Malformed protocol version: "${bad}"`);
    }
  });
});

/**
 * Tests for the Bytes value.
 */

import { describe, it, expect } from "vitest";
import { Bytes } from "../src/bytes.js";
import { DomainValueError } from "../src/errors.js";

describe("Bytes", () => {
  it("keeps its own copy of the input", () => {
    const input = new Uint8Array([1, 2, 3]);
    const bytes = Bytes.fromBytes(input);
    input[0] = 9;
    expect(bytes.toHex()).toBe("010203");
  });

  it("hands out copies", () => {
    const bytes = Bytes.fromHex("0a0b");
    const copy = bytes.toBytes();
    copy[0] = 0xff;
    expect(bytes.toBytes()).toEqual(new Uint8Array([0x0a, 0x0b]));
  });

  it("reads and writes lowercase hex of any length", () => {
    expect(Bytes.fromHex("").length).toBe(0);
    expect(Bytes.empty().toHex()).toBe("");
    expect(Bytes.fromHex("00ff10").toString()).toBe("00ff10");
    expect(() => Bytes.fromHex("0A")).toThrow(DomainValueError);
  });

  it("compares by content", () => {
    expect(Bytes.fromHex("0102").equals(Bytes.fromBytes(new Uint8Array([1, 2])))).toBe(true);
    expect(Bytes.fromHex("0102").equals(Bytes.fromHex("010203"))).toBe(false);
  });
});

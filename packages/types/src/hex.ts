/**
 * Lowercase hexadecimal, the only textual form hash and key material has.
 */

import { DomainValueError } from "./errors.js";

const LOWER_HEX = /^(?:[0-9a-f]{2})*$/;

export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

/**
 * Decode lowercase hex into a fresh byte array.
 *
 * @throws DomainValueError (INVALID_HEX) on odd length, uppercase or non-hex characters
 */
export function decodeHex(hex: string): Uint8Array {
  if (!LOWER_HEX.test(hex)) {
    throw new DomainValueError("INVALID_HEX", `Not a lowercase hex string: "${truncate(hex)}"`);
  }
  return new Uint8Array(Buffer.from(hex, "hex"));
}

function truncate(value: string): string {
  return value.length > 24 ? `${value.slice(0, 24)}…` : value;
}

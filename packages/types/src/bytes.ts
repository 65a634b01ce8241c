/**
 * An immutable byte string of any length.
 *
 * Like Digest, it owns a private copy: bytes are copied on the way in and
 * on the way out, so no caller can change a value after it is built.
 */

import { decodeHex, encodeHex } from "./hex.js";

export class Bytes {
  private constructor(private readonly _bytes: Uint8Array) {}

  static fromBytes(bytes: Uint8Array): Bytes {
    return new Bytes(Uint8Array.from(bytes));
  }

  static fromHex(hex: string): Bytes {
    return new Bytes(decodeHex(hex));
  }

  static empty(): Bytes {
    return new Bytes(new Uint8Array(0));
  }

  get length(): number {
    return this._bytes.length;
  }

  /** Copy of the bytes. */
  toBytes(): Uint8Array {
    return Uint8Array.from(this._bytes);
  }

  toHex(): string {
    return encodeHex(this._bytes);
  }

  equals(other: Bytes): boolean {
    return Buffer.compare(this._bytes, other._bytes) === 0;
  }

  toString(): string {
    return this.toHex();
  }
}

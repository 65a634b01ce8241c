/**
 * Digest Types
 *
 * 32-byte hashes identifying blocks, deploys and state roots.
 *
 * Rules:
 * - The binary form is canonical; hex is derived on demand and never stored
 * - Bytes are copied in and copied out, so a digest cannot be mutated
 * - BlockHash and DeployHash are distinct kinds and not interchangeable
 */

import { DomainValueError } from "./errors.js";
import { decodeHex, encodeHex } from "./hex.js";

export const DIGEST_LENGTH = 32;

function checkLength(bytes: Uint8Array): Uint8Array {
  if (bytes.length !== DIGEST_LENGTH) {
    throw new DomainValueError(
      "INVALID_LENGTH",
      `Digest must be ${DIGEST_LENGTH} bytes, got ${bytes.length}`,
    );
  }
  return Uint8Array.from(bytes);
}

/**
 * A 32-byte hash.
 */
export class Digest {
  protected constructor(protected readonly _bytes: Uint8Array) {}

  static fromBytes(bytes: Uint8Array): Digest {
    return new Digest(checkLength(bytes));
  }

  static fromHex(hex: string): Digest {
    return new Digest(checkLength(decodeHex(hex)));
  }

  /** Copy of the raw bytes. */
  toBytes(): Uint8Array {
    return Uint8Array.from(this._bytes);
  }

  /** Lowercase hex, always 64 characters. */
  toHex(): string {
    return encodeHex(this._bytes);
  }

  equals(other: Digest): boolean {
    return Buffer.compare(this._bytes, other._bytes) === 0;
  }

  toString(): string {
    return this.toHex();
  }
}

/**
 * Hash of a block header.
 */
export class BlockHash extends Digest {
  readonly kind = "BlockHash" as const;

  static override fromBytes(bytes: Uint8Array): BlockHash {
    return new BlockHash(checkLength(bytes));
  }

  static override fromHex(hex: string): BlockHash {
    return new BlockHash(checkLength(decodeHex(hex)));
  }
}

/**
 * Hash of a deploy (header hash).
 */
export class DeployHash extends Digest {
  readonly kind = "DeployHash" as const;

  static override fromBytes(bytes: Uint8Array): DeployHash {
    return new DeployHash(checkLength(bytes));
  }

  static override fromHex(hex: string): DeployHash {
    return new DeployHash(checkLength(decodeHex(hex)));
  }
}

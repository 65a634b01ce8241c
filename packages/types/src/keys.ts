/**
 * Asymmetric key material: validator/account public keys and signatures.
 *
 * The textual form is a one-byte algorithm tag followed by the raw bytes,
 * both in lowercase hex:
 *
 *   system     00  (no key bytes)
 *   ed25519    01  + 32-byte key / 64-byte signature
 *   secp256k1  02  + 33-byte key / 64-byte signature
 */

import { DomainValueError } from "./errors.js";
import { decodeHex, encodeHex } from "./hex.js";

export type KeyAlgorithm = "system" | "ed25519" | "secp256k1";

const TAGS: Readonly<Record<KeyAlgorithm, number>> = {
  system: 0,
  ed25519: 1,
  secp256k1: 2,
};

const PUBLIC_KEY_LENGTHS: Readonly<Record<KeyAlgorithm, number>> = {
  system: 0,
  ed25519: 32,
  secp256k1: 33,
};

const SIGNATURE_LENGTHS: Readonly<Record<KeyAlgorithm, number>> = {
  system: 0,
  ed25519: 64,
  secp256k1: 64,
};

function algorithmForTag(tag: number | undefined): KeyAlgorithm {
  switch (tag) {
    case 0:
      return "system";
    case 1:
      return "ed25519";
    case 2:
      return "secp256k1";
    default:
      throw new DomainValueError("INVALID_KEY_TAG", `Unknown key algorithm tag: ${String(tag)}`);
  }
}

function checkRaw(
  what: string,
  algorithm: KeyAlgorithm,
  raw: Uint8Array,
  lengths: Readonly<Record<KeyAlgorithm, number>>,
): Uint8Array {
  const expected = lengths[algorithm];
  if (raw.length !== expected) {
    throw new DomainValueError(
      "INVALID_LENGTH",
      `${algorithm} ${what} must be ${expected} bytes, got ${raw.length}`,
    );
  }
  return Uint8Array.from(raw);
}

function tagged(algorithm: KeyAlgorithm, raw: Uint8Array): Uint8Array {
  const out = new Uint8Array(raw.length + 1);
  out[0] = TAGS[algorithm];
  out.set(raw, 1);
  return out;
}

// =============================================================================
// Public key
// =============================================================================

export class PublicKey {
  private constructor(
    readonly algorithm: KeyAlgorithm,
    private readonly _raw: Uint8Array,
  ) {}

  static fromRaw(algorithm: KeyAlgorithm, raw: Uint8Array): PublicKey {
    return new PublicKey(algorithm, checkRaw("public key", algorithm, raw, PUBLIC_KEY_LENGTHS));
  }

  /** Parse the tagged form (tag byte followed by the raw key). */
  static fromBytes(bytes: Uint8Array): PublicKey {
    const algorithm = algorithmForTag(bytes[0]);
    return PublicKey.fromRaw(algorithm, bytes.subarray(1));
  }

  static fromHex(hex: string): PublicKey {
    return PublicKey.fromBytes(decodeHex(hex));
  }

  /** Raw key bytes, without the tag. */
  raw(): Uint8Array {
    return Uint8Array.from(this._raw);
  }

  /** Tagged bytes. */
  toBytes(): Uint8Array {
    return tagged(this.algorithm, this._raw);
  }

  toHex(): string {
    return encodeHex(this.toBytes());
  }

  equals(other: PublicKey): boolean {
    return this.algorithm === other.algorithm && Buffer.compare(this._raw, other._raw) === 0;
  }

  toString(): string {
    return this.toHex();
  }
}

// =============================================================================
// Signature
// =============================================================================

export class Signature {
  private constructor(
    readonly algorithm: KeyAlgorithm,
    private readonly _raw: Uint8Array,
  ) {}

  static fromRaw(algorithm: KeyAlgorithm, raw: Uint8Array): Signature {
    return new Signature(algorithm, checkRaw("signature", algorithm, raw, SIGNATURE_LENGTHS));
  }

  static fromBytes(bytes: Uint8Array): Signature {
    const algorithm = algorithmForTag(bytes[0]);
    return Signature.fromRaw(algorithm, bytes.subarray(1));
  }

  static fromHex(hex: string): Signature {
    return Signature.fromBytes(decodeHex(hex));
  }

  raw(): Uint8Array {
    return Uint8Array.from(this._raw);
  }

  toBytes(): Uint8Array {
    return tagged(this.algorithm, this._raw);
  }

  toHex(): string {
    return encodeHex(this.toBytes());
  }

  toString(): string {
    return this.toHex();
  }
}

export function publicKeyLength(algorithm: KeyAlgorithm): number {
  return PUBLIC_KEY_LENGTHS[algorithm];
}

export function signatureLength(algorithm: KeyAlgorithm): number {
  return SIGNATURE_LENGTHS[algorithm];
}

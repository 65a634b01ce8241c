/**
 * @nodefeed/sse-events — Correlation accessors.
 *
 * Read-only views consumers use to index and route events without
 * re-parsing payloads. Every accessor is a pure function of the event:
 * no lookups, and the same event always yields the same output.
 */

import { formatTimestamp } from "@nodefeed/types";
import type { DeployHash, EraId, FinalitySignature } from "@nodefeed/types";
import { assertNever } from "./errors.js";
import type {
  BlockAddedEvent,
  DeployAcceptedEvent,
  FaultEvent,
  FinalitySignatureEvent,
  HashedSseEvent,
  SseEvent,
} from "./types.js";

/**
 * Hex of the event's primary hash: the block hash for BlockAdded, the deploy
 * hash for the deploy variants.
 */
export function hexEncodedHash(event: HashedSseEvent): string {
  switch (event.type) {
    case "BlockAdded":
      return event.blockHash.toHex();
    case "DeployAccepted":
      return event.deploy.hash.toHex();
    case "DeployProcessed":
    case "DeployExpired":
      return event.deployHash.toHex();
    default:
      return assertNever(event, "hashed event");
  }
}

export function blockHeight(event: BlockAddedEvent): number {
  return event.block.header.height;
}

export function deployHash(event: DeployAcceptedEvent): DeployHash {
  return event.deploy.hash;
}

export function hexEncodedBlockHash(event: FinalitySignatureEvent): string {
  return event.signature.blockHash.toHex();
}

export function hexEncodedPublicKey(event: FinalitySignatureEvent): string {
  return event.signature.publicKey.toHex();
}

/** The wrapped signature. */
export function innerFinalitySignature(event: FinalitySignatureEvent): FinalitySignature {
  return event.signature;
}

/**
 * Multi-line rendering for diagnostics.
 */
export function describeFault(event: FaultEvent): string {
  return [
    "Fault {",
    `    era_id: ${event.eraId},`,
    `    public_key: ${event.publicKey.toHex()},`,
    `    timestamp: ${formatTimestamp(event.timestamp)},`,
    "}",
  ].join("\n");
}

// =============================================================================
// Correlation index
// =============================================================================

/**
 * Every identifier an event carries, hex-encoded where binary.
 * Absent fields are omitted, never defaulted.
 */
export interface EventCorrelation {
  readonly blockHash?: string;
  readonly deployHash?: string;
  readonly publicKey?: string;
  readonly eraId?: EraId;
  readonly height?: number;
}

export function eventCorrelation(event: SseEvent): EventCorrelation {
  switch (event.type) {
    case "ApiVersion":
      return {};
    case "BlockAdded":
      return {
        blockHash: event.blockHash.toHex(),
        eraId: event.block.header.eraId,
        height: event.block.header.height,
      };
    case "DeployAccepted":
      return {
        deployHash: event.deploy.hash.toHex(),
        publicKey: event.deploy.header.account.toHex(),
      };
    case "DeployProcessed":
      return {
        deployHash: event.deployHash.toHex(),
        blockHash: event.blockHash.toHex(),
        publicKey: event.account.toHex(),
      };
    case "DeployExpired":
      return { deployHash: event.deployHash.toHex() };
    case "Fault":
      return { eraId: event.eraId, publicKey: event.publicKey.toHex() };
    case "FinalitySignature":
      return {
        blockHash: event.signature.blockHash.toHex(),
        eraId: event.signature.eraId,
        publicKey: event.signature.publicKey.toHex(),
      };
    case "Step":
      return { eraId: event.eraId };
    default:
      return assertNever(event, "event type");
  }
}

/**
 * Block Types
 *
 * The JSON view of a block as stored on the node's linear chain.
 *
 * Rules:
 * - Blocks reach this layer already validated and stored
 * - `hash` is the hash of `header`; this layer never recomputes it
 * - Height is a non-negative safe integer, non-decreasing along the chain
 */

import type { BlockHash, DeployHash, Digest } from "./digest.js";
import type { PublicKey, Signature } from "./keys.js";
import type { ProtocolVersion } from "./protocol-version.js";
import type { EraId, Timestamp } from "./time.js";

export interface Reward {
  readonly validator: PublicKey;
  /** Full u64 range. */
  readonly amount: bigint;
}

export interface ValidatorWeight {
  readonly validator: PublicKey;
  /** Stake weight (U512). */
  readonly weight: bigint;
}

/**
 * Summary of the era that a switch block closes.
 */
export interface EraReport {
  readonly equivocators: readonly PublicKey[];
  readonly rewards: readonly Reward[];
  readonly inactiveValidators: readonly PublicKey[];
}

export interface EraEnd {
  readonly eraReport: EraReport;
  readonly nextEraValidatorWeights: readonly ValidatorWeight[];
}

export interface BlockHeader {
  readonly parentHash: BlockHash;
  readonly stateRootHash: Digest;
  readonly bodyHash: Digest;
  readonly randomBit: boolean;
  readonly accumulatedSeed: Digest;
  /** Present only on the last (switch) block of an era. */
  readonly eraEnd: EraEnd | null;
  readonly timestamp: Timestamp;
  readonly eraId: EraId;
  readonly height: number;
  readonly protocolVersion: ProtocolVersion;
}

export interface BlockBody {
  readonly proposer: PublicKey;
  readonly deployHashes: readonly DeployHash[];
  readonly transferHashes: readonly DeployHash[];
}

/**
 * A finality signature attached to a stored block.
 */
export interface BlockProof {
  readonly publicKey: PublicKey;
  readonly signature: Signature;
}

export interface Block {
  readonly hash: BlockHash;
  readonly header: BlockHeader;
  readonly body: BlockBody;
  readonly proofs: readonly BlockProof[];
}

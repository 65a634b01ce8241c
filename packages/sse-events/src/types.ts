/**
 * @nodefeed/sse-events — Event taxonomy.
 *
 * The closed set of events a node publishes to its subscribers. Every event
 * reports a fact that is already final when the event is built.
 *
 * Design principles:
 * - One discriminated union, one arm per variant, switched on `type`
 * - Events are frozen at construction; nothing mutates them afterwards
 * - Hash and key fields hold binary values; hex is derived by accessors
 * - ApiVersion is the handshake and never carries an event id
 */

import type {
  Block,
  BlockHash,
  Deploy,
  DeployHash,
  EraId,
  ExecutionEffect,
  ExecutionResult,
  FinalitySignature,
  ProtocolVersion,
  PublicKey,
  TimeDiff,
  Timestamp,
} from "@nodefeed/types";

// =============================================================================
// Variants
// =============================================================================

/**
 * The version of the node's event API. Always the first event sent to a new
 * subscriber, and the only one without an event id.
 */
export interface ApiVersionEvent {
  readonly type: "ApiVersion";
  readonly version: ProtocolVersion;
}

/**
 * A block has been added to the linear chain and stored locally.
 */
export interface BlockAddedEvent {
  readonly type: "BlockAdded";
  readonly blockHash: BlockHash;
  readonly block: Block;
}

/**
 * A deploy has been newly accepted by the node.
 *
 * `deploy` is the node's own record, shared by reference with every
 * subscriber that serializes this event.
 */
export interface DeployAcceptedEvent {
  readonly type: "DeployAccepted";
  readonly deploy: Deploy;
}

/**
 * A deploy has been executed, committed and forms part of the given block.
 */
export interface DeployProcessedEvent {
  readonly type: "DeployProcessed";
  readonly deployHash: DeployHash;
  readonly account: PublicKey;
  readonly timestamp: Timestamp;
  readonly ttl: TimeDiff;
  readonly dependencies: readonly DeployHash[];
  readonly blockHash: BlockHash;
  readonly executionResult: ExecutionResult;
}

/**
 * A buffered deploy's time-to-live elapsed before it was included in a block.
 */
export interface DeployExpiredEvent {
  readonly type: "DeployExpired";
  readonly deployHash: DeployHash;
}

/**
 * A validator fault (equivocation) observed in an era.
 */
export interface FaultEvent {
  readonly type: "Fault";
  readonly eraId: EraId;
  readonly publicKey: PublicKey;
  readonly timestamp: Timestamp;
}

/**
 * A new finality signature has been received.
 */
export interface FinalitySignatureEvent {
  readonly type: "FinalitySignature";
  readonly signature: FinalitySignature;
}

/**
 * The execution effects produced by an era-end step.
 */
export interface StepEvent {
  readonly type: "Step";
  readonly eraId: EraId;
  readonly executionEffect: ExecutionEffect;
}

// =============================================================================
// Union
// =============================================================================

export type SseEvent =
  | ApiVersionEvent
  | BlockAddedEvent
  | DeployAcceptedEvent
  | DeployProcessedEvent
  | DeployExpiredEvent
  | FaultEvent
  | FinalitySignatureEvent
  | StepEvent;

export type SseEventType = SseEvent["type"];

/**
 * Every event except the handshake. These are the events a stream numbers.
 */
export type DomainSseEvent = Exclude<SseEvent, ApiVersionEvent>;

/**
 * Look up a variant's interface by its discriminator.
 */
export type SseEventOf<T extends SseEventType> = Extract<SseEvent, { readonly type: T }>;

/**
 * Variants that carry a primary hash a consumer can index on.
 */
export type HashedSseEvent =
  | BlockAddedEvent
  | DeployAcceptedEvent
  | DeployProcessedEvent
  | DeployExpiredEvent;

/**
 * @nodefeed/sse-events — Event constructors.
 *
 * One pure factory per variant. Inputs are trusted: the node validated them
 * before the fact became true, so nothing here checks signatures, hashes or
 * heights.
 *
 * Every factory freezes what it wraps in place. Payloads are held by
 * reference, never cloned: DeployAccepted in particular must not copy the
 * deploy, which is shared by every subscriber that serializes the event.
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
  Timestamp,
} from "@nodefeed/types";
import { freezeDeep } from "./immutable.js";
import type {
  ApiVersionEvent,
  BlockAddedEvent,
  DeployAcceptedEvent,
  DeployExpiredEvent,
  DeployProcessedEvent,
  FaultEvent,
  FinalitySignatureEvent,
  StepEvent,
} from "./types.js";

export function apiVersion(version: ProtocolVersion): ApiVersionEvent {
  return freezeDeep<ApiVersionEvent>({ type: "ApiVersion", version });
}

export function blockAdded(blockHash: BlockHash, block: Block): BlockAddedEvent {
  return freezeDeep<BlockAddedEvent>({ type: "BlockAdded", blockHash, block });
}

export function deployAccepted(deploy: Deploy): DeployAcceptedEvent {
  return freezeDeep<DeployAcceptedEvent>({ type: "DeployAccepted", deploy });
}

export type DeployProcessedFields = Omit<DeployProcessedEvent, "type">;

export function deployProcessed(fields: DeployProcessedFields): DeployProcessedEvent {
  return freezeDeep<DeployProcessedEvent>({
    type: "DeployProcessed",
    deployHash: fields.deployHash,
    account: fields.account,
    timestamp: fields.timestamp,
    ttl: fields.ttl,
    dependencies: fields.dependencies,
    blockHash: fields.blockHash,
    executionResult: fields.executionResult,
  });
}

/**
 * Build DeployProcessed for a deploy executed in `blockHash`, taking the
 * hash, account, timestamp, ttl and dependencies from the deploy itself.
 */
export function deployProcessedFromDeploy(
  deploy: Deploy,
  blockHash: BlockHash,
  executionResult: ExecutionResult,
): DeployProcessedEvent {
  return deployProcessed({
    deployHash: deploy.hash,
    account: deploy.header.account,
    timestamp: deploy.header.timestamp,
    ttl: deploy.header.ttl,
    dependencies: deploy.header.dependencies,
    blockHash,
    executionResult,
  });
}

export function deployExpired(deployHash: DeployHash): DeployExpiredEvent {
  return freezeDeep<DeployExpiredEvent>({ type: "DeployExpired", deployHash });
}

export function fault(eraId: EraId, publicKey: PublicKey, timestamp: Timestamp): FaultEvent {
  return freezeDeep<FaultEvent>({ type: "Fault", eraId, publicKey, timestamp });
}

export function finalitySignature(signature: FinalitySignature): FinalitySignatureEvent {
  return freezeDeep<FinalitySignatureEvent>({ type: "FinalitySignature", signature });
}

export function step(eraId: EraId, executionEffect: ExecutionEffect): StepEvent {
  return freezeDeep<StepEvent>({ type: "Step", eraId, executionEffect });
}

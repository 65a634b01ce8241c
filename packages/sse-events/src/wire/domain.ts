/**
 * Wire form of the domain objects events carry.
 *
 * Field names are snake_case. Hashes, keys, signatures and byte strings are
 * lowercase hex; U64 amounts and U512 quantities are decimal strings;
 * EraId, height and gas price stay JSON numbers; timestamps and time
 * spans use their textual forms from @nodefeed/types. Each mapping is
 * written out field by field so the wire contract can be read here rather
 * than inferred from a serializer.
 */

import { formatProtocolVersion, formatTimeDiff, formatTimestamp } from "@nodefeed/types";
import type {
  Approval,
  Block,
  BlockHeader,
  CLValue,
  Deploy,
  DeployHeader,
  EraEnd,
  ExecutableDeployItem,
  ExecutionEffect,
  ExecutionResult,
  FinalitySignature,
  RuntimeArgs,
  Transform,
} from "@nodefeed/types";
import { assertNever } from "../errors.js";
import type { JsonObject, JsonValue } from "./json.js";

// =============================================================================
// Deploys
// =============================================================================

export function encodeCLValue(value: CLValue): JsonObject {
  return {
    cl_type: value.clType,
    bytes: value.bytes.toHex(),
    parsed: value.parsed,
  };
}

/** Runtime args as `[name, value]` pairs, in declaration order. */
export function encodeRuntimeArgs(args: RuntimeArgs): JsonValue {
  return args.map((arg) => [arg.name, encodeCLValue(arg.value)]);
}

export function encodeExecutableDeployItem(item: ExecutableDeployItem): JsonObject {
  switch (item.kind) {
    case "ModuleBytes":
      return {
        ModuleBytes: {
          module_bytes: item.moduleBytes.toHex(),
          args: encodeRuntimeArgs(item.args),
        },
      };
    case "StoredContractByHash":
      return {
        StoredContractByHash: {
          hash: item.hash.toHex(),
          entry_point: item.entryPoint,
          args: encodeRuntimeArgs(item.args),
        },
      };
    case "StoredContractByName":
      return {
        StoredContractByName: {
          name: item.name,
          entry_point: item.entryPoint,
          args: encodeRuntimeArgs(item.args),
        },
      };
    case "Transfer":
      return { Transfer: { args: encodeRuntimeArgs(item.args) } };
    default:
      return assertNever(item, "executable deploy item");
  }
}

export function encodeDeployHeader(header: DeployHeader): JsonObject {
  return {
    account: header.account.toHex(),
    timestamp: formatTimestamp(header.timestamp),
    ttl: formatTimeDiff(header.ttl),
    gas_price: header.gasPrice,
    body_hash: header.bodyHash.toHex(),
    dependencies: header.dependencies.map((hash) => hash.toHex()),
    chain_name: header.chainName,
  };
}

function encodeApproval(approval: Approval): JsonObject {
  return {
    signer: approval.signer.toHex(),
    signature: approval.signature.toHex(),
  };
}

export function encodeDeploy(deploy: Deploy): JsonObject {
  return {
    hash: deploy.hash.toHex(),
    header: encodeDeployHeader(deploy.header),
    payment: encodeExecutableDeployItem(deploy.payment),
    session: encodeExecutableDeployItem(deploy.session),
    approvals: deploy.approvals.map(encodeApproval),
  };
}

// =============================================================================
// Blocks
// =============================================================================

function encodeEraEnd(eraEnd: EraEnd): JsonObject {
  return {
    era_report: {
      equivocators: eraEnd.eraReport.equivocators.map((key) => key.toHex()),
      rewards: eraEnd.eraReport.rewards.map((reward) => ({
        validator: reward.validator.toHex(),
        amount: reward.amount.toString(),
      })),
      inactive_validators: eraEnd.eraReport.inactiveValidators.map((key) => key.toHex()),
    },
    next_era_validator_weights: eraEnd.nextEraValidatorWeights.map((entry) => ({
      validator: entry.validator.toHex(),
      weight: entry.weight.toString(),
    })),
  };
}

export function encodeBlockHeader(header: BlockHeader): JsonObject {
  return {
    parent_hash: header.parentHash.toHex(),
    state_root_hash: header.stateRootHash.toHex(),
    body_hash: header.bodyHash.toHex(),
    random_bit: header.randomBit,
    accumulated_seed: header.accumulatedSeed.toHex(),
    era_end: header.eraEnd === null ? null : encodeEraEnd(header.eraEnd),
    timestamp: formatTimestamp(header.timestamp),
    era_id: header.eraId,
    height: header.height,
    protocol_version: formatProtocolVersion(header.protocolVersion),
  };
}

export function encodeBlock(block: Block): JsonObject {
  return {
    hash: block.hash.toHex(),
    header: encodeBlockHeader(block.header),
    body: {
      proposer: block.body.proposer.toHex(),
      deploy_hashes: block.body.deployHashes.map((hash) => hash.toHex()),
      transfer_hashes: block.body.transferHashes.map((hash) => hash.toHex()),
    },
    proofs: block.proofs.map((proof) => ({
      public_key: proof.publicKey.toHex(),
      signature: proof.signature.toHex(),
    })),
  };
}

// =============================================================================
// Execution
// =============================================================================

export function encodeTransform(transform: Transform): JsonValue {
  switch (transform.kind) {
    case "Identity":
      return "Identity";
    case "WriteCLValue":
      return { WriteCLValue: encodeCLValue(transform.value) };
    case "WriteAccount":
      return { WriteAccount: transform.accountHash };
    case "AddInt32":
      return { AddInt32: transform.value };
    case "AddUInt64":
      return { AddUInt64: transform.value.toString() };
    case "AddUInt512":
      return { AddUInt512: transform.value.toString() };
    case "AddKeys":
      return {
        AddKeys: transform.namedKeys.map((named) => ({ name: named.name, key: named.key })),
      };
    case "Failure":
      return { Failure: transform.message };
    default:
      return assertNever(transform, "transform");
  }
}

export function encodeExecutionEffect(effect: ExecutionEffect): JsonObject {
  return {
    operations: effect.operations.map((op) => ({ key: op.key, kind: op.kind })),
    transforms: effect.transforms.map((entry) => ({
      key: entry.key,
      transform: encodeTransform(entry.transform),
    })),
  };
}

export function encodeExecutionResult(result: ExecutionResult): JsonObject {
  switch (result.kind) {
    case "Success":
      return {
        Success: {
          effect: encodeExecutionEffect(result.effect),
          transfers: [...result.transfers],
          cost: result.cost.toString(),
        },
      };
    case "Failure":
      return {
        Failure: {
          effect: encodeExecutionEffect(result.effect),
          transfers: [...result.transfers],
          cost: result.cost.toString(),
          error_message: result.errorMessage,
        },
      };
    default:
      return assertNever(result, "execution result");
  }
}

// =============================================================================
// Finality signatures
// =============================================================================

export function encodeFinalitySignature(signature: FinalitySignature): JsonObject {
  return {
    block_hash: signature.blockHash.toHex(),
    era_id: signature.eraId,
    signature: signature.signature.toHex(),
    public_key: signature.publicKey.toHex(),
  };
}

/**
 * @nodefeed/sse-events — Canonical encoding.
 *
 * Every event encodes to a record with exactly one key, the variant name,
 * whose value is the payload:
 *
 *   {"ApiVersion":"1.0.0"}
 *   {"BlockAdded":{"block_hash":"…","block":{…}}}
 *   {"DeployAccepted":{"hash":"…","header":{…},"payment":{…},…}}
 *
 * The variant key is the discriminator a decoder switches on, so a record
 * from a newer node with an unknown variant is detected, not misparsed.
 *
 * Encoding is total. A variant missing from the switch below is a defect
 * caught by the compiler, and by assertNever at run time.
 */

import { canonicalize } from "json-canonicalize";
import { formatProtocolVersion, formatTimestamp, formatTimeDiff } from "@nodefeed/types";
import { assertNever } from "./errors.js";
import type { SseEvent } from "./types.js";
import type { JsonObject, JsonValue } from "./wire/json.js";
import {
  encodeBlock,
  encodeDeploy,
  encodeExecutionEffect,
  encodeExecutionResult,
  encodeFinalitySignature,
} from "./wire/domain.js";

/**
 * An encoded event: `{ [variant]: payload }`, one key only.
 */
export type WireRecord = JsonObject;

/**
 * Copy `fields` into `parent` key by key. DeployAccepted uses this to place
 * the deploy's own fields directly in its payload, with no wrapper key.
 */
function flattenInto(parent: Record<string, JsonValue>, fields: JsonObject): JsonObject {
  for (const [key, value] of Object.entries(fields)) {
    parent[key] = value;
  }
  return parent;
}

/**
 * The payload of an event, without its variant key.
 */
export function encodePayload(event: SseEvent): JsonValue {
  switch (event.type) {
    case "ApiVersion":
      return formatProtocolVersion(event.version);
    case "BlockAdded":
      return {
        block_hash: event.blockHash.toHex(),
        block: encodeBlock(event.block),
      };
    case "DeployAccepted":
      return flattenInto({}, encodeDeploy(event.deploy));
    case "DeployProcessed":
      return {
        deploy_hash: event.deployHash.toHex(),
        account: event.account.toHex(),
        timestamp: formatTimestamp(event.timestamp),
        ttl: formatTimeDiff(event.ttl),
        dependencies: event.dependencies.map((hash) => hash.toHex()),
        block_hash: event.blockHash.toHex(),
        execution_result: encodeExecutionResult(event.executionResult),
      };
    case "DeployExpired":
      return { deploy_hash: event.deployHash.toHex() };
    case "Fault":
      return {
        era_id: event.eraId,
        public_key: event.publicKey.toHex(),
        timestamp: formatTimestamp(event.timestamp),
      };
    case "FinalitySignature":
      return encodeFinalitySignature(event.signature);
    case "Step":
      return {
        era_id: event.eraId,
        execution_effect: encodeExecutionEffect(event.executionEffect),
      };
    default:
      return assertNever(event, "event type");
  }
}

export function encodeEvent(event: SseEvent): WireRecord {
  return { [event.type]: encodePayload(event) };
}

/**
 * Serialize an event as RFC 8785 canonical JSON. Two serializations of the
 * same event are byte-identical.
 */
export function serializeEvent(event: SseEvent): string {
  return canonicalize(encodeEvent(event));
}

/**
 * @nodefeed/sse-events — Reference decoder.
 *
 * Reads a wire record back into an event through the same constructors the
 * emitter uses, so a decoded event is frozen and equal to the event that
 * was encoded.
 *
 * Failure modes are distinguishable:
 * - INVALID_JSON       the text is not JSON
 * - MALFORMED_RECORD   not an object with exactly one key
 * - UNKNOWN_VARIANT    the key is not a variant this decoder knows
 * - MALFORMED_PAYLOAD  the payload does not match the variant's shape
 */

import { z } from "zod";
import type { ZodError } from "zod";
import { isSseEventType } from "./catalog.js";
import type { DecodeIssue } from "./errors.js";
import { EventDecodeError } from "./errors.js";
import {
  apiVersion,
  blockAdded,
  deployAccepted,
  deployExpired,
  deployProcessed,
  fault,
  finalitySignature,
  step,
} from "./events.js";
import type { SseEvent, SseEventOf, SseEventType } from "./types.js";
import {
  BlockHashSchema,
  BlockSchema,
  DeployHashSchema,
  DeploySchema,
  ExecutionEffectSchema,
  ExecutionResultSchema,
  FinalitySignatureSchema,
  ProtocolVersionSchema,
  PublicKeySchema,
  TimeDiffSchema,
  TimestampSchema,
  U64Schema,
} from "./wire/schemas.js";

// =============================================================================
// Variant payload schemas
// =============================================================================

type VariantSchemas = {
  readonly [K in SseEventType]: z.ZodType<SseEventOf<K>, z.ZodTypeDef, unknown>;
};

const VARIANT_SCHEMAS: VariantSchemas = {
  ApiVersion: ProtocolVersionSchema.transform(apiVersion),
  BlockAdded: z
    .object({ block_hash: BlockHashSchema, block: BlockSchema })
    .strict()
    .transform((w) => blockAdded(w.block_hash, w.block)),
  // The deploy's fields are the payload itself; there is no wrapper key
  DeployAccepted: DeploySchema.transform(deployAccepted),
  DeployProcessed: z
    .object({
      deploy_hash: DeployHashSchema,
      account: PublicKeySchema,
      timestamp: TimestampSchema,
      ttl: TimeDiffSchema,
      dependencies: z.array(DeployHashSchema),
      block_hash: BlockHashSchema,
      execution_result: ExecutionResultSchema,
    })
    .strict()
    .transform((w) =>
      deployProcessed({
        deployHash: w.deploy_hash,
        account: w.account,
        timestamp: w.timestamp,
        ttl: w.ttl,
        dependencies: w.dependencies,
        blockHash: w.block_hash,
        executionResult: w.execution_result,
      }),
    ),
  DeployExpired: z
    .object({ deploy_hash: DeployHashSchema })
    .strict()
    .transform((w) => deployExpired(w.deploy_hash)),
  Fault: z
    .object({ era_id: U64Schema, public_key: PublicKeySchema, timestamp: TimestampSchema })
    .strict()
    .transform((w) => fault(w.era_id, w.public_key, w.timestamp)),
  FinalitySignature: FinalitySignatureSchema.transform(finalitySignature),
  Step: z
    .object({ era_id: U64Schema, execution_effect: ExecutionEffectSchema })
    .strict()
    .transform((w) => step(w.era_id, w.execution_effect)),
};

// =============================================================================
// Decoding
// =============================================================================

function formatZodIssues(error: ZodError): readonly DecodeIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Decode a parsed wire record.
 *
 * @throws EventDecodeError
 */
export function decodeEvent(record: unknown): SseEvent {
  if (record === null || typeof record !== "object" || Array.isArray(record)) {
    throw new EventDecodeError("MALFORMED_RECORD", "Event record must be a JSON object");
  }

  const keys = Object.keys(record);
  const variant = keys[0];
  if (keys.length !== 1 || variant === undefined) {
    throw new EventDecodeError(
      "MALFORMED_RECORD",
      `Event record must have exactly one variant key, found ${keys.length}`,
    );
  }

  if (!isSseEventType(variant)) {
    throw new EventDecodeError("UNKNOWN_VARIANT", `Unknown event variant "${variant}"`, variant);
  }

  const schema: z.ZodType<SseEvent, z.ZodTypeDef, unknown> = VARIANT_SCHEMAS[variant];
  const result = schema.safeParse(Reflect.get(record, variant));
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new EventDecodeError(
      "MALFORMED_PAYLOAD",
      `Malformed ${variant} payload: ${issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ")}`,
      variant,
      issues,
    );
  }
  return result.data;
}

/**
 * Parse one serialized record (a JSON line or an SSE `data` field).
 *
 * @throws EventDecodeError
 */
export function parseEvent(text: string): SseEvent {
  let record: unknown;
  try {
    record = JSON.parse(text);
  } catch {
    throw new EventDecodeError("INVALID_JSON", "Event record is not valid JSON");
  }
  return decodeEvent(record);
}

export type DecodeResult =
  | { readonly ok: true; readonly event: SseEvent }
  | { readonly ok: false; readonly error: EventDecodeError };

/**
 * Non-throwing variant of {@link parseEvent}.
 */
export function tryParseEvent(text: string): DecodeResult {
  try {
    return { ok: true, event: parseEvent(text) };
  } catch (err) {
    if (err instanceof EventDecodeError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

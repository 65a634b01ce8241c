/**
 * Zod schemas for reading wire records back into domain objects.
 *
 * Each schema validates one wire shape and transforms it into the value the
 * encoder started from. Objects are strict: a missing, extra or ill-typed
 * field fails the parse rather than being dropped or defaulted.
 */

import { z } from "zod";
import {
  BlockHash,
  Bytes,
  DeployHash,
  Digest,
  PublicKey,
  Signature,
  parseProtocolVersion,
  parseTimeDiff,
  parseTimestamp,
} from "@nodefeed/types";
import type {
  Block,
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

// =============================================================================
// Scalars
// =============================================================================

/**
 * A string field read by one of the strict parsers in @nodefeed/types.
 * The parser's error message becomes the zod issue.
 */
function parsedString<T>(parse: (value: string) => T) {
  return z.string().transform((value, ctx): T => {
    try {
      return parse(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });
}

export const HexBytesSchema = parsedString((hex) => Bytes.fromHex(hex));
export const DigestSchema = parsedString((hex) => Digest.fromHex(hex));
export const BlockHashSchema = parsedString((hex) => BlockHash.fromHex(hex));
export const DeployHashSchema = parsedString((hex) => DeployHash.fromHex(hex));
export const PublicKeySchema = parsedString((hex) => PublicKey.fromHex(hex));
export const SignatureSchema = parsedString((hex) => Signature.fromHex(hex));
export const TimestampSchema = parsedString(parseTimestamp);
export const TimeDiffSchema = parsedString(parseTimeDiff);
export const ProtocolVersionSchema = parsedString(parseProtocolVersion);

export const U64Schema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);
const U64_MAX = 2n ** 64n - 1n;

/**
 * A full-range u64 as a bigint. Written as a decimal string; a plain safe
 * integer is read as well.
 */
export const U64BigSchema = z
  .union([
    z.string().regex(/^(0|[1-9]\d{0,19})$/, "Expected an unsigned decimal integer"),
    U64Schema,
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value <= U64_MAX, "Exceeds the u64 range");

const I32Schema = z.number().int().min(-0x8000_0000).max(0x7fff_ffff);

/** Decimal string of at most 155 digits (2^512 has 155). */
export const U512Schema = z
  .string()
  .regex(/^(0|[1-9]\d{0,154})$/, "Expected an unsigned decimal integer")
  .transform((value) => BigInt(value));

// =============================================================================
// Deploys
// =============================================================================

export const CLValueSchema = z
  .object({
    cl_type: z.string(),
    bytes: HexBytesSchema,
    parsed: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  })
  .strict()
  .transform((w): CLValue => ({ clType: w.cl_type, bytes: w.bytes, parsed: w.parsed }));

const RuntimeArgsSchema = z
  .array(z.tuple([z.string(), CLValueSchema]))
  .transform((pairs): RuntimeArgs => pairs.map(([name, value]) => ({ name, value })));

export const ExecutableDeployItemSchema = z.union([
  z
    .object({
      ModuleBytes: z.object({ module_bytes: HexBytesSchema, args: RuntimeArgsSchema }).strict(),
    })
    .strict()
    .transform(({ ModuleBytes: w }): ExecutableDeployItem => ({
      kind: "ModuleBytes",
      moduleBytes: w.module_bytes,
      args: w.args,
    })),
  z
    .object({
      StoredContractByHash: z
        .object({ hash: DigestSchema, entry_point: z.string(), args: RuntimeArgsSchema })
        .strict(),
    })
    .strict()
    .transform(({ StoredContractByHash: w }): ExecutableDeployItem => ({
      kind: "StoredContractByHash",
      hash: w.hash,
      entryPoint: w.entry_point,
      args: w.args,
    })),
  z
    .object({
      StoredContractByName: z
        .object({ name: z.string(), entry_point: z.string(), args: RuntimeArgsSchema })
        .strict(),
    })
    .strict()
    .transform(({ StoredContractByName: w }): ExecutableDeployItem => ({
      kind: "StoredContractByName",
      name: w.name,
      entryPoint: w.entry_point,
      args: w.args,
    })),
  z
    .object({ Transfer: z.object({ args: RuntimeArgsSchema }).strict() })
    .strict()
    .transform(({ Transfer: w }): ExecutableDeployItem => ({ kind: "Transfer", args: w.args })),
]);

const DeployHeaderSchema = z
  .object({
    account: PublicKeySchema,
    timestamp: TimestampSchema,
    ttl: TimeDiffSchema,
    gas_price: U64Schema,
    body_hash: DigestSchema,
    dependencies: z.array(DeployHashSchema),
    chain_name: z.string(),
  })
  .strict()
  .transform(
    (w): DeployHeader => ({
      account: w.account,
      timestamp: w.timestamp,
      ttl: w.ttl,
      gasPrice: w.gas_price,
      bodyHash: w.body_hash,
      dependencies: w.dependencies,
      chainName: w.chain_name,
    }),
  );

export const DeploySchema = z
  .object({
    hash: DeployHashSchema,
    header: DeployHeaderSchema,
    payment: ExecutableDeployItemSchema,
    session: ExecutableDeployItemSchema,
    approvals: z.array(z.object({ signer: PublicKeySchema, signature: SignatureSchema }).strict()),
  })
  .strict()
  .transform(
    (w): Deploy => ({
      hash: w.hash,
      header: w.header,
      payment: w.payment,
      session: w.session,
      approvals: w.approvals,
    }),
  );

// =============================================================================
// Blocks
// =============================================================================

const EraEndSchema = z
  .object({
    era_report: z
      .object({
        equivocators: z.array(PublicKeySchema),
        rewards: z.array(z.object({ validator: PublicKeySchema, amount: U64BigSchema }).strict()),
        inactive_validators: z.array(PublicKeySchema),
      })
      .strict(),
    next_era_validator_weights: z.array(
      z.object({ validator: PublicKeySchema, weight: U512Schema }).strict(),
    ),
  })
  .strict()
  .transform(
    (w): EraEnd => ({
      eraReport: {
        equivocators: w.era_report.equivocators,
        rewards: w.era_report.rewards,
        inactiveValidators: w.era_report.inactive_validators,
      },
      nextEraValidatorWeights: w.next_era_validator_weights,
    }),
  );

export const BlockSchema = z
  .object({
    hash: BlockHashSchema,
    header: z
      .object({
        parent_hash: BlockHashSchema,
        state_root_hash: DigestSchema,
        body_hash: DigestSchema,
        random_bit: z.boolean(),
        accumulated_seed: DigestSchema,
        era_end: EraEndSchema.nullable(),
        timestamp: TimestampSchema,
        era_id: U64Schema,
        height: U64Schema,
        protocol_version: ProtocolVersionSchema,
      })
      .strict(),
    body: z
      .object({
        proposer: PublicKeySchema,
        deploy_hashes: z.array(DeployHashSchema),
        transfer_hashes: z.array(DeployHashSchema),
      })
      .strict(),
    proofs: z.array(z.object({ public_key: PublicKeySchema, signature: SignatureSchema }).strict()),
  })
  .strict()
  .transform(
    (w): Block => ({
      hash: w.hash,
      header: {
        parentHash: w.header.parent_hash,
        stateRootHash: w.header.state_root_hash,
        bodyHash: w.header.body_hash,
        randomBit: w.header.random_bit,
        accumulatedSeed: w.header.accumulated_seed,
        eraEnd: w.header.era_end,
        timestamp: w.header.timestamp,
        eraId: w.header.era_id,
        height: w.header.height,
        protocolVersion: w.header.protocol_version,
      },
      body: {
        proposer: w.body.proposer,
        deployHashes: w.body.deploy_hashes,
        transferHashes: w.body.transfer_hashes,
      },
      proofs: w.proofs.map((proof) => ({ publicKey: proof.public_key, signature: proof.signature })),
    }),
  );

// =============================================================================
// Execution
// =============================================================================

export const TransformSchema = z.union([
  z.literal("Identity").transform((): Transform => ({ kind: "Identity" })),
  z
    .object({ WriteCLValue: CLValueSchema })
    .strict()
    .transform((w): Transform => ({ kind: "WriteCLValue", value: w.WriteCLValue })),
  z
    .object({ WriteAccount: z.string() })
    .strict()
    .transform((w): Transform => ({ kind: "WriteAccount", accountHash: w.WriteAccount })),
  z
    .object({ AddInt32: I32Schema })
    .strict()
    .transform((w): Transform => ({ kind: "AddInt32", value: w.AddInt32 })),
  z
    .object({ AddUInt64: U64BigSchema })
    .strict()
    .transform((w): Transform => ({ kind: "AddUInt64", value: w.AddUInt64 })),
  z
    .object({ AddUInt512: U512Schema })
    .strict()
    .transform((w): Transform => ({ kind: "AddUInt512", value: w.AddUInt512 })),
  z
    .object({ AddKeys: z.array(z.object({ name: z.string(), key: z.string() }).strict()) })
    .strict()
    .transform((w): Transform => ({ kind: "AddKeys", namedKeys: w.AddKeys })),
  z
    .object({ Failure: z.string() })
    .strict()
    .transform((w): Transform => ({ kind: "Failure", message: w.Failure })),
]);

export const ExecutionEffectSchema = z
  .object({
    operations: z.array(
      z.object({ key: z.string(), kind: z.enum(["Read", "Write", "Add", "NoOp"]) }).strict(),
    ),
    transforms: z.array(z.object({ key: z.string(), transform: TransformSchema }).strict()),
  })
  .strict()
  .transform((w): ExecutionEffect => ({ operations: w.operations, transforms: w.transforms }));

export const ExecutionResultSchema = z.union([
  z
    .object({
      Success: z
        .object({
          effect: ExecutionEffectSchema,
          transfers: z.array(z.string()),
          cost: U512Schema,
        })
        .strict(),
    })
    .strict()
    .transform(({ Success: w }): ExecutionResult => ({
      kind: "Success",
      effect: w.effect,
      transfers: w.transfers,
      cost: w.cost,
    })),
  z
    .object({
      Failure: z
        .object({
          effect: ExecutionEffectSchema,
          transfers: z.array(z.string()),
          cost: U512Schema,
          error_message: z.string(),
        })
        .strict(),
    })
    .strict()
    .transform(({ Failure: w }): ExecutionResult => ({
      kind: "Failure",
      effect: w.effect,
      transfers: w.transfers,
      cost: w.cost,
      errorMessage: w.error_message,
    })),
]);

// =============================================================================
// Finality signatures
// =============================================================================

export const FinalitySignatureSchema = z
  .object({
    block_hash: BlockHashSchema,
    era_id: U64Schema,
    signature: SignatureSchema,
    public_key: PublicKeySchema,
  })
  .strict()
  .transform(
    (w): FinalitySignature => ({
      blockHash: w.block_hash,
      eraId: w.era_id,
      signature: w.signature,
      publicKey: w.public_key,
    }),
  );

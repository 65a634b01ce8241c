/**
 * @nodefeed/types — Domain value types for the node event feed.
 *
 * These types describe the already-validated objects the node hands to the
 * event layer:
 * - Hashes, public keys and signatures (binary at rest, hex on demand)
 * - Time primitives and protocol versions
 * - Blocks, deploys, execution results and finality signatures
 *
 * Design rules:
 * - All record types are readonly
 * - Parsing a textual form is strict and throws DomainValueError
 * - No dependency on the event layer
 */

export type { DomainValueErrorCode } from "./errors.js";
export { DomainValueError } from "./errors.js";

export { encodeHex, decodeHex } from "./hex.js";
export { Bytes } from "./bytes.js";

export { Digest, BlockHash, DeployHash, DIGEST_LENGTH } from "./digest.js";

export type { KeyAlgorithm } from "./keys.js";
export { PublicKey, Signature, publicKeyLength, signatureLength } from "./keys.js";

export type { Timestamp, TimeDiff, EraId } from "./time.js";
export {
  MAX_TIMESTAMP,
  formatTimestamp,
  parseTimestamp,
  formatTimeDiff,
  parseTimeDiff,
} from "./time.js";

export type { ProtocolVersion } from "./protocol-version.js";
export {
  protocolVersion,
  formatProtocolVersion,
  parseProtocolVersion,
} from "./protocol-version.js";

export type {
  Block,
  BlockHeader,
  BlockBody,
  BlockProof,
  EraEnd,
  EraReport,
  Reward,
  ValidatorWeight,
} from "./block.js";

export type {
  Deploy,
  DeployHeader,
  Approval,
  ExecutableDeployItem,
  CLValue,
  CLValueParsed,
  NamedArg,
  RuntimeArgs,
} from "./deploy.js";

export type {
  ExecutionResult,
  ExecutionEffect,
  Operation,
  OpKind,
  NamedKey,
  Transform,
  TransformEntry,
} from "./execution.js";
export { OP_KINDS } from "./execution.js";

export type { FinalitySignature } from "./finality-signature.js";

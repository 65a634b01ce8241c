/**
 * Deploy Types
 *
 * A deploy is a signed request to execute code on the chain: a header,
 * a payment item, a session item and the approvals that authorize it.
 */

import type { Bytes } from "./bytes.js";
import type { DeployHash, Digest } from "./digest.js";
import type { PublicKey, Signature } from "./keys.js";
import type { TimeDiff, Timestamp } from "./time.js";

/**
 * Scalar rendering of a CLValue, when the node could produce one.
 */
export type CLValueParsed = string | number | boolean | null;

/**
 * A typed runtime value: its type name, serialized bytes and a parsed view.
 */
export interface CLValue {
  /** CL type name, e.g. "U512", "String", "PublicKey" */
  readonly clType: string;
  readonly bytes: Bytes;
  readonly parsed: CLValueParsed;
}

export interface NamedArg {
  readonly name: string;
  readonly value: CLValue;
}

/** Runtime arguments, in declaration order. */
export type RuntimeArgs = readonly NamedArg[];

export type ExecutableDeployItem =
  | {
      readonly kind: "ModuleBytes";
      readonly moduleBytes: Bytes;
      readonly args: RuntimeArgs;
    }
  | {
      readonly kind: "StoredContractByHash";
      readonly hash: Digest;
      readonly entryPoint: string;
      readonly args: RuntimeArgs;
    }
  | {
      readonly kind: "StoredContractByName";
      readonly name: string;
      readonly entryPoint: string;
      readonly args: RuntimeArgs;
    }
  | {
      readonly kind: "Transfer";
      readonly args: RuntimeArgs;
    };

export interface DeployHeader {
  readonly account: PublicKey;
  readonly timestamp: Timestamp;
  readonly ttl: TimeDiff;
  readonly gasPrice: number;
  readonly bodyHash: Digest;
  /** Deploys that must execute first, in declaration order (duplicates kept). */
  readonly dependencies: readonly DeployHash[];
  readonly chainName: string;
}

export interface Approval {
  readonly signer: PublicKey;
  readonly signature: Signature;
}

export interface Deploy {
  readonly hash: DeployHash;
  readonly header: DeployHeader;
  readonly payment: ExecutableDeployItem;
  readonly session: ExecutableDeployItem;
  readonly approvals: readonly Approval[];
}

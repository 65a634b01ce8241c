/**
 * Execution Types
 *
 * The effects of executing a deploy or an era-end step against global state.
 */

import type { CLValue } from "./deploy.js";

export type OpKind = "Read" | "Write" | "Add" | "NoOp";

export const OP_KINDS: readonly OpKind[] = ["Read", "Write", "Add", "NoOp"];

export interface Operation {
  /** Formatted global state key, e.g. "hash-…", "account-hash-…" */
  readonly key: string;
  readonly kind: OpKind;
}

export interface NamedKey {
  readonly name: string;
  readonly key: string;
}

export type Transform =
  | { readonly kind: "Identity" }
  | { readonly kind: "WriteCLValue"; readonly value: CLValue }
  | { readonly kind: "WriteAccount"; readonly accountHash: string }
  | { readonly kind: "AddInt32"; readonly value: number }
  | { readonly kind: "AddUInt64"; readonly value: bigint }
  | { readonly kind: "AddUInt512"; readonly value: bigint }
  | { readonly kind: "AddKeys"; readonly namedKeys: readonly NamedKey[] }
  | { readonly kind: "Failure"; readonly message: string };

export interface TransformEntry {
  readonly key: string;
  readonly transform: Transform;
}

export interface ExecutionEffect {
  readonly operations: readonly Operation[];
  readonly transforms: readonly TransformEntry[];
}

export type ExecutionResult =
  | {
      readonly kind: "Success";
      readonly effect: ExecutionEffect;
      /** Formatted transfer addresses ("transfer-…") */
      readonly transfers: readonly string[];
      /** Gas cost (U512) */
      readonly cost: bigint;
    }
  | {
      readonly kind: "Failure";
      readonly effect: ExecutionEffect;
      readonly transfers: readonly string[];
      readonly cost: bigint;
      readonly errorMessage: string;
    };

/**
 * A validator's signature attesting that a block is final.
 */

import type { BlockHash } from "./digest.js";
import type { PublicKey, Signature } from "./keys.js";
import type { EraId } from "./time.js";

export interface FinalitySignature {
  readonly blockHash: BlockHash;
  readonly eraId: EraId;
  readonly signature: Signature;
  readonly publicKey: PublicKey;
}

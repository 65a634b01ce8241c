/**
 * Errors raised when a textual or binary form cannot be turned into a
 * domain value.
 */

export type DomainValueErrorCode =
  | "INVALID_HEX"
  | "INVALID_LENGTH"
  | "INVALID_KEY_TAG"
  | "INVALID_TIMESTAMP"
  | "INVALID_TIME_DIFF"
  | "INVALID_PROTOCOL_VERSION";

export class DomainValueError extends Error {
  constructor(
    public readonly code: DomainValueErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "DomainValueError";
  }
}

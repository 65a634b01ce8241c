/**
 * Protocol version of the node's event API, rendered as "major.minor.patch".
 */

import { DomainValueError } from "./errors.js";

export interface ProtocolVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

const U32_MAX = 0xffff_ffff;
const VERSION_PATTERN = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;

export function protocolVersion(major: number, minor: number, patch: number): ProtocolVersion {
  return Object.freeze({ major, minor, patch });
}

export function formatProtocolVersion(version: ProtocolVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * @throws DomainValueError (INVALID_PROTOCOL_VERSION) on anything but three
 * u32 components without leading zeros
 */
export function parseProtocolVersion(value: string): ProtocolVersion {
  const match = VERSION_PATTERN.exec(value);
  const components = match === null ? [] : match.slice(1).map(Number);
  const [major, minor, patch] = components;
  if (
    major === undefined ||
    minor === undefined ||
    patch === undefined ||
    components.some((c) => c > U32_MAX)
  ) {
    throw new DomainValueError("INVALID_PROTOCOL_VERSION", `Malformed protocol version: "${value}"`);
  }
  return protocolVersion(major, minor, patch);
}

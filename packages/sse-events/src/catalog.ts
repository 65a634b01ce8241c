/**
 * @nodefeed/sse-events — Variant catalog.
 *
 * The authoritative list of event variants, with what each one means and
 * which filtered streams publish it.
 *
 * Streams:
 * - main     block, deploy outcome, fault and step events
 * - deploys  newly accepted deploys
 * - sigs     finality signatures
 *
 * ApiVersion opens every stream and is not listed under any of them.
 */

import type { SseEvent, SseEventType } from "./types.js";

export type EventStreamFilter = "main" | "deploys" | "sigs";

export const EVENT_STREAM_FILTERS: readonly EventStreamFilter[] = ["main", "deploys", "sigs"];

export interface VariantDescriptor {
  readonly type: SseEventType;
  readonly description: string;
  /** False only for the handshake. */
  readonly hasEventId: boolean;
  readonly streams: readonly EventStreamFilter[];
}

export const SSE_EVENT_CATALOG: Readonly<Record<SseEventType, VariantDescriptor>> = {
  ApiVersion: {
    type: "ApiVersion",
    description: "Version of the node's event API; first event of every subscription",
    hasEventId: false,
    streams: [],
  },
  BlockAdded: {
    type: "BlockAdded",
    description: "A block was added to the linear chain and stored locally",
    hasEventId: true,
    streams: ["main"],
  },
  DeployAccepted: {
    type: "DeployAccepted",
    description: "A deploy was accepted into the node's buffer",
    hasEventId: true,
    streams: ["deploys"],
  },
  DeployProcessed: {
    type: "DeployProcessed",
    description: "A deploy was executed and committed as part of a block",
    hasEventId: true,
    streams: ["main"],
  },
  DeployExpired: {
    type: "DeployExpired",
    description: "A buffered deploy's time-to-live elapsed before inclusion",
    hasEventId: true,
    streams: ["main"],
  },
  Fault: {
    type: "Fault",
    description: "A validator equivocated during an era",
    hasEventId: true,
    streams: ["main"],
  },
  FinalitySignature: {
    type: "FinalitySignature",
    description: "A finality signature for a block was received",
    hasEventId: true,
    streams: ["sigs"],
  },
  Step: {
    type: "Step",
    description: "Execution effects of an era-end step",
    hasEventId: true,
    streams: ["main"],
  },
};

/** Variant names in catalog order. */
export const SSE_EVENT_TYPES: readonly SseEventType[] = [
  "ApiVersion",
  "BlockAdded",
  "DeployAccepted",
  "DeployProcessed",
  "DeployExpired",
  "Fault",
  "FinalitySignature",
  "Step",
];

const KNOWN_TYPES = new Set<string>(SSE_EVENT_TYPES);

export function isSseEventType(value: unknown): value is SseEventType {
  return typeof value === "string" && KNOWN_TYPES.has(value);
}

export function streamsForEvent(event: SseEvent): readonly EventStreamFilter[] {
  return SSE_EVENT_CATALOG[event.type].streams;
}

/**
 * Whether a subscriber of `filter` receives `event`. The handshake goes to
 * every subscriber.
 */
export function includesEvent(filter: EventStreamFilter, event: SseEvent): boolean {
  return event.type === "ApiVersion" || streamsForEvent(event).includes(filter);
}

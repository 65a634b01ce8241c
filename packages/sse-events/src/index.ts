/**
 * @nodefeed/sse-events — Events a node publishes to its subscribers.
 *
 * Provides:
 * - The closed event taxonomy (SseEvent) and its constructors
 * - Canonical wire encoding and a reference decoder
 * - Correlation accessors for indexing and routing
 * - Variant catalog and stream filters
 * - Event-stream framing and the subscription handshake
 *
 * @packageDocumentation
 */

// Taxonomy
export type {
  SseEvent,
  SseEventType,
  SseEventOf,
  DomainSseEvent,
  HashedSseEvent,
  ApiVersionEvent,
  BlockAddedEvent,
  DeployAcceptedEvent,
  DeployProcessedEvent,
  DeployExpiredEvent,
  FaultEvent,
  FinalitySignatureEvent,
  StepEvent,
} from "./types.js";
export {
  apiVersion,
  blockAdded,
  deployAccepted,
  deployProcessed,
  deployProcessedFromDeploy,
  deployExpired,
  fault,
  finalitySignature,
  step,
} from "./events.js";
export type { DeployProcessedFields } from "./events.js";

// Catalog
export type { EventStreamFilter, VariantDescriptor } from "./catalog.js";
export {
  SSE_EVENT_CATALOG,
  SSE_EVENT_TYPES,
  EVENT_STREAM_FILTERS,
  isSseEventType,
  streamsForEvent,
  includesEvent,
} from "./catalog.js";

// Accessors
export type { EventCorrelation } from "./accessors.js";
export {
  hexEncodedHash,
  blockHeight,
  deployHash,
  hexEncodedBlockHash,
  hexEncodedPublicKey,
  innerFinalitySignature,
  describeFault,
  eventCorrelation,
} from "./accessors.js";

// Encoding & decoding
export type { WireRecord } from "./encoding.js";
export { encodeEvent, encodePayload, serializeEvent } from "./encoding.js";
export type { JsonValue, JsonObject } from "./wire/json.js";
export type { DecodeResult } from "./decoding.js";
export { decodeEvent, parseEvent, tryParseEvent } from "./decoding.js";

// Framing & subscriptions
export type { SseFrame, OutboundFrame } from "./framing.js";
export {
  formatSseFrame,
  encodeFrame,
  parseSseFrame,
  splitSseStream,
  formatJsonLine,
} from "./framing.js";
export type {
  EventStreamWriterOptions,
  SubscriptionDecoderOptions,
  DecodedFrame,
} from "./subscription.js";
export {
  EventStreamWriter,
  SubscriptionDecoder,
  DEFAULT_MAX_FRAME_BYTES,
} from "./subscription.js";

// Errors
export type {
  EventDecodeErrorCode,
  DecodeIssue,
  SubscriptionErrorCode,
  StreamWriterErrorCode,
} from "./errors.js";
export { EventDecodeError, SubscriptionError, StreamWriterError } from "./errors.js";

// Configuration & logging
export type { FeedConfig } from "./config.js";
export {
  ConfigSchema,
  loadConfig,
  decoderOptionsFromConfig,
  writerOptionsFromConfig,
} from "./config.js";
export { createLogger } from "./logger.js";

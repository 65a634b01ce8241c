/**
 * @nodefeed/sse-events — Stream framing.
 *
 * Two transports carry serialized events:
 *
 * Server-sent events, one frame per event, frames separated by a blank line:
 *
 *   data:{"ApiVersion":"1.0.0"}
 *
 *   data:{"DeployExpired":{"deploy_hash":"…"}}
 *   id:7
 *
 * Line-delimited JSON, one record per line, no ids.
 *
 * The handshake frame never has an id; every other frame does. The type of
 * {@link OutboundFrame} makes that rule impossible to break when writing.
 */

import { serializeEvent } from "./encoding.js";
import type { ApiVersionEvent, DomainSseEvent, SseEvent } from "./types.js";

export interface SseFrame {
  /** Event id, absent on the handshake */
  readonly id?: number;
  /** Payload; may span several `data:` lines */
  readonly data: string;
}

export type OutboundFrame =
  | { readonly event: ApiVersionEvent }
  | { readonly event: DomainSseEvent; readonly id: number };

/**
 * Render a frame. Multi-line data is split over several `data:` lines.
 */
export function formatSseFrame(frame: SseFrame): string {
  let out = "";
  for (const line of frame.data.split("\n")) {
    out += `data:${line}\n`;
  }
  if (frame.id !== undefined) {
    out += `id:${frame.id}\n`;
  }
  return out + "\n";
}

export function encodeFrame(frame: OutboundFrame): string {
  const data = serializeEvent(frame.event);
  return "id" in frame ? formatSseFrame({ data, id: frame.id }) : formatSseFrame({ data });
}

/**
 * Parse a single frame (the text between two blank lines).
 *
 * Follows the event-stream field rules: a single space after the colon is
 * dropped, lines starting with ":" are comments, unknown fields are ignored,
 * and an `id` that is not a non-negative integer is ignored.
 * Returns undefined for a frame with no data (a keep-alive).
 */
export function parseSseFrame(text: string): SseFrame | undefined {
  const data: string[] = [];
  let id: number | undefined;

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    if (rawLine === "" || rawLine.startsWith(":")) continue;

    const colon = rawLine.indexOf(":");
    const field = colon === -1 ? rawLine : rawLine.slice(0, colon);
    let value = colon === -1 ? "" : rawLine.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    if (field === "data") {
      data.push(value);
    } else if (field === "id" && /^\d+$/.test(value)) {
      const parsed = Number(value);
      if (Number.isSafeInteger(parsed)) id = parsed;
    }
  }

  if (data.length === 0) {
    return undefined;
  }
  return id === undefined ? { data: data.join("\n") } : { data: data.join("\n"), id };
}

/**
 * Cut an event-stream body into frame texts. A trailing frame with no
 * terminating blank line is incomplete and left out.
 */
export function splitSseStream(body: string): readonly string[] {
  const normalized = body.replace(/\r\n|\r/g, "\n");
  const frames = normalized.split("\n\n");
  // The last element is whatever follows the final separator
  return frames.slice(0, -1).filter((frame) => frame.trim() !== "");
}

export function formatJsonLine(event: SseEvent): string {
  return serializeEvent(event) + "\n";
}

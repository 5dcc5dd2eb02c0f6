import crypto from "node:crypto";
import { EventEnvelope, ProgressEvent } from "./types.js";
import { isRecord } from "./json.js";

export type ParseResult = { ok: true; event: EventEnvelope } | { ok: false; error: string };

const TEXT_FIELDS = [
  ["id", "missing_id"],
  ["type", "missing_type"],
  ["timestamp", "missing_timestamp"],
  ["sessionId", "missing_session_id"],
] as const;

type TextField = (typeof TEXT_FIELDS)[number][0];

/**
 * Validates one inbound WebSocket frame. Size is checked on the raw UTF-8
 * bytes before anything is parsed; the first failing field names the error.
 */
export function parseIncomingEvent(raw: string, maxBytes: number): ParseResult {
  const size = Buffer.byteLength(raw, "utf8");
  if (size > maxBytes) {
    return { ok: false, error: `event_too_large:${size}` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, error: "invalid_json" };
  }
  if (!isRecord(parsed)) {
    return { ok: false, error: "invalid_event_envelope" };
  }

  const fields = new Map<TextField, string>();
  for (const [field, error] of TEXT_FIELDS) {
    const value = parsed[field];
    if (typeof value !== "string" || !value.trim()) {
      return { ok: false, error };
    }
    fields.set(field, value);
  }
  if (!isRecord(parsed.payload)) {
    return { ok: false, error: "missing_payload" };
  }

  return {
    ok: true,
    event: {
      id: fields.get("id") ?? "",
      type: fields.get("type") ?? "",
      timestamp: fields.get("timestamp") ?? "",
      sessionId: fields.get("sessionId") ?? "",
      payload: parsed.payload,
    },
  };
}

export type ErrorCode = "invalid_event" | "session_mismatch" | "invalid_message" | "rate_limited" | "unsupported_event";

export interface EnvelopeStamp {
  id: string;
  timestamp: string;
}

export function stamp(now: Date = new Date()): EnvelopeStamp {
  return { id: crypto.randomUUID(), timestamp: now.toISOString() };
}

export function outboundEnvelope(
  sessionId: string,
  type: string,
  payload: Record<string, unknown>,
  { id, timestamp }: EnvelopeStamp = stamp(),
): EventEnvelope {
  return { id, type, timestamp, sessionId, payload };
}

export function errorEnvelope(sessionId: string, code: ErrorCode, message: string, at?: EnvelopeStamp): EventEnvelope {
  return outboundEnvelope(sessionId, "error", { code, message }, at);
}

/** Wraps a progress event in the WebSocket envelope, keeping its type. */
export function progressEnvelope(sessionId: string, event: ProgressEvent, at?: EnvelopeStamp): EventEnvelope {
  const { type, ...payload } = event;
  return outboundEnvelope(sessionId, type, payload, at);
}

/** One Server-Sent Events frame. */
export function sseFrame(event: ProgressEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

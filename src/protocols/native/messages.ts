import { Buffer } from "node:buffer";
import { type } from "arktype";
import { DecodeError } from "../../shared/errors.js";

/** Envelope the extension sends. Extra fields are ignored. */
export const IncomingMessageSchema = type({
  "query?": "string",
});

export interface IncomingMessage {
  readonly query: string;
}

export interface OutgoingMessage {
  readonly query: string;
  readonly response: string;
}

/**
 * Lifts a `query` key that differs only in case (`Query`, `QUERY`) onto
 * `query`. An exact `query` key wins.
 */
function normalizeQueryKey(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || Object.hasOwn(raw, "query")) return raw;
  const match = Object.entries(raw).find(([key]) => key.toLowerCase() === "query");
  if (match === undefined) return raw;
  const value: unknown = match[1];
  return { ...raw, query: value };
}

/**
 * Parses a frame payload as `{ query }`. A missing `query` (or a bare `null`)
 * decodes to the empty query; anything unparseable comes back as a DecodeError
 * for the caller to log and degrade. The key is matched ignoring case.
 */
export function decodeIncoming(payload: Uint8Array): IncomingMessage | DecodeError {
  const text = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString("utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text) as unknown;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return new DecodeError(`Unable to parse message JSON: ${reason}`, { cause: err });
  }
  if (raw === null) return { query: "" };

  const out = IncomingMessageSchema(normalizeQueryKey(raw));
  if (out instanceof type.errors) {
    return new DecodeError(`Invalid message: ${out.summary}`);
  }
  return { query: out.query ?? "" };
}

/**
 * Only the response string travels back over stdio, JSON-encoded: the
 * extension already knows which query it asked.
 */
export function encodeOutgoing(message: OutgoingMessage): Buffer {
  return Buffer.from(JSON.stringify(message.response), "utf8");
}
